import { describe, it, expect } from 'vitest';
import {
  decodeClientMessage,
  decodeServerMessage,
  encodeChangeEvent,
  serializeMessage,
} from './protocol.js';

describe('encodeChangeEvent', () => {
  it('flattens added and modified entries', () => {
    const message = encodeChangeEvent({
      type: 'modified',
      entry: { name: 'cube.obj', mtime: 1000, size: 42, version: 3 },
    });
    expect(message).toEqual({ type: 'modified', name: 'cube.obj', mtime: 1000, size: 42, version: 3 });
  });

  it('keeps the tombstone version on removals', () => {
    expect(encodeChangeEvent({ type: 'removed', name: 'cube.obj', version: 4 })).toEqual({
      type: 'removed',
      name: 'cube.obj',
      version: 4,
    });
  });

  it('carries digests and epoch on resyncs', () => {
    const message = encodeChangeEvent({
      type: 'resync_all',
      epoch: 'e1',
      files: [{ name: 'a.obj', mtime: 5, size: 1, version: 2, contentDigest: 'abc' }],
    });
    expect(message).toEqual({
      type: 'resync_all',
      epoch: 'e1',
      files: [{ name: 'a.obj', mtime: 5, size: 1, version: 2, contentDigest: 'abc' }],
    });
  });
});

describe('decodeServerMessage', () => {
  it('parses an encoded message back', () => {
    const frame = serializeMessage({ type: 'removed', name: 'cube.obj', version: 2 });
    expect(decodeServerMessage(frame)).toEqual({
      ok: true,
      message: { type: 'removed', name: 'cube.obj', version: 2 },
    });
  });

  it('accepts an empty resync', () => {
    const result = decodeServerMessage('{"type":"resync_all","epoch":"e1","files":[]}');
    expect(result.ok).toBe(true);
  });

  it('reports invalid JSON', () => {
    expect(decodeServerMessage('{nope')).toEqual({ ok: false, error: 'Message is not valid JSON' });
  });

  it('rejects a non-positive version', () => {
    const result = decodeServerMessage('{"type":"removed","name":"a.obj","version":0}');
    expect(result.ok).toBe(false);
  });
});

describe('decodeClientMessage', () => {
  it('accepts ping and quit', () => {
    expect(decodeClientMessage('{"type":"ping"}')).toEqual({ ok: true, message: { type: 'ping' } });
    expect(decodeClientMessage('{"type":"quit"}')).toEqual({ ok: true, message: { type: 'quit' } });
  });

  it('rejects unknown message types', () => {
    const result = decodeClientMessage('{"type":"subscribe"}');
    expect(result.ok).toBe(false);
  });
});
