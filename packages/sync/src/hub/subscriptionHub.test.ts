import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { ChangeEvent, FileEntry, ResyncAllEvent, ServerMessage } from '@meshwatch/core';
import { logger } from '@meshwatch/utils';
import { SubscriptionHub, type ConnectionTransport, type SnapshotSource } from './subscriptionHub.js';

class FakeTransport implements ConnectionTransport {
  frames: string[] = [];
  closed: { code: number; reason: string } | null = null;
  // When set, sends stay pending until release() is called
  hold = false;
  fail = false;
  private waiting: Array<() => void> = [];

  send(data: string): Promise<void> {
    if (this.fail) {
      return Promise.reject(new Error('socket hang up'));
    }
    this.frames.push(data);
    if (!this.hold) {
      return Promise.resolve();
    }
    return new Promise(resolve => this.waiting.push(resolve));
  }

  close(code: number, reason: string): void {
    this.closed = { code, reason };
  }

  release(): void {
    this.hold = false;
    const waiting = this.waiting;
    this.waiting = [];
    waiting.forEach(resolve => resolve());
  }

  messages(): ServerMessage[] {
    return this.frames.map(frame => JSON.parse(frame) as ServerMessage);
  }
}

class FakeSource implements SnapshotSource {
  ready = true;
  files: FileEntry[] = [];
  resyncEvent(): ResyncAllEvent {
    return { type: 'resync_all', epoch: 'e1', files: this.files.map(file => ({ ...file })) };
  }
}

const settle = () => new Promise(resolve => setImmediate(resolve));

const modified = (name: string, version: number): ChangeEvent => ({
  type: 'modified',
  entry: { name, mtime: version, size: 1, version },
});

describe('SubscriptionHub', () => {
  let source: FakeSource;
  let hub: SubscriptionHub;

  beforeEach(() => {
    source = new FakeSource();
    hub = new SubscriptionHub({ source, queueCapacity: 3, logger });
  });

  it('sends a resync first and marks the connection connected', async () => {
    source.files = [{ name: 'cube.obj', mtime: 10, size: 4, version: 1 }];
    const transport = new FakeTransport();
    const connection = hub.connect(transport);
    expect(connection.state).toBe('connecting');

    await settle();
    expect(transport.messages()).toEqual([
      { type: 'resync_all', epoch: 'e1', files: [{ name: 'cube.obj', mtime: 10, size: 4, version: 1 }] },
    ]);
    expect(connection.state).toBe('connected');
  });

  it('holds a connection made during the initial scan until the baseline is published', async () => {
    source.ready = false;
    const transport = new FakeTransport();
    const connection = hub.connect(transport);

    await settle();
    expect(transport.frames).toEqual([]);
    expect(connection.state).toBe('connecting');

    source.ready = true;
    source.files = [{ name: 'cube.obj', mtime: 10, size: 4, version: 1 }];
    hub.publish(source.resyncEvent());
    await settle();

    expect(transport.messages()).toEqual([
      { type: 'resync_all', epoch: 'e1', files: [{ name: 'cube.obj', mtime: 10, size: 4, version: 1 }] },
    ]);
    expect(connection.state).toBe('connected');
  });

  it('delivers published events in order per connection', async () => {
    const a = new FakeTransport();
    const b = new FakeTransport();
    hub.connect(a);
    hub.connect(b);

    hub.publish(modified('x.obj', 2));
    hub.publish({ type: 'removed', name: 'x.obj', version: 3 });
    await settle();

    for (const transport of [a, b]) {
      expect(transport.messages().map(message => message.type)).toEqual(['resync_all', 'modified', 'removed']);
    }
  });

  it('replaces a backed-up queue with a single resync', async () => {
    const slow = new FakeTransport();
    slow.hold = true;
    const connection = hub.connect(slow);

    // The initial resync is in flight; these fill the queue of three
    hub.publish(modified('a.obj', 1));
    hub.publish(modified('a.obj', 2));
    hub.publish(modified('a.obj', 3));
    expect(connection.queue).toHaveLength(3);

    source.files = [{ name: 'a.obj', mtime: 4, size: 1, version: 4 }];
    hub.publish(modified('a.obj', 4));
    expect(connection.queue).toHaveLength(1);
    expect(connection.overflows).toBe(1);

    slow.release();
    await settle();
    expect(slow.messages()).toEqual([
      { type: 'resync_all', epoch: 'e1', files: [] },
      { type: 'resync_all', epoch: 'e1', files: [{ name: 'a.obj', mtime: 4, size: 1, version: 4 }] },
    ]);
  });

  it('does not let one slow client hold back another', async () => {
    const slow = new FakeTransport();
    slow.hold = true;
    const fast = new FakeTransport();
    hub.connect(slow);
    hub.connect(fast);

    hub.publish(modified('a.obj', 1));
    await settle();

    expect(fast.messages().map(message => message.type)).toEqual(['resync_all', 'modified']);
    expect(slow.frames).toHaveLength(1);
  });

  it('drops a client whose send fails', async () => {
    const broken = new FakeTransport();
    broken.fail = true;
    const connection = hub.connect(broken);
    await settle();

    expect(connection.state).toBe('disconnected');
    expect(hub.size).toBe(0);
    expect(broken.closed?.code).toBe(1001);
  });

  it('forgets a client whose transport closed', () => {
    const transport = new FakeTransport();
    const connection = hub.connect(transport);
    hub.handleTransportClosed(connection);
    expect(connection.state).toBe('disconnected');
    expect(hub.get(connection.id)).toBeUndefined();

    hub.publish(modified('a.obj', 1));
    expect(connection.queue).toEqual([]);
  });

  it('answers malformed frames with an error message', async () => {
    const transport = new FakeTransport();
    const connection = hub.connect(transport);
    hub.handleClientMessage(connection, 'not json');
    await settle();
    expect(transport.messages()[1]).toEqual({ type: 'error', message: 'Message is not valid JSON' });
  });

  it('updates liveness on ping', () => {
    const transport = new FakeTransport();
    const connection = hub.connect(transport);
    connection.lastSeen = 0;
    hub.handleClientMessage(connection, '{"type":"ping"}');
    expect(connection.lastSeen).toBeGreaterThan(0);
  });

  it('calls onQuit when a client asks to shut down', () => {
    const onQuit = vi.fn();
    const quitHub = new SubscriptionHub({ source, onQuit, logger });
    const connection = quitHub.connect(new FakeTransport());
    quitHub.handleClientMessage(connection, '{"type":"quit"}');
    expect(onQuit).toHaveBeenCalledWith(connection);
  });

  it('refuses quit when no handler is configured', async () => {
    const transport = new FakeTransport();
    const connection = hub.connect(transport);
    hub.handleClientMessage(connection, '{"type":"quit"}');
    await settle();
    expect(transport.messages()[1]).toEqual({ type: 'error', message: 'Remote quit is disabled' });
  });

  it('drains every connection and turns new ones away', () => {
    const transport = new FakeTransport();
    const connection = hub.connect(transport);
    hub.drain('bye');

    expect(connection.state).toBe('draining');
    expect(transport.closed).toEqual({ code: 1001, reason: 'bye' });
    expect(hub.size).toBe(0);

    const late = new FakeTransport();
    const refused = hub.connect(late);
    expect(refused.state).toBe('draining');
    expect(late.closed?.code).toBe(1001);
    expect(late.frames).toEqual([]);
  });

  it('sweeps connections that went silent', () => {
    const quiet = new FakeTransport();
    const chatty = new FakeTransport();
    const quietConnection = hub.connect(quiet);
    const chattyConnection = hub.connect(chatty);
    quietConnection.lastSeen = 1000;
    chattyConnection.lastSeen = 50_000;

    expect(hub.sweepIdle(30_000, 60_000)).toEqual([quietConnection.id]);
    expect(quiet.closed).toEqual({ code: 4000, reason: 'Idle timeout' });
    expect(chatty.closed).toBeNull();
    expect(hub.size).toBe(1);
  });

  it('reports per-connection stats', async () => {
    hub.connect(new FakeTransport(), '127.0.0.1');
    await settle();
    const stats = hub.stats();
    expect(stats.connections).toBe(1);
    expect(stats.details[0]).toMatchObject({ state: 'connected', queued: 0, sent: 1, remoteAddress: '127.0.0.1' });
  });
});
