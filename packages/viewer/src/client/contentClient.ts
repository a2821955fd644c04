/**
 * HTTP client for the file server
 *
 * Thin wrapper around undici for the read endpoints:
 * GET /api/files, GET /content/{name} and GET /health/ready.
 */

import { request } from 'undici';
import {
  fileListResponseSchema,
  readinessResponseSchema,
  MeshWatchError,
  NotFoundError,
  ProtocolError,
  type FileListResponse,
  type ReadinessResponse,
} from '@meshwatch/core';
import { isObject, isString } from '@meshwatch/utils';

export class ContentClient {
  private readonly baseUrl: string;

  constructor(baseUrl: string) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  /**
   * Raw bytes of one file. Rejects with NotFoundError on 404.
   */
  async fetchContent(name: string, signal?: AbortSignal): Promise<Uint8Array> {
    const { statusCode, body } = await request(
      `${this.baseUrl}/content/${encodeURIComponent(name)}`,
      { method: 'GET', signal }
    );

    if (statusCode === 404) {
      await body.dump();
      throw new NotFoundError('File', name);
    }
    if (statusCode >= 400) {
      throw await this.toError(statusCode, body);
    }

    return new Uint8Array(await body.arrayBuffer());
  }

  async listFiles(): Promise<FileListResponse> {
    const { statusCode, body } = await request(`${this.baseUrl}/api/files`, { method: 'GET' });

    if (statusCode >= 400) {
      throw await this.toError(statusCode, body);
    }

    const result = fileListResponseSchema.safeParse(await body.json());
    if (!result.success) {
      throw new ProtocolError('Unexpected file list response', {
        issues: result.error.issues.map(issue => issue.message),
      });
    }
    return result.data;
  }

  /**
   * Readiness report; a 503 (still starting) is returned, not thrown
   */
  async readiness(): Promise<ReadinessResponse> {
    const { statusCode, body } = await request(`${this.baseUrl}/health/ready`, { method: 'GET' });

    if (statusCode >= 400 && statusCode !== 503) {
      throw await this.toError(statusCode, body);
    }

    const result = readinessResponseSchema.safeParse(await body.json());
    if (!result.success) {
      throw new ProtocolError('Unexpected readiness response', {
        issues: result.error.issues.map(issue => issue.message),
      });
    }
    return result.data;
  }

  get url(): string {
    return this.baseUrl;
  }

  private async toError(
    statusCode: number,
    body: { text(): Promise<string> }
  ): Promise<MeshWatchError> {
    const data = parseJson(await body.text());
    const message = isObject(data) && isString(data['message'])
      ? data['message']
      : `Request failed with status ${statusCode}`;
    return new MeshWatchError(message, 'HTTP_ERROR', statusCode);
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
