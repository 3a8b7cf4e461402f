/**
 * @fileoverview Fetch files operators attached in the operator console
 *
 * @module services/operator-media-source
 * @license MIT
 */

import nodeFetch, { type Response } from 'node-fetch';
import { errorMessage } from '../utils/errors.js';
import type { FetchLike } from './whatsapp-client.js';

export interface OperatorMediaSourceOptions {
  /** Operator backend root, without trailing slash. */
  baseUrl: string;
  timeoutMs?: number;
  fetch?: FetchLike;
}

export class OperatorMediaSource {
  private readonly fetch: FetchLike;

  constructor(private readonly options: OperatorMediaSourceOptions) {
    this.fetch = options.fetch ?? nodeFetch;
  }

  /**
   * Download an operator attachment by file id.
   *
   * @throws {Error} On timeouts and non-2xx responses
   */
  async download(fileId: string, mimeType: string): Promise<Buffer> {
    const url = new URL(`${this.options.baseUrl}/api/v1/get-sent-media`);
    url.searchParams.set('fileId', fileId);
    url.searchParams.set('type', mimeType);

    let response: Response;
    try {
      response = await this.fetch(url.toString(), { method: 'GET', timeout: this.options.timeoutMs ?? 120_000 });
    } catch (error) {
      throw new Error(`Operator media download failed for ${fileId}: ${errorMessage(error)}`);
    }
    if (!response.ok) {
      throw new Error(`Operator media download failed for ${fileId} with status ${response.status}`);
    }
    return response.buffer();
  }
}
