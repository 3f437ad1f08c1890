import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import type { ILogger } from '../../domain/ports/ILogger.js';
import type {
  ISyncTransport,
  RequestParams,
  TransportResponse,
} from '../../domain/ports/ITransport.js';

/**
 * Synchronous transport answering each request with a recorded response:
 * `<directory>/<last url segment>.json`, e.g. `homestatus.json`.
 */
export class FixtureTransport implements ISyncTransport {
  constructor(
    private readonly directory: string,
    private readonly logger: ILogger
  ) {}

  post(url: string, params?: RequestParams): TransportResponse {
    const endpoint = url.split('/').filter(Boolean).pop() ?? url;
    const path = join(this.directory, `${endpoint}.json`);

    if (!existsSync(path)) {
      this.logger.warn('No fixture for request', { url, path });
      return { status: 404, body: {} };
    }

    this.logger.debug('Serving fixture', { url, path, params });
    const body: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    return { status: 200, body };
  }
}
