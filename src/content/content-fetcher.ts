/**
 * Content Fetcher
 *
 * Downloads the shortest content file of a resolved product whose key
 * matches a pattern. Bytes are written verbatim.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { getHTTPClient, type Transport } from '../core/http-client.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import type { ResolvedProduct } from '../models/product.js';

export interface ContentBytes {
  readonly data: Uint8Array;
  readonly url: string;
  readonly fileName: string;
}

export interface ContentFetcherOptions {
  readonly transport?: Transport;
  readonly logger?: Logger;
}

export class ContentFetcher {
  private readonly transport: Transport;
  private readonly logger: Logger;

  constructor(options: ContentFetcherOptions = {}) {
    this.transport = options.transport ?? getHTTPClient();
    this.logger = options.logger ?? createLogger({ module: 'content' });
  }

  /**
   * @throws {ContentNotFoundError} When no content key matches
   * @throws {ConnectionError} When the download fails
   */
  async getContentBytes(
    product: ResolvedProduct,
    pattern: string,
    options: { readonly signal?: AbortSignal } = {}
  ): Promise<ContentBytes> {
    const match = product.requireContent(pattern);
    this.logger.debug('Downloading content', { product: product.type, file: match.fileName, url: match.url });
    const data = await this.transport.fetchBytes(match.url, { signal: options.signal });
    return { data, url: match.url, fileName: match.fileName };
  }

  /**
   * Download matching content to `filePath`, creating parent directories
   *
   * @returns The URL the content came from
   */
  async downloadContent(
    product: ResolvedProduct,
    pattern: string,
    filePath: string,
    options: { readonly signal?: AbortSignal } = {}
  ): Promise<string> {
    const { data, url } = await this.getContentBytes(product, pattern, options);
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, data);
    this.logger.info('Wrote content', { file: filePath, bytes: data.byteLength });
    return url;
  }
}
