/**
 * Archive downloader
 *
 * Fetches one archive from the upstream mirror into the downloads
 * directory. The body goes to a `.part` file first and is renamed into
 * place once complete.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { FetchError } from '@debpilot/ipc';
import { errorMessage } from './process.js';

export interface ArchiveDownloaderOptions {
  /** Directory URL, ending in a slash */
  mirrorUrl: string;
  downloadDir: string;
  fetchImpl?: typeof fetch;
}

export class ArchiveDownloader {
  private readonly mirrorUrl: string;
  private readonly downloadDir: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: ArchiveDownloaderOptions) {
    this.mirrorUrl = options.mirrorUrl;
    this.downloadDir = options.downloadDir;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  urlFor(fileName: string): string {
    return new URL(`./${fileName}`, this.mirrorUrl).toString();
  }

  /**
   * Download an archive and return its local path
   */
  async download(fileName: string): Promise<string> {
    const url = this.urlFor(fileName);

    let body: Buffer;
    try {
      const response = await this.fetchImpl(url);
      if (!response.ok) {
        throw new FetchError(url, `Unable to retrieve ${url}: HTTP ${response.status}`, {
          statusCode: response.status,
        });
      }
      body = Buffer.from(await response.arrayBuffer());
    } catch (err) {
      if (err instanceof FetchError) throw err;
      throw new FetchError(url, `Unable to retrieve ${url}: ${errorMessage(err)}`, { cause: err });
    }

    const dest = path.join(this.downloadDir, fileName);
    const partial = `${dest}.part`;
    try {
      fs.mkdirSync(this.downloadDir, { recursive: true });
      fs.writeFileSync(partial, body);
      fs.renameSync(partial, dest);
    } catch (err) {
      if (fs.existsSync(partial)) fs.rmSync(partial, { force: true });
      throw new FetchError(url, `Unable to save ${fileName} to ${this.downloadDir}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    return dest;
  }
}
