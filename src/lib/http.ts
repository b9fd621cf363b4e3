/*
 * SonarQube CLI
 * Copyright (C) 2026 SonarSource Sàrl
 * mailto:info AT sonarsource DOT com
 *
 * This program is free software; you can redistribute it and/or
 * modify it under the terms of the GNU Lesser General Public
 * License as published by the Free Software Foundation; either
 * version 3 of the License, or (at your option) any later version.
 *
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE.  See the GNU
 * Lesser General Public License for more details.
 *
 * You should have received a copy of the GNU Lesser General Public License
 * along with this program; if not, write to the Free Software Foundation,
 * Inc., 51 Franklin Street, Fifth Floor, Boston, MA  02110-1301, USA.
 */

// HTTP fetcher with a fixed retry policy

import { writeFile } from 'node:fs/promises';
import logger from './logger.js';
import { VERSION } from '../version.js';
import { errorMessage } from './errors.js';
import {
  APP_NAME,
  DOWNLOAD_TIMEOUT_MS,
  MAX_RETRY_ATTEMPTS,
  REQUEST_TIMEOUT_MS,
  RETRY_DELAY_MS,
} from './config-constants.js';

export interface RetryPolicy {
  attempts: number;
  delayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: MAX_RETRY_ATTEMPTS,
  delayMs: RETRY_DELAY_MS,
};

export interface RequestOptions {
  headers?: Record<string, string>;
  timeoutMs?: number;
}

const HTTP_FORBIDDEN = 403;
const HTTP_REQUEST_TIMEOUT = 408;
const HTTP_TOO_MANY_REQUESTS = 429;
const HTTP_SERVER_ERROR = 500;

function isTransientStatus(status: number): boolean {
  return (
    status === HTTP_FORBIDDEN ||
    status === HTTP_REQUEST_TIMEOUT ||
    status === HTTP_TOO_MANY_REQUESTS ||
    status >= HTTP_SERVER_ERROR
  );
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export class HttpClient {
  private readonly retry: RetryPolicy;

  constructor(retry: Partial<RetryPolicy> = {}) {
    this.retry = { ...DEFAULT_RETRY_POLICY, ...retry };
  }

  /**
   * GET with retries on network errors and transient statuses.
   * Returns the last response, which may be non-ok; throws the last
   * network error when no response was ever received.
   */
  async get(url: string, options: RequestOptions = {}): Promise<Response> {
    let lastError: unknown = null;
    const { attempts, delayMs } = this.retry;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        logger.debug(`GET ${url} (attempt ${attempt}/${attempts})`);

        const response = await fetch(url, {
          headers: { 'User-Agent': `${APP_NAME}/${VERSION}`, ...options.headers },
          redirect: 'follow',
          signal: AbortSignal.timeout(options.timeoutMs ?? REQUEST_TIMEOUT_MS),
        });

        if (response.ok || !isTransientStatus(response.status) || attempt === attempts) {
          return response;
        }

        if (response.status === HTTP_FORBIDDEN) {
          logger.warn(`GitHub API rate limited. Set GITHUB_TOKEN to raise the limit. Retrying in ${delayMs}ms...`);
        } else {
          logger.debug(`${response.status} ${response.statusText}. Retrying in ${delayMs}ms...`);
        }
        // Release the connection held by the discarded response
        await response.body?.cancel();
      } catch (error) {
        lastError = error;
        if (attempt === attempts) break;
        logger.debug(`Request failed: ${errorMessage(error)}. Retrying in ${delayMs}ms...`);
      }
      await sleep(delayMs);
    }

    throw lastError ?? new Error(`Request failed after ${attempts} attempts`);
  }

  /**
   * GET a document that may not exist. Any non-2xx answer yields null.
   */
  async getOptionalText(url: string, options: RequestOptions = {}): Promise<string | null> {
    const response = await this.get(url, options);
    if (!response.ok) {
      logger.debug(`${url} answered ${response.status}`);
      return null;
    }
    return response.text();
  }

  /**
   * Download url to destinationPath. Returns the number of bytes written.
   */
  async download(url: string, destinationPath: string): Promise<number> {
    logger.debug(`Downloading from: ${url}`);

    const response = await this.get(url, { timeoutMs: DOWNLOAD_TIMEOUT_MS });
    if (!response.ok) {
      throw new Error(`${response.status} ${response.statusText}`);
    }

    const buffer = await response.arrayBuffer();
    await writeFile(destinationPath, Buffer.from(buffer));

    logger.debug(`Downloaded ${buffer.byteLength} bytes`);
    return buffer.byteLength;
  }
}
