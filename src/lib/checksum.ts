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

// SHA-256 verification against a published <asset>.sha256 file

import { createHash, getHashes } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { ChecksumMismatchError } from './errors.js';
import { CHECKSUM_SUFFIX } from './config-constants.js';
import type { HttpClient } from './http.js';
import type { ChecksumStatus } from './install-types.js';
import logger from './logger.js';

const ALGORITHM = 'sha256';

export function hasSha256(): boolean {
  return getHashes().includes(ALGORITHM);
}

export async function sha256File(path: string): Promise<string> {
  const hash = createHash(ALGORITHM);
  for await (const chunk of createReadStream(path)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

/**
 * The digest is the first whitespace-delimited token ("<hex>  <filename>" or just "<hex>").
 */
export function parseChecksum(content: string): string | null {
  const token = content.trim().split(/\s+/)[0];
  return token ? token.toLowerCase() : null;
}

/**
 * Verify file against the checksum published next to assetUrl.
 *
 * Two distinct "not verified" outcomes are reported: the host cannot compute
 * SHA-256 ('no-hasher', warned), or upstream publishes nothing ('not-published').
 */
export async function verifyChecksum(
  http: HttpClient,
  file: string,
  assetUrl: string
): Promise<ChecksumStatus> {
  if (!hasSha256()) {
    logger.warn('No sha256 implementation available; skipping checksum.');
    return 'no-hasher';
  }

  const checksumUrl = assetUrl + CHECKSUM_SUFFIX;
  const content = await http.getOptionalText(checksumUrl);
  if (content === null) {
    logger.debug(`No checksum found at ${checksumUrl}; skipping.`);
    return 'not-published';
  }

  // A published but empty checksum file never matches
  const expected = parseChecksum(content) ?? '';
  const actual = await sha256File(file);
  if (actual !== expected) {
    throw new ChecksumMismatchError(file, expected, actual);
  }

  logger.info(`Checksum verified for ${file}`);
  return 'verified';
}
