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

// Checks that run before any tool is processed

import { constants } from 'node:fs';
import { access, mkdir } from 'node:fs/promises';
import { resolve } from 'node:path';
import { PrefixNotWritableError } from './errors.js';
import { detectPlatform, type HostIdentity } from './platform-detector.js';
import { pathDirectories } from './process.js';
import type { Platform } from './install-types.js';
import type { RunConfig } from './run-config.js';

/**
 * Create the prefix if needed and require write access to it.
 */
export async function ensurePrefixWritable(prefix: string): Promise<void> {
  try {
    await mkdir(prefix, { recursive: true });
    await access(prefix, constants.W_OK);
  } catch (error) {
    throw new PrefixNotWritableError(prefix, error);
  }
}

export function isPrefixOnPath(prefix: string, pathValue: string | undefined = process.env.PATH): boolean {
  const target = resolve(prefix);
  return pathDirectories(pathValue).some((dir) => resolve(dir) === target);
}

/**
 * Detect the platform and check the install prefix. Dry-run never touches the prefix.
 */
export async function runPreflight(config: RunConfig, host?: HostIdentity): Promise<Platform> {
  const platform = detectPlatform(host);
  if (!config.dryRun) {
    await ensurePrefixWritable(config.prefix);
  }
  return platform;
}
