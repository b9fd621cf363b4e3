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

// Archive extraction and binary lookup

import { mkdir, readdir, lstat, stat } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { extract as tarExtract } from 'tar';
import { BinaryNotFoundError, InstallError } from './errors.js';
import { requireCommand, spawnProcess } from './process.js';
import logger from './logger.js';

const OWNER_EXECUTE = 0o100;
const ANY_EXECUTE = 0o111;

export interface ExtractOptions {
  archivePath: string;
  destination: string;
}

export async function extractTarGz(options: ExtractOptions): Promise<void> {
  const { archivePath, destination } = options;

  await mkdir(destination, { recursive: true });
  await tarExtract({
    file: archivePath,
    cwd: destination,
  });
}

/**
 * Zip archives go through the system unzip, which keeps the permission bits
 * that the lookup below relies on.
 */
export async function extractZip(options: ExtractOptions): Promise<void> {
  const { archivePath, destination } = options;

  const unzip = await requireCommand('unzip');
  await mkdir(destination, { recursive: true });

  const result = await spawnProcess(unzip, ['-q', '-o', archivePath, '-d', destination]);
  if (result.exitCode !== 0) {
    throw new InstallError(`unzip exited with code ${result.exitCode ?? 'unknown'}: ${result.stderr}`);
  }
}

async function listEntries(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));

  const paths: string[] = [];
  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      paths.push(...(await listEntries(fullPath)));
    } else {
      paths.push(fullPath);
    }
  }
  return paths;
}

async function isOwnerExecutableRegularFile(path: string): Promise<boolean> {
  const stats = await lstat(path);
  return stats.isFile() && (stats.mode & OWNER_EXECUTE) !== 0;
}

async function isExecutableTarget(path: string): Promise<boolean> {
  try {
    const stats = await stat(path);
    return stats.isFile() && (stats.mode & ANY_EXECUTE) !== 0;
  } catch {
    // Dangling symlink
    return false;
  }
}

export interface FindBinaryOptions {
  /** Also consider symlinks and group/other execute bits (gzip archives only) */
  fallback: boolean;
  archiveKind: string;
}

/**
 * Locate the extracted executable named exactly like the tool.
 *
 * The primary pass takes a regular file with the owner execute bit. The
 * fallback pass scans every executable entry, following symlinks, for the
 * same file name.
 */
export async function findToolBinary(
  dir: string,
  tool: string,
  options: FindBinaryOptions
): Promise<string> {
  const entries = await listEntries(dir);
  const named = entries.filter((entry) => basename(entry) === tool);

  for (const candidate of named) {
    if (await isOwnerExecutableRegularFile(candidate)) {
      return candidate;
    }
  }

  if (options.fallback) {
    for (const candidate of named) {
      if (await isExecutableTarget(candidate)) {
        logger.debug(`Found ${tool} through fallback lookup: ${candidate}`);
        return candidate;
      }
    }
  }

  throw new BinaryNotFoundError(tool, options.archiveKind);
}
