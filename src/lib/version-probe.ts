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

// Installed-version detection for the supported tools

import { findExecutable, pathDirectories, spawnProcess } from './process.js';
import { TOOL_SPECS } from './tools.js';
import logger from './logger.js';
import { errorMessage } from './errors.js';
import type { ToolName } from './install-types.js';

// Limit backtracking to max 20 chars per segment
const GENERIC_VERSION_REGEX = /\d{1,20}\.\d{1,20}(?:\.\d{1,20})?/;

/**
 * Pull a version token out of a version banner: the tool-specific pattern
 * first, then the first MAJOR.MINOR[.PATCH] anywhere in the text.
 */
export function extractVersion(output: string, pattern?: RegExp): string | null {
  if (pattern) {
    const match = pattern.exec(output);
    if (match?.[1]) {
      return match[1];
    }
  }
  const generic = GENERIC_VERSION_REGEX.exec(output);
  return generic ? generic[0] : null;
}

export interface VersionSource {
  currentVersion(tool: ToolName): Promise<string | null>;
}

export class VersionProbe implements VersionSource {
  /**
   * @param searchDirs - directories searched before PATH, normally the install prefix
   */
  constructor(private readonly searchDirs: readonly string[] = []) {}

  async locate(tool: ToolName): Promise<string | null> {
    return findExecutable(tool, [...this.searchDirs, ...pathDirectories()]);
  }

  async currentVersion(tool: ToolName): Promise<string | null> {
    const executable = await this.locate(tool);
    if (!executable) {
      logger.debug(`${tool}: not installed`);
      return null;
    }

    const spec = TOOL_SPECS[tool];
    const firstLine = await this.readFirstLine(executable, spec.versionArgs);
    const version = extractVersion(firstLine, spec.versionPattern);
    logger.debug(`${tool}: ${executable} reports '${firstLine}' -> ${version ?? 'no version'}`);
    return version;
  }

  private async readFirstLine(executable: string, args: readonly string[]): Promise<string> {
    try {
      const result = await spawnProcess(executable, args, { stdout: 'pipe', stderr: 'ignore' });
      if (result.exitCode !== 0) {
        logger.debug(`${executable} ${args.join(' ')} exited with ${result.exitCode}`);
        return '';
      }
      return result.stdout.split('\n')[0] ?? '';
    } catch (error) {
      logger.debug(`Failed to run ${executable}: ${errorMessage(error)}`);
      return '';
    }
  }
}
