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

// Run configuration, built once at startup and passed to every component

import { DEFAULT_PREFIX, ENV_GITHUB_TOKEN, ENV_PREFIX } from './config-constants.js';
import { parseToolNames } from './tools.js';
import type { ToolName } from './install-types.js';

export interface InstallCommandOptions {
  dryRun?: boolean;
  updateOnly?: boolean;
  verbose?: boolean;
}

export interface RunConfig {
  readonly dryRun: boolean;
  readonly updateOnly: boolean;
  readonly verbose: boolean;
  readonly prefix: string;
  readonly githubToken?: string;
  readonly tools: readonly ToolName[];
}

export function loadRunConfig(
  toolNames: readonly string[],
  options: InstallCommandOptions,
  env: NodeJS.ProcessEnv = process.env
): RunConfig {
  const token = env[ENV_GITHUB_TOKEN];
  const prefix = env[ENV_PREFIX];
  return {
    dryRun: options.dryRun ?? false,
    updateOnly: options.updateOnly ?? false,
    verbose: options.verbose ?? false,
    prefix: prefix ? prefix : DEFAULT_PREFIX,
    githubToken: token ? token : undefined,
    tools: parseToolNames(toolNames),
  };
}
