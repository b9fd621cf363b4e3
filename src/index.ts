#!/usr/bin/env node

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

// Main CLI entry point

import { Command } from 'commander';
import { installCommand } from './commands/install.js';
import { runCommand } from './lib/run-command.js';
import type { InstallCommandOptions } from './lib/run-config.js';
import logger from './lib/logger.js';
import { DEFAULT_TOOLS } from './lib/tools.js';
import { VERSION } from './version.js';

const program = new Command();

program
  .name('sectools')
  .description(`Install or update security tools: ${DEFAULT_TOOLS.join(', ')}`)
  .version(VERSION, '-V, --version', 'display version for command')
  .helpOption('-h, --help', 'show help and exit')
  .argument('[tools...]', 'tools to process (default: all)')
  .option('-d, --dry-run', 'print actions without executing them')
  .option('-u, --update-only', 'do not install missing tools')
  .option('-v, --verbose', 'verbose logging')
  .addHelpText(
    'after',
    `
Environment:
  GITHUB_TOKEN      raises the GitHub API rate limit
  SECTOOLS_PREFIX   install directory (default: ~/.local/bin)
  SECTOOLS_DIR      log directory root (default: ~/.sectools)
  LOG_LEVEL         DEBUG, INFO, WARN, ERROR or SILENT

Examples:
  $ sectools -v
  $ sectools -u trivy tfsec
  $ sectools -d checkov`
  )
  .action(async (tools: string[], options: InstallCommandOptions) => {
    await runCommand(() => installCommand(tools, options));
  });

program.exitOverride((err) => {
  // --help and --version end up here as well
  if (err.exitCode === 0) {
    process.exit(0);
  }
  logger.error('Error: ' + err.message);
  process.exit(1);
});

await program.parseAsync();
