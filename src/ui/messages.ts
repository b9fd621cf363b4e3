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

// Inline terminal output: non-interactive, static messages

import { cyan, yellow, red, green, magenta } from './colors.js';
import { isMockActive, recordCall } from './mock.js';

function write(stream: NodeJS.WriteStream, line: string): void {
  stream.write(line + '\n');
}

export function info(message: string): void {
  if (isMockActive()) {
    recordCall('info', message);
    return;
  }
  write(process.stdout, `  ${cyan('ℹ')}  ${message}`);
}

export function success(message: string): void {
  if (isMockActive()) {
    recordCall('success', message);
    return;
  }
  write(process.stdout, `  ${green('✓')}  ${message}`);
}

export function warn(message: string): void {
  if (isMockActive()) {
    recordCall('warn', message);
    return;
  }
  write(process.stderr, `  ${yellow('⚠')}  ${message}`);
}

export function error(message: string): void {
  if (isMockActive()) {
    recordCall('error', message);
    return;
  }
  write(process.stderr, `  ${red('✗')}  ${message}`);
}

// A mutating action that dry-run replaced with its description
export function dryRunNotice(description: string): void {
  if (isMockActive()) {
    recordCall('dryRun', description);
    return;
  }
  write(process.stdout, `${magenta('[DRY-RUN]')} ${description}`);
}
