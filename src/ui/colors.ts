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

// Color palette and TTY detection

import pc from 'picocolors';
import type { InstallOutcome } from '../lib/install-types.js';
import type { ColorFn } from './types.js';

// When stdout is not a TTY (piped), all color functions become identity
export const isTTY = process.stdout.isTTY;

function c(fn: (s: string) => string): ColorFn {
  return (s: string) => (isTTY ? fn(s) : s);
}

export const green = c(pc.green);
export const red = c(pc.red);
export const yellow = c(pc.yellow);
export const cyan = c(pc.cyan);
export const bold = c(pc.bold);
export const dim = c(pc.dim);
export const magenta = c(pc.magenta);

export const OUTCOME_COLORS: Record<InstallOutcome, ColorFn> = {
  'installed': green,
  'updated': green,
  'skipped-up-to-date': dim,
  'skipped-not-installed': yellow,
  'failed': red,
};

export const OUTCOME_ICONS: Record<InstallOutcome, string> = {
  'installed': '✓',
  'updated': '↑',
  'skipped-up-to-date': '=',
  'skipped-not-installed': '⏭',
  'failed': '✗',
};

export const OUTCOME_LABELS: Record<InstallOutcome, string> = {
  'installed': 'installed',
  'updated': 'updated',
  'skipped-up-to-date': 'up to date',
  'skipped-not-installed': 'not installed, skipped',
  'failed': 'failed',
};
