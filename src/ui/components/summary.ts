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

// End-of-run summary, one line per tool

import { bold, dim, OUTCOME_COLORS, OUTCOME_ICONS, OUTCOME_LABELS } from '../colors.js';
import { isMockActive, recordCall } from '../mock.js';
import type { ToolResult } from '../../lib/install-types.js';
import type { SummaryOptions } from '../types.js';

export function formatResult(result: ToolResult, dryRun = false): string {
  const label = OUTCOME_LABELS[result.outcome];
  const version = result.installedVersion ?? result.latestTag;
  const details: string[] = [];

  if (result.outcome === 'failed' && result.error) {
    details.push(result.error.message);
  } else if (version && result.outcome !== 'skipped-not-installed') {
    details.push(version);
  }
  if (result.via === 'package-manager') {
    details.push('via pipx');
  }
  if (result.checksum === 'verified') {
    details.push('checksum verified');
  } else if (result.checksum === 'no-hasher') {
    details.push('checksum not checked');
  }
  if (dryRun && (result.outcome === 'installed' || result.outcome === 'updated')) {
    details.push('dry-run');
  }

  const suffix = details.length > 0 ? ` (${details.join(', ')})` : '';
  return `${result.tool}: ${label}${suffix}`;
}

export function summary(results: readonly ToolResult[], opts: SummaryOptions = {}): void {
  const title = opts.title ?? 'Summary';
  if (isMockActive()) { recordCall('summary', title, results); return; }

  process.stdout.write(`\n  ${bold(title)}\n`);
  for (const result of results) {
    const colorFn = OUTCOME_COLORS[result.outcome];
    const line = formatResult(result, opts.dryRun);
    process.stdout.write(`    ${colorFn(OUTCOME_ICONS[result.outcome])}  ${line}\n`);
  }
  if (results.length === 0) {
    process.stdout.write(`    ${dim('nothing to do')}\n`);
  }
  process.stdout.write('\n');
}
