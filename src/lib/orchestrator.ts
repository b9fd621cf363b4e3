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

// Per-tool update flow and batch aggregation

import { errorMessage, InstallVerificationError, NoMatchingAssetError } from './errors.js';
import { isUpToDate, type ReleaseSource } from './github-releases.js';
import type { ArtifactSink } from './installer.js';
import type { BatchSummary, Platform, ToolName, ToolResult } from './install-types.js';
import type { PackageManager } from './package-manager.js';
import { TOOL_SPECS } from './tools.js';
import type { VersionSource } from './version-probe.js';
import logger from './logger.js';
import { error, info, success, warn } from '../ui/index.js';

export type ToolState =
  | 'probed'
  | 'resolved'
  | 'skip-up-to-date'
  | 'skip-not-installed'
  | 'installing'
  | 'verified'
  | 'failed';

export interface OrchestratorDeps {
  platform: Platform;
  probe: VersionSource;
  releases: ReleaseSource;
  installer: ArtifactSink;
  packageManager: PackageManager;
}

export interface OrchestratorOptions {
  updateOnly: boolean;
  dryRun: boolean;
}

function transition(tool: ToolName, state: ToolState): void {
  logger.debug(`${tool}: -> ${state}`);
}

export class UpdateOrchestrator {
  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly options: OrchestratorOptions,
  ) {}

  /**
   * Process tools strictly one after another. A failing tool is recorded and
   * the batch moves on.
   */
  async runBatch(tools: readonly ToolName[]): Promise<BatchSummary> {
    const results: ToolResult[] = [];
    for (const tool of tools) {
      results.push(await this.processTool(tool));
    }
    const failures = results.filter((r) => r.outcome === 'failed').map((r) => r.tool);
    return { results, failures };
  }

  async processTool(tool: ToolName): Promise<ToolResult> {
    info(`Processing: ${tool}`);
    let previousVersion: string | null = null;
    let latestTag: string | undefined;

    try {
      previousVersion = await this.deps.probe.currentVersion(tool);
      latestTag = await this.deps.releases.latestTag(TOOL_SPECS[tool].repo);
      transition(tool, 'probed');
      logger.info(`${tool} current_version='${previousVersion ?? 'none'}' latest_tag='${latestTag}'`);

      if (previousVersion !== null && isUpToDate(previousVersion, latestTag)) {
        transition(tool, 'skip-up-to-date');
        success(`${tool} is up to date (${previousVersion})`);
        return { tool, outcome: 'skipped-up-to-date', previousVersion, latestTag };
      }

      if (previousVersion === null && this.options.updateOnly) {
        transition(tool, 'skip-not-installed');
        warn(`${tool} not installed; update-only set. Skipping.`);
        return { tool, outcome: 'skipped-not-installed', previousVersion, latestTag };
      }

      return await this.installLatest(tool, previousVersion, latestTag);
    } catch (err) {
      transition(tool, 'failed');
      const failure = err instanceof Error ? err : new Error(errorMessage(err));
      logger.error(`Failed to process ${tool}: ${failure.message}`);
      error(`${tool}: ${failure.message}`);
      return { tool, outcome: 'failed', previousVersion, latestTag, error: failure };
    }
  }

  private async installLatest(
    tool: ToolName,
    previousVersion: string | null,
    latestTag: string
  ): Promise<ToolResult> {
    const outcome = previousVersion === null ? 'installed' : 'updated';
    const spec = TOOL_SPECS[tool];

    const asset = await this.deps.releases.resolve(tool, this.deps.platform);
    if (!asset) {
      if (!spec.packageFallback) {
        throw new NoMatchingAssetError(tool, this.deps.platform);
      }
      warn(`No binary asset found for ${tool}; falling back to pipx.`);
      await this.deps.packageManager.installOrUpgrade(spec.packageFallback);
      return { tool, outcome, previousVersion, latestTag, via: 'package-manager' };
    }
    transition(tool, 'resolved');

    transition(tool, 'installing');
    info(`Installing ${tool} ${latestTag} from ${asset.name}`);
    const report = await this.deps.installer.install(asset, tool);

    if (this.options.dryRun) {
      return { tool, outcome, previousVersion, latestTag, checksum: report.checksum, via: 'release-asset' };
    }

    const installedVersion = await this.deps.probe.currentVersion(tool);
    if (installedVersion === null) {
      throw new InstallVerificationError(tool);
    }
    transition(tool, 'verified');
    success(`${tool} ${outcome} to version ${installedVersion}`);

    return {
      tool,
      outcome,
      previousVersion,
      latestTag,
      installedVersion,
      checksum: report.checksum,
      via: 'release-asset',
    };
  }
}
