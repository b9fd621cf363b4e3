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

// sectools [options] [tool...]: install or update the selected tools

import { ActionRunner } from '../lib/actions.js';
import { CommandFailedError } from '../lib/errors.js';
import { ReleaseResolver } from '../lib/github-releases.js';
import { HttpClient } from '../lib/http.js';
import { ArtifactInstaller } from '../lib/installer.js';
import type { BatchSummary, Platform } from '../lib/install-types.js';
import logger, { configureLogger } from '../lib/logger.js';
import { UpdateOrchestrator } from '../lib/orchestrator.js';
import { PipxPackageManager } from '../lib/package-manager.js';
import { isPrefixOnPath, runPreflight } from '../lib/preflight.js';
import { loadRunConfig, type InstallCommandOptions, type RunConfig } from '../lib/run-config.js';
import { VersionProbe } from '../lib/version-probe.js';
import { info, success, summary, warn } from '../ui/index.js';

export function createOrchestrator(config: RunConfig, platform: Platform, http = new HttpClient()): UpdateOrchestrator {
  const actions = new ActionRunner(config.dryRun);
  return new UpdateOrchestrator(
    {
      platform,
      probe: new VersionProbe([config.prefix]),
      releases: new ReleaseResolver(http, config.githubToken),
      installer: new ArtifactInstaller(config.prefix, http, actions),
      packageManager: new PipxPackageManager(actions),
    },
    { updateOnly: config.updateOnly, dryRun: config.dryRun },
  );
}

export async function installCommand(
  toolNames: readonly string[],
  options: InstallCommandOptions,
  env: NodeJS.ProcessEnv = process.env,
): Promise<BatchSummary> {
  const config = loadRunConfig(toolNames, options, env);
  configureLogger(config.verbose ? { level: 'DEBUG', mirrorToStderr: true } : { level: 'INFO' });
  logger.info(`Run: tools=${config.tools.join(',')} prefix=${config.prefix} dryRun=${config.dryRun} updateOnly=${config.updateOnly}`);

  const platform = await runPreflight(config);
  info(`Platform: ${platform.os}-${platform.arch}`);

  if (!isPrefixOnPath(config.prefix, env.PATH)) {
    warn(`Add ${config.prefix} to your PATH: export PATH="$PATH:${config.prefix}"`);
  }
  if (config.dryRun) {
    info('Dry-run: no changes will be made');
  }
  if (!config.githubToken) {
    logger.debug('GITHUB_TOKEN not set; using unauthenticated GitHub API requests');
  }

  const result = await createOrchestrator(config, platform).runBatch(config.tools);
  summary(result.results, { dryRun: config.dryRun });

  if (result.failures.length > 0) {
    throw new CommandFailedError(`Completed with failures: ${result.failures.join(' ')}`);
  }

  success('All done.');
  return result;
}
