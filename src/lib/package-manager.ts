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

// pipx fallback for tools without a platform binary

import type { ActionRunner } from './actions.js';
import { PackageManagerError } from './errors.js';
import { requireCommand, spawnProcess } from './process.js';
import logger from './logger.js';

export type PackageAction = 'installed' | 'upgraded';

export interface PackageManager {
  /** Returns what happened, or null under dry-run */
  installOrUpgrade(name: string): Promise<PackageAction | null>;
}

export class PipxPackageManager implements PackageManager {
  constructor(private readonly actions: ActionRunner) {}

  async installOrUpgrade(name: string): Promise<PackageAction | null> {
    if (this.actions.dryRun) {
      await this.actions.run(`pipx install ${name} || pipx upgrade ${name}`, async () => undefined);
      return null;
    }

    const pipx = await requireCommand('pipx');
    const installed = await this.isInstalled(pipx, name);
    const subcommand = installed ? 'upgrade' : 'install';

    logger.info(`Running pipx ${subcommand} ${name}`);
    const result = await spawnProcess(pipx, [subcommand, name]);
    if (result.exitCode !== 0) {
      throw new PackageManagerError(`pipx ${subcommand} ${name}`, result.exitCode, result.stderr);
    }
    return installed ? 'upgraded' : 'installed';
  }

  private async isInstalled(pipx: string, name: string): Promise<boolean> {
    const result = await spawnProcess(pipx, ['list', '--short']);
    if (result.exitCode !== 0) {
      throw new PackageManagerError('pipx list --short', result.exitCode, result.stderr);
    }
    // One "<package> <version>" per line
    return result.stdout.split('\n').some((line) => line.trim().split(/\s+/)[0] === name);
  }
}
