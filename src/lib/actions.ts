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

// Mutating actions, replaced by a printed description under dry-run

import { dryRunNotice } from '../ui/index.js';
import logger from './logger.js';

export class ActionRunner {
  constructor(readonly dryRun: boolean) {}

  /**
   * Run action, or only print description when dry-run is on.
   * Returns the action's result, or undefined when it was skipped.
   */
  async run<T>(description: string, action: () => Promise<T>): Promise<T | undefined> {
    if (this.dryRun) {
      dryRunNotice(description);
      return undefined;
    }
    logger.debug(description);
    return action();
  }
}
