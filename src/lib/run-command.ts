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

import logger from './logger.js';
import { errorMessage } from './errors.js';
import { error } from '../ui/index.js';

/**
 * Run a command action and exit: 0 on success, 1 on any error.
 */
export async function runCommand(fn: () => Promise<unknown>): Promise<void> {
  try {
    await fn();
    process.exit(0);
  } catch (err) {
    error(errorMessage(err));
    logger.error(errorMessage(err));
    process.exit(1);
  }
}
