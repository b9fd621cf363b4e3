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

/**
 * Central configuration constants for sectools.
 *
 * Paths are computed once at module load time.
 * All files that need these values should import from here.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

// ---------------------------------------------------------------------------
// App name
// ---------------------------------------------------------------------------

export const APP_NAME = 'sectools';

// ---------------------------------------------------------------------------
// Environment variables
// ---------------------------------------------------------------------------

export const ENV_GITHUB_TOKEN = 'GITHUB_TOKEN';
export const ENV_PREFIX = 'SECTOOLS_PREFIX';
export const ENV_CLI_DIR = 'SECTOOLS_DIR';

// ---------------------------------------------------------------------------
// CLI data directory
// ---------------------------------------------------------------------------

/** Root directory for CLI data: ~/.sectools (override via SECTOOLS_DIR) */
export const CLI_DIR = process.env[ENV_CLI_DIR] ?? join(homedir(), '.' + APP_NAME);

// ---------------------------------------------------------------------------
// Logs
// ---------------------------------------------------------------------------

export const LOG_DIR = join(CLI_DIR, 'logs');
export const LOG_FILE = join(LOG_DIR, `${APP_NAME}.log`);

// ---------------------------------------------------------------------------
// Install prefix
// ---------------------------------------------------------------------------

export const DEFAULT_PREFIX = join(homedir(), '.local', 'bin');
export const EXECUTABLE_MODE = 0o755;

// ---------------------------------------------------------------------------
// GitHub
// ---------------------------------------------------------------------------

export const GITHUB_API_BASE = 'https://api.github.com';
export const CHECKSUM_SUFFIX = '.sha256';

// ---------------------------------------------------------------------------
// HTTP
//
// Fixed retry policy shared by metadata requests and downloads.
// ---------------------------------------------------------------------------

export const MAX_RETRY_ATTEMPTS = 3;
export const RETRY_DELAY_MS = 5000;
export const REQUEST_TIMEOUT_MS = 30000;
export const DOWNLOAD_TIMEOUT_MS = 120000;
