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

// Error taxonomy for the installer.
//
// Pre-flight errors abort the whole run. Everything else is scoped to one tool:
// the orchestrator catches it at the batch boundary and records a failure.

import type { Platform } from './install-types.js';

/**
 * Thrown when the user provides invalid or conflicting command options.
 */
export class InvalidOptionError extends Error {
  constructor(reason: string) {
    super(reason);
    this.name = 'InvalidOptionError';
  }
}

/**
 * Thrown when the command (and options if any defined) are valid, but it failed to execute.
 */
export class CommandFailedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CommandFailedError';
  }
}

// ---------------------------------------------------------------------------
// Pre-flight
// ---------------------------------------------------------------------------

export class UnsupportedPlatformError extends Error {
  constructor(
    readonly component: 'os' | 'architecture',
    readonly value: string,
  ) {
    super(`Unsupported ${component}: ${value}`);
    this.name = 'UnsupportedPlatformError';
  }
}

export class PrefixNotWritableError extends Error {
  constructor(readonly prefix: string, cause?: unknown) {
    super(
      `Install prefix '${prefix}' is not writable. Run with sufficient permissions or set SECTOOLS_PREFIX to a writable path.`,
      { cause },
    );
    this.name = 'PrefixNotWritableError';
  }
}

// ---------------------------------------------------------------------------
// Per tool
// ---------------------------------------------------------------------------

export class MetadataFetchError extends Error {
  constructor(readonly repo: string, reason: string, cause?: unknown) {
    super(`Failed to fetch latest release for ${repo}: ${reason}`, { cause });
    this.name = 'MetadataFetchError';
  }
}

export class NoMatchingAssetError extends Error {
  constructor(readonly tool: string, platform: Platform) {
    super(`No release asset for ${tool} matches ${platform.os}-${platform.arch}`);
    this.name = 'NoMatchingAssetError';
  }
}

/**
 * Base class for everything that can go wrong between download and the final copy.
 */
export class InstallError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InstallError';
  }
}

export class DownloadError extends InstallError {
  constructor(readonly url: string, reason: string, cause?: unknown) {
    super(`Download failed for ${url}: ${reason}`, { cause });
    this.name = 'DownloadError';
  }
}

export class ChecksumMismatchError extends InstallError {
  constructor(
    readonly file: string,
    readonly expected: string,
    readonly actual: string,
  ) {
    super(`Checksum mismatch for ${file}. Expected: ${expected || '(empty checksum file)'}, got: ${actual}`);
    this.name = 'ChecksumMismatchError';
  }
}

export class BinaryNotFoundError extends InstallError {
  constructor(readonly tool: string, archiveKind: string) {
    super(`Binary '${tool}' not found in ${archiveKind}`);
    this.name = 'BinaryNotFoundError';
  }
}

export class MissingDependencyError extends InstallError {
  constructor(readonly command: string) {
    super(`${command} is required but not installed`);
    this.name = 'MissingDependencyError';
  }
}

export class PackageManagerError extends InstallError {
  constructor(command: string, exitCode: number | null, stderr: string) {
    const detail = stderr ? `: ${stderr}` : '';
    super(`'${command}' exited with code ${exitCode ?? 'unknown'}${detail}`);
    this.name = 'PackageManagerError';
  }
}

export class InstallVerificationError extends InstallError {
  constructor(readonly tool: string) {
    super(`Verification failed: '${tool}' did not report a version after install`);
    this.name = 'InstallVerificationError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
