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

// Host platform detection

import { machine, type } from 'node:os';
import { UnsupportedPlatformError } from './errors.js';
import logger from './logger.js';
import type { ArchName, OsName, Platform, PlatformKey } from './install-types.js';

const OS_MAP: Record<string, OsName> = {
  'Linux': 'linux',
  'Darwin': 'darwin'
};

const ARCH_MAP: Record<string, ArchName> = {
  'x86_64': 'amd64',
  'amd64': 'amd64',
  'arm64': 'arm64',
  'aarch64': 'arm64'
};

export interface HostIdentity {
  /** Kernel name as reported by uname -s */
  kernel: string;
  /** Machine hardware name as reported by uname -m */
  machine: string;
}

export function currentHost(): HostIdentity {
  return { kernel: type(), machine: machine() };
}

/**
 * Map the host's kernel and machine names to a supported platform.
 * Throws UnsupportedPlatformError for anything outside the closed set.
 */
export function detectPlatform(host: HostIdentity = currentHost()): Platform {
  const os = Object.hasOwn(OS_MAP, host.kernel) ? OS_MAP[host.kernel] : undefined;
  if (!os) {
    throw new UnsupportedPlatformError('os', host.kernel);
  }

  const arch = Object.hasOwn(ARCH_MAP, host.machine) ? ARCH_MAP[host.machine] : undefined;
  if (!arch) {
    throw new UnsupportedPlatformError('architecture', host.machine);
  }

  logger.debug(`Detected OS=${os} ARCH=${arch}`);
  return { os, arch };
}

export function platformKey(platform: Platform): PlatformKey {
  return `${platform.os}-${platform.arch}`;
}
