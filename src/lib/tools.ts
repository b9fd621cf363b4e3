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

// Fixed table of supported tools

import { InvalidOptionError } from './errors.js';
import type { AssetPattern, ToolName, ToolSpec } from './install-types.js';

function suffix(value: string): AssetPattern {
  return { match: 'suffix', value };
}

function exact(value: string): AssetPattern {
  return { match: 'exact', value };
}

export const TOOL_SPECS: Readonly<Record<ToolName, ToolSpec>> = {
  trivy: {
    name: 'trivy',
    repo: 'aquasecurity/trivy',
    versionArgs: ['--version'],
    versionPattern: /^Version: ([0-9][^ ]+)/,
    assets: {
      'linux-amd64': suffix('Linux-64bit.tar.gz'),
      'linux-arm64': suffix('Linux-ARM64.tar.gz'),
      'darwin-amd64': suffix('macOS-64bit.tar.gz'),
      'darwin-arm64': suffix('macOS-ARM64.tar.gz'),
    },
    assetType: 'archive-gzip',
  },
  gitleaks: {
    name: 'gitleaks',
    repo: 'gitleaks/gitleaks',
    versionArgs: ['version'],
    versionPattern: /^v?([0-9][^ ]+)/,
    assets: {
      'linux-amd64': suffix('linux_x64.tar.gz'),
      'linux-arm64': suffix('linux_arm64.tar.gz'),
      'darwin-amd64': suffix('darwin_x64.tar.gz'),
      'darwin-arm64': suffix('darwin_arm64.tar.gz'),
    },
    assetType: 'archive-gzip',
  },
  trufflehog: {
    name: 'trufflehog',
    repo: 'trufflesecurity/trufflehog',
    versionArgs: ['--version'],
    // Banner is "trufflehog 3.x.y", so the generic fallback usually applies
    versionPattern: /^v?([0-9][^ ]+)/,
    assets: {
      'linux-amd64': suffix('linux_amd64.tar.gz'),
      'linux-arm64': suffix('linux_arm64.tar.gz'),
      'darwin-amd64': suffix('darwin_amd64.tar.gz'),
      'darwin-arm64': suffix('darwin_arm64.tar.gz'),
    },
    assetType: 'archive-gzip',
  },
  tfsec: {
    name: 'tfsec',
    repo: 'aquasecurity/tfsec',
    versionArgs: ['--version'],
    versionPattern: /^v?([0-9][^ ]+)/,
    assets: {
      'linux-amd64': exact('tfsec-linux-amd64'),
      'linux-arm64': exact('tfsec-linux-arm64'),
      'darwin-amd64': exact('tfsec-darwin-amd64'),
      'darwin-arm64': exact('tfsec-darwin-arm64'),
    },
    assetType: 'raw-binary',
  },
  checkov: {
    name: 'checkov',
    repo: 'bridgecrewio/checkov',
    versionArgs: ['--version'],
    versionPattern: /^([0-9][^ ]+)/,
    assets: {
      'linux-amd64': suffix('linux-amd64.zip'),
      'linux-arm64': suffix('linux-arm64.zip'),
      'darwin-amd64': suffix('darwin-amd64.zip'),
      'darwin-arm64': suffix('darwin-arm64.zip'),
    },
    assetType: 'archive-zip',
    packageFallback: 'checkov',
  },
};

/** Default batch, in processing order */
export const DEFAULT_TOOLS: readonly ToolName[] = ['trivy', 'gitleaks', 'trufflehog', 'tfsec', 'checkov'];

export function isToolName(value: string): value is ToolName {
  return Object.hasOwn(TOOL_SPECS, value);
}

/**
 * Validate positional tool names. An empty list selects every tool.
 */
export function parseToolNames(names: readonly string[]): ToolName[] {
  if (names.length === 0) {
    return [...DEFAULT_TOOLS];
  }

  const unknown = names.filter((name) => !isToolName(name));
  if (unknown.length > 0) {
    throw new InvalidOptionError(
      `Unknown tool: ${unknown.join(', ')}. Must be one of: ${DEFAULT_TOOLS.join(', ')}`,
    );
  }
  return names.filter(isToolName);
}
