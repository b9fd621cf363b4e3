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

// GitHub releases client: latest tag and per-platform asset resolution

import { HttpClient } from './http.js';
import logger from './logger.js';
import { errorMessage, MetadataFetchError } from './errors.js';
import { GITHUB_API_BASE } from './config-constants.js';
import { platformKey } from './platform-detector.js';
import { TOOL_SPECS } from './tools.js';
import type {
  AssetPattern,
  AssetType,
  GitHubAsset,
  GitHubRelease,
  Platform,
  ReleaseAsset,
  ToolName,
} from './install-types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isGitHubAsset(value: unknown): value is GitHubAsset {
  return (
    isRecord(value) &&
    typeof value.name === 'string' &&
    typeof value.browser_download_url === 'string'
  );
}

/**
 * Narrow a parsed latest-release document. Only the fields the installer reads are checked.
 */
export function parseRelease(data: unknown): GitHubRelease | null {
  if (!isRecord(data) || typeof data.tag_name !== 'string' || !Array.isArray(data.assets)) {
    return null;
  }
  const listed: unknown[] = data.assets;
  const assets = listed.filter(isGitHubAsset);
  if (assets.length !== listed.length) {
    return null;
  }
  return {
    tag_name: data.tag_name,
    assets: assets.map(({ name, browser_download_url }) => ({ name, browser_download_url })),
  };
}

export function matchesPattern(assetName: string, pattern: AssetPattern): boolean {
  switch (pattern.match) {
    case 'suffix':
      return assetName.endsWith(pattern.value);
    case 'exact':
      return assetName === pattern.value;
  }
}

/**
 * First asset in listing order whose name matches the pattern.
 */
export function findAssetByPattern(
  release: GitHubRelease,
  pattern: AssetPattern
): GitHubAsset | null {
  return release.assets.find(asset => matchesPattern(asset.name, pattern)) ?? null;
}

export function inferAssetType(assetName: string): AssetType {
  if (assetName.endsWith('.tar.gz') || assetName.endsWith('.tgz')) {
    return 'archive-gzip';
  }
  if (assetName.endsWith('.zip')) {
    return 'archive-zip';
  }
  return 'raw-binary';
}

/**
 * True when the installed version equals the tag, as-is or without its leading "v".
 */
export function isUpToDate(currentVersion: string, tag: string): boolean {
  const stripped = tag.startsWith('v') ? tag.slice(1) : tag;
  return currentVersion === tag || currentVersion === stripped;
}

export interface ReleaseSource {
  latestTag(repo: string): Promise<string>;
  resolve(tool: ToolName, platform: Platform): Promise<ReleaseAsset | null>;
}

export class ReleaseResolver implements ReleaseSource {
  constructor(
    private readonly http: HttpClient,
    private readonly token?: string,
  ) {}

  /**
   * Fetch the latest release of owner/name. Any failure is a MetadataFetchError.
   */
  async fetchLatestRelease(repo: string): Promise<GitHubRelease> {
    const url = `${GITHUB_API_BASE}/repos/${repo}/releases/latest`;
    const headers: Record<string, string> = { 'Accept': 'application/vnd.github+json' };
    if (this.token) {
      headers['Authorization'] = `Bearer ${this.token}`;
    }

    let data: unknown;
    try {
      const response = await this.http.get(url, { headers });
      if (!response.ok) {
        throw new MetadataFetchError(repo, `GitHub API error: ${response.status} ${response.statusText}`);
      }
      data = await response.json();
    } catch (error) {
      if (error instanceof MetadataFetchError) throw error;
      throw new MetadataFetchError(repo, errorMessage(error), error);
    }

    const release = parseRelease(data);
    if (!release) {
      throw new MetadataFetchError(repo, 'unexpected release document');
    }
    return release;
  }

  async latestTag(repo: string): Promise<string> {
    const release = await this.fetchLatestRelease(repo);
    if (!release.tag_name) {
      throw new MetadataFetchError(repo, 'release has no tag');
    }
    return release.tag_name;
  }

  /**
   * Select the asset for this platform, or null when the release has none.
   */
  async resolve(tool: ToolName, platform: Platform): Promise<ReleaseAsset | null> {
    const spec = TOOL_SPECS[tool];
    const release = await this.fetchLatestRelease(spec.repo);
    const pattern = spec.assets[platformKey(platform)];

    const asset = findAssetByPattern(release, pattern);
    if (!asset) {
      logger.debug(
        `${tool}: no asset matches '${pattern.value}' in ${release.tag_name}. Available: ${release.assets.map(a => a.name).join(', ')}`
      );
      return null;
    }

    const type = spec.assetType ?? inferAssetType(asset.name);
    logger.debug(`Resolved ${tool} asset: ${asset.browser_download_url} (${type})`);
    return { name: asset.name, url: asset.browser_download_url, type };
  }
}
