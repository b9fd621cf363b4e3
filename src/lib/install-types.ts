// Types for release resolution and binary installation

export interface GitHubRelease {
  tag_name: string;
  assets: GitHubAsset[];
}

export interface GitHubAsset {
  name: string;
  browser_download_url: string;
}

export type OsName = 'linux' | 'darwin';
export type ArchName = 'amd64' | 'arm64';

export interface Platform {
  os: OsName;
  arch: ArchName;
}

export type PlatformKey = `${OsName}-${ArchName}`;

export type ToolName = 'trivy' | 'gitleaks' | 'trufflehog' | 'tfsec' | 'checkov';

export type AssetType = 'archive-gzip' | 'archive-zip' | 'raw-binary';

/**
 * How an asset name is matched for one platform:
 * - suffix: archive naming, the asset name ends with the value
 * - exact: the asset name is the value
 */
export type AssetPattern =
  | { match: 'suffix'; value: string }
  | { match: 'exact'; value: string };

export interface ToolSpec {
  readonly name: ToolName;
  /** GitHub repository, owner/name */
  readonly repo: string;
  /** Arguments that make the tool print its version */
  readonly versionArgs: readonly string[];
  /** First capture group is the version; tried before the generic fallback */
  readonly versionPattern?: RegExp;
  readonly assets: Readonly<Record<PlatformKey, AssetPattern>>;
  readonly assetType?: AssetType;
  /** pipx package used when no release asset matches the platform */
  readonly packageFallback?: string;
}

export interface ReleaseAsset {
  name: string;
  url: string;
  type: AssetType;
}

export type ChecksumStatus = 'verified' | 'not-published' | 'no-hasher' | 'dry-run';

export interface InstallReport {
  path: string;
  checksum: ChecksumStatus;
}

export type InstallOutcome =
  | 'skipped-up-to-date'
  | 'installed'
  | 'updated'
  | 'failed'
  | 'skipped-not-installed';

export interface ToolResult {
  tool: ToolName;
  outcome: InstallOutcome;
  previousVersion: string | null;
  latestTag?: string;
  installedVersion?: string;
  checksum?: ChecksumStatus;
  via?: 'release-asset' | 'package-manager';
  error?: Error;
}

export interface BatchSummary {
  results: ToolResult[];
  failures: ToolName[];
}
