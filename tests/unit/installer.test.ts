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

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createHash } from 'node:crypto';
import {
  chmodSync,
  existsSync,
  mkdirSync,
  mkdtempSync,
  readFileSync,
  readdirSync,
  rmSync,
  statSync,
  writeFileSync,
} from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { create as tarCreate } from 'tar';
import { ActionRunner } from '../../src/lib/actions.js';
import { ArtifactInstaller } from '../../src/lib/installer.js';
import { HttpClient } from '../../src/lib/http.js';
import {
  BinaryNotFoundError,
  ChecksumMismatchError,
  DownloadError,
  MissingDependencyError,
} from '../../src/lib/errors.js';
import { findExecutable } from '../../src/lib/process.js';
import type { ReleaseAsset } from '../../src/lib/install-types.js';
import { clearMockUiCalls, getMockUiMessages, setMockUi } from '../../src/ui/index.js';
import { fetchedUrls, notFound, stubFetch } from '../helpers/fetch.js';
import { buildZip } from '../helpers/zip.js';

const BASE = 'https://github.com/example/releases/download/v1.0.0';

const unzipAvailable = (await findExecutable('unzip')) !== null;

function workDirs(): string[] {
  return readdirSync(tmpdir()).filter((name) =>
    ['sectools-tfsec-', 'sectools-trivy-', 'sectools-checkov-'].some((prefix) => name.startsWith(prefix)),
  );
}

describe('ArtifactInstaller', () => {
  let root: string;
  let prefix: string;
  let existingWorkDirs: string[];
  const http = new HttpClient({ delayMs: 0 });

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'sectools-installer-'));
    prefix = join(root, 'bin');
    mkdirSync(prefix);
    existingWorkDirs = workDirs();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    setMockUi(false);
    rmSync(root, { recursive: true, force: true });
  });

  function newWorkDirs(): string[] {
    return workDirs().filter((name) => !existingWorkDirs.includes(name));
  }

  describe('raw binary', () => {
    const asset: ReleaseAsset = { name: 'tfsec-linux-amd64', url: `${BASE}/tfsec-linux-amd64`, type: 'raw-binary' };

    it('installs the download as <prefix>/<tool> with mode 0755', async () => {
      stubFetch((url) => (url === asset.url ? new Response('tfsec-binary') : notFound()));

      const report = await new ArtifactInstaller(prefix, http, new ActionRunner(false)).install(asset, 'tfsec');

      const target = join(prefix, 'tfsec');
      expect(report).toEqual({ path: target, checksum: 'not-published' });
      expect(readFileSync(target, 'utf-8')).toBe('tfsec-binary');
      expect(statSync(target).mode & 0o777).toBe(0o755);
      expect(readdirSync(prefix)).toEqual(['tfsec']);
    });

    it('verifies a published checksum', async () => {
      const digest = createHash('sha256').update('tfsec-binary').digest('hex');
      const spy = stubFetch((url) =>
        url === asset.url ? new Response('tfsec-binary') : new Response(`${digest}  tfsec-linux-amd64\n`),
      );

      const report = await new ArtifactInstaller(prefix, http, new ActionRunner(false)).install(asset, 'tfsec');

      expect(report.checksum).toBe('verified');
      expect(fetchedUrls(spy)).toEqual([asset.url, asset.url + '.sha256']);
    });

    it('leaves the prefix unchanged on a checksum mismatch', async () => {
      writeFileSync(join(prefix, 'trivy'), 'other tool');
      stubFetch((url) =>
        url === asset.url ? new Response('tampered-binary') : new Response('0123456789abcdef  tfsec-linux-amd64\n'),
      );

      await expect(
        new ArtifactInstaller(prefix, http, new ActionRunner(false)).install(asset, 'tfsec'),
      ).rejects.toThrow(ChecksumMismatchError);

      expect(readdirSync(prefix)).toEqual(['trivy']);
      expect(newWorkDirs()).toEqual([]);
    });

    it('rejects an empty published checksum file', async () => {
      stubFetch((url) => (url === asset.url ? new Response('tfsec-binary') : new Response('   \n')));

      const install = new ArtifactInstaller(prefix, http, new ActionRunner(false)).install(asset, 'tfsec');

      await expect(install).rejects.toThrow(ChecksumMismatchError);
      await expect(install).rejects.toThrow('Expected: (empty checksum file)');
      expect(readdirSync(prefix)).toEqual([]);
      expect(newWorkDirs()).toEqual([]);
    });

    it('replaces an existing binary in place', async () => {
      writeFileSync(join(prefix, 'tfsec'), 'old');
      stubFetch((url) => (url === asset.url ? new Response('new') : notFound()));

      await new ArtifactInstaller(prefix, http, new ActionRunner(false)).install(asset, 'tfsec');

      expect(readFileSync(join(prefix, 'tfsec'), 'utf-8')).toBe('new');
      expect(readdirSync(prefix)).toEqual(['tfsec']);
    });

    it('fails with DownloadError after exhausting retries', async () => {
      const spy = stubFetch(() => new Response('unavailable', { status: 503, statusText: 'Service Unavailable' }));

      await expect(
        new ArtifactInstaller(prefix, http, new ActionRunner(false)).install(asset, 'tfsec'),
      ).rejects.toThrow(DownloadError);

      expect(spy).toHaveBeenCalledTimes(3);
      expect(readdirSync(prefix)).toEqual([]);
      expect(newWorkDirs()).toEqual([]);
    });

    it('removes its temporary directory after success', async () => {
      stubFetch((url) => (url === asset.url ? new Response('tfsec-binary') : notFound()));

      await new ArtifactInstaller(prefix, http, new ActionRunner(false)).install(asset, 'tfsec');

      expect(newWorkDirs()).toEqual([]);
    });
  });

  describe('gzip archive', () => {
    const asset: ReleaseAsset = {
      name: 'trivy_0.50.1_Linux-64bit.tar.gz',
      url: `${BASE}/trivy_0.50.1_Linux-64bit.tar.gz`,
      type: 'archive-gzip',
    };

    async function buildArchive(files: Record<string, [string, number]>): Promise<Buffer> {
      const source = join(root, 'source');
      for (const [name, [content, mode]] of Object.entries(files)) {
        const path = join(source, name);
        mkdirSync(join(path, '..'), { recursive: true });
        writeFileSync(path, content);
        chmodSync(path, mode);
      }
      const archive = join(root, 'archive.tar.gz');
      await tarCreate({ gzip: true, file: archive, cwd: source }, Object.keys(files));
      return readFileSync(archive);
    }

    it('extracts and installs the tool binary', async () => {
      const archive = await buildArchive({
        'LICENSE': ['license', 0o644],
        'contrib/html.tpl': ['template', 0o644],
        'trivy': ['trivy-binary', 0o755],
      });
      stubFetch((url) => (url === asset.url ? new Response(new Uint8Array(archive)) : notFound()));

      const report = await new ArtifactInstaller(prefix, http, new ActionRunner(false)).install(asset, 'trivy');

      expect(report.path).toBe(join(prefix, 'trivy'));
      expect(readFileSync(join(prefix, 'trivy'), 'utf-8')).toBe('trivy-binary');
      expect(statSync(join(prefix, 'trivy')).mode & 0o777).toBe(0o755);
      expect(newWorkDirs()).toEqual([]);
    });

    it('fails with BinaryNotFoundError when the archive lacks the tool', async () => {
      const archive = await buildArchive({ 'README.md': ['readme', 0o644], 'bin/scanner': ['x', 0o755] });
      stubFetch((url) => (url === asset.url ? new Response(new Uint8Array(archive)) : notFound()));

      await expect(
        new ArtifactInstaller(prefix, http, new ActionRunner(false)).install(asset, 'trivy'),
      ).rejects.toThrow(BinaryNotFoundError);

      expect(readdirSync(prefix)).toEqual([]);
      expect(newWorkDirs()).toEqual([]);
    });
  });

  describe('zip archive', () => {
    const asset: ReleaseAsset = {
      name: 'checkov_linux_X86_64.zip',
      url: `${BASE}/checkov_linux_X86_64.zip`,
      type: 'archive-zip',
    };

    function serve(archive: Buffer): void {
      stubFetch((url) => (url === asset.url ? new Response(new Uint8Array(archive)) : notFound()));
    }

    it.skipIf(!unzipAvailable)('extracts and installs the tool binary', async () => {
      serve(buildZip([
        { name: 'dist/LICENSE', content: 'license', mode: 0o644 },
        { name: 'dist/checkov', content: 'checkov-binary', mode: 0o755 },
      ]));

      const report = await new ArtifactInstaller(prefix, http, new ActionRunner(false)).install(asset, 'checkov');

      expect(report).toEqual({ path: join(prefix, 'checkov'), checksum: 'not-published' });
      expect(readFileSync(join(prefix, 'checkov'), 'utf-8')).toBe('checkov-binary');
      expect(statSync(join(prefix, 'checkov')).mode & 0o777).toBe(0o755);
      expect(newWorkDirs()).toEqual([]);
    });

    it.skipIf(!unzipAvailable)('needs the owner execute bit on the zip entry', async () => {
      serve(buildZip([{ name: 'dist/checkov', content: 'checkov-binary', mode: 0o655 }]));

      await expect(
        new ArtifactInstaller(prefix, http, new ActionRunner(false)).install(asset, 'checkov'),
      ).rejects.toThrow("Binary 'checkov' not found in zip");
      expect(readdirSync(prefix)).toEqual([]);
    });

    it('fails with MissingDependencyError when unzip is not installed', async () => {
      vi.stubEnv('PATH', join(root, 'empty'));
      serve(buildZip([{ name: 'checkov', content: 'checkov-binary', mode: 0o755 }]));

      await expect(
        new ArtifactInstaller(prefix, http, new ActionRunner(false)).install(asset, 'checkov'),
      ).rejects.toThrow(MissingDependencyError);
      expect(readdirSync(prefix)).toEqual([]);
      expect(newWorkDirs()).toEqual([]);
    });
  });

  describe('dry-run', () => {
    beforeEach(() => {
      setMockUi(true);
      clearMockUiCalls();
    });

    it('prints every mutating step and touches nothing', async () => {
      const spy = stubFetch(() => new Response('unused'));
      const missingPrefix = join(root, 'not-created');
      const asset: ReleaseAsset = {
        name: 'trivy_0.50.1_Linux-64bit.tar.gz',
        url: `${BASE}/trivy_0.50.1_Linux-64bit.tar.gz`,
        type: 'archive-gzip',
      };

      const report = await new ArtifactInstaller(missingPrefix, http, new ActionRunner(true)).install(asset, 'trivy');

      expect(report).toEqual({ path: join(missingPrefix, 'trivy'), checksum: 'dry-run' });
      expect(spy).not.toHaveBeenCalled();
      expect(existsSync(missingPrefix)).toBe(false);
      expect(newWorkDirs()).toEqual([]);

      const workDir = join(tmpdir(), 'sectools-trivy-XXXXXX');
      const downloaded = join(workDir, 'trivy_0.50.1_Linux-64bit.tar.gz');
      const extractDir = join(workDir, 'extract');
      expect(getMockUiMessages('dryRun')).toEqual([
        `download ${asset.url} -> ${downloaded}`,
        `verify checksum ${asset.url}.sha256`,
        `tar -xzf ${downloaded} -C ${extractDir}`,
        `install -m 755 ${join(extractDir, 'trivy')} ${join(missingPrefix, 'trivy')}`,
      ]);
    });
  });
});
