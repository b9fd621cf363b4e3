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

// Download, verify, unpack and install one release asset

import { chmod, copyFile, mkdtemp, rename, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, join } from 'node:path';
import type { ActionRunner } from './actions.js';
import { verifyChecksum } from './checksum.js';
import { EXECUTABLE_MODE } from './config-constants.js';
import { DownloadError, errorMessage, InstallError } from './errors.js';
import { extractTarGz, extractZip, findToolBinary } from './extract.js';
import type { HttpClient } from './http.js';
import type { InstallReport, ReleaseAsset, ToolName } from './install-types.js';
import logger from './logger.js';

export interface ArtifactSink {
  install(asset: ReleaseAsset, tool: ToolName): Promise<InstallReport>;
}

/**
 * Run step, turning anything that is not already an InstallError into one.
 */
async function step<T>(label: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof InstallError) throw error;
    throw new InstallError(`${label} failed: ${errorMessage(error)}`, { cause: error });
  }
}

export class ArtifactInstaller implements ArtifactSink {
  constructor(
    private readonly prefix: string,
    private readonly http: HttpClient,
    private readonly actions: ActionRunner,
  ) {}

  /**
   * Install asset as <prefix>/<tool> with mode 0755.
   *
   * Temporary files live in a private directory that is removed on every path.
   * The final name is only ever produced by a rename, so a failed install leaves
   * the prefix as it was.
   */
  async install(asset: ReleaseAsset, tool: ToolName): Promise<InstallReport> {
    const workDir = await this.createWorkDir(tool);
    try {
      const downloaded = join(workDir, basename(asset.name));

      await this.actions.run(`download ${asset.url} -> ${downloaded}`, () => this.download(asset.url, downloaded));

      const checksum = await this.actions.run(
        `verify checksum ${asset.url}.sha256`,
        () => step('Checksum verification', () => verifyChecksum(this.http, downloaded, asset.url)),
      );

      const binary = await this.unpack(asset, downloaded, workDir, tool);
      const target = join(this.prefix, tool);

      await this.actions.run(
        `install -m ${EXECUTABLE_MODE.toString(8)} ${binary} ${target}`,
        () => step('Install', () => this.place(binary, tool, target)),
      );

      return { path: target, checksum: checksum ?? 'dry-run' };
    } finally {
      if (!this.actions.dryRun) {
        await rm(workDir, { recursive: true, force: true });
      }
    }
  }

  private async createWorkDir(tool: ToolName): Promise<string> {
    const template = join(tmpdir(), `sectools-${tool}-`);
    if (this.actions.dryRun) {
      return template + 'XXXXXX';
    }
    return step('Temporary directory', () => mkdtemp(template));
  }

  private async download(url: string, destination: string): Promise<void> {
    try {
      const bytes = await this.http.download(url, destination);
      logger.info(`Downloaded ${url} (${bytes} bytes)`);
    } catch (error) {
      throw new DownloadError(url, errorMessage(error), error);
    }
  }

  /**
   * Path of the executable to install: the download itself for raw binaries,
   * the matching entry of the extracted tree for archives.
   */
  private async unpack(
    asset: ReleaseAsset,
    downloaded: string,
    workDir: string,
    tool: ToolName
  ): Promise<string> {
    const extractDir = join(workDir, 'extract');
    const options = { archivePath: downloaded, destination: extractDir };

    switch (asset.type) {
      case 'raw-binary':
        return downloaded;
      case 'archive-gzip':
        await this.actions.run(`tar -xzf ${downloaded} -C ${extractDir}`, () => step('Extraction', () => extractTarGz(options)));
        break;
      case 'archive-zip':
        await this.actions.run(`unzip -q ${downloaded} -d ${extractDir}`, () => step('Extraction', () => extractZip(options)));
        break;
    }

    if (this.actions.dryRun) {
      return join(extractDir, tool);
    }
    return findToolBinary(extractDir, tool, {
      fallback: asset.type === 'archive-gzip',
      archiveKind: asset.type === 'archive-gzip' ? 'tarball' : 'zip',
    });
  }

  private async place(binary: string, tool: ToolName, target: string): Promise<void> {
    const partial = join(this.prefix, `.${tool}.partial`);
    try {
      await copyFile(binary, partial);
      await chmod(partial, EXECUTABLE_MODE);
      await rename(partial, target);
    } catch (error) {
      await rm(partial, { force: true });
      throw error;
    }
    logger.info(`Installed ${tool} to ${target}`);
  }
}
