import fs from 'node:fs/promises';
import path from 'node:path';

import { RUNNER_DOWNLOAD_BASE } from '../config/constants.js';
import type { Logger } from '../shared/logger.js';
import type { Fetcher, StepResult } from '../shared/types.js';
import type { TempWorkspace } from '../workspace/TempWorkspace.js';
import { downloadFile } from './download.js';

export function runnerDownloadUrl(runnerVersion: string): string {
  return `${RUNNER_DOWNLOAD_BASE}/phpunit-${runnerVersion}.phar`;
}

/**
 * Installs `phpunit-<major>.phar` as `<binDir>/phpunit`.
 */
export class RunnerFetcher {
  constructor(
    private readonly fetcher: Fetcher,
    private readonly workspace: TempWorkspace,
    private readonly logger: Logger,
    private readonly binDir: string
  ) {}

  get binaryPath(): string {
    return path.join(this.binDir, 'phpunit');
  }

  async install(runnerVersion: string): Promise<StepResult<string>> {
    const url = runnerDownloadUrl(runnerVersion);
    const archive = this.workspace.runnerArchive(runnerVersion);
    this.logger.info(`Installing PHPUnit ${runnerVersion}...`);

    if (!(await downloadFile(this.fetcher, this.logger, url, archive))) {
      return { status: 'fatal', message: `Could not install PHPUnit ${runnerVersion}.` };
    }

    await fs.chmod(archive, 0o755);
    await fs.mkdir(this.binDir, { recursive: true });
    // copy + remove: the temp root and bin dir may sit on different devices
    await fs.copyFile(archive, this.binaryPath);
    await fs.chmod(this.binaryPath, 0o755);
    await fs.rm(archive, { force: true });
    this.logger.info(`'${archive}' -> '${this.binaryPath}'`);
    return { status: 'success', value: this.binaryPath };
  }
}
