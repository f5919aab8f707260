import { existsSync } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';

import { CONNECTION_MESSAGE, SVN_BASE, TEST_LIBRARY_PATHS } from '../config/constants.js';
import type { Logger } from '../shared/logger.js';
import type { Exporter, Fetcher, StepResult, Syncer, TestLibraryChannel } from '../shared/types.js';
import { archivePath, describeTestLibraryChannel } from '../versions/VersionResolver.js';
import type { TempWorkspace } from '../workspace/TempWorkspace.js';

type TestLibraryFetcherOptions = {
  fetcher: Fetcher;
  exporter: Exporter;
  syncer: Syncer;
  workspace: TempWorkspace;
  logger: Logger;
};

export function testLibraryBaseUrl(channel: TestLibraryChannel): string {
  return `${SVN_BASE}/${archivePath(channel)}/`;
}

/**
 * Exports `includes/`, `data/` and the sample config of the WordPress test
 * suite into the tests directory, falling back to trunk once.
 */
export class TestLibraryFetcher {
  private readonly fetcher: Fetcher;
  private readonly exporter: Exporter;
  private readonly syncer: Syncer;
  private readonly workspace: TempWorkspace;
  private readonly logger: Logger;

  constructor(options: TestLibraryFetcherOptions) {
    this.fetcher = options.fetcher;
    this.exporter = options.exporter;
    this.syncer = options.syncer;
    this.workspace = options.workspace;
    this.logger = options.logger;
  }

  async install(channel: TestLibraryChannel, testsDir: string): Promise<StepResult<TestLibraryChannel>> {
    this.logger.info(`Installing WordPress ${describeTestLibraryChannel(channel)} Test Suite...`);
    let installed = channel;
    let result = await this.download(channel);

    if (result.status === 'retryable' && channel.kind === 'tagged') {
      this.logger.info('Installing Test Suite from trunk...');
      installed = { kind: 'trunk' };
      result = await this.download(installed);
    }

    if (result.status !== 'success') {
      return { status: 'fatal', message: 'Could not install the WordPress test suite.' };
    }
    if (!(await this.syncer.mirror(this.workspace.testsStaging, testsDir))) {
      return { status: 'fatal', message: `Could not copy the WordPress test suite into ${testsDir}.` };
    }
    return { status: 'success', value: installed };
  }

  /**
   * One export attempt into the staging directory.
   */
  async download(channel: TestLibraryChannel): Promise<StepResult> {
    const base = testLibraryBaseUrl(channel);
    const staging = this.workspace.testsStaging;
    await fs.rm(staging, { recursive: true, force: true });
    await fs.mkdir(staging, { recursive: true });

    if (await this.fetcher.isReachable(`${base}${TEST_LIBRARY_PATHS[0].remote}`)) {
      for (const entry of TEST_LIBRARY_PATHS) {
        await this.exporter.export(`${base}${entry.remote}`, path.join(staging, entry.local));
      }
      const complete = TEST_LIBRARY_PATHS.every((entry) => existsSync(path.join(staging, entry.local)));
      if (complete) {
        return { status: 'success', value: undefined };
      }
    }

    const label = describeTestLibraryChannel(channel);
    this.logger.warn(`Could not download ${label} Test Suite. ${CONNECTION_MESSAGE}`);
    return { status: 'retryable', message: `Could not download ${label} Test Suite.` };
  }
}
