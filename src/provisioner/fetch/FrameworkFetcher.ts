import path from 'node:path';

import { NIGHTLY_ARCHIVE_URL, RELEASE_ARCHIVE_BASE, SVN_BASE } from '../config/constants.js';
import type { Logger } from '../shared/logger.js';
import type {
  Exporter,
  Fetcher,
  FrameworkChannel,
  StepResult,
  Syncer,
  Unpacker
} from '../shared/types.js';
import type { TempWorkspace } from '../workspace/TempWorkspace.js';
import { downloadFile } from './download.js';

type FrameworkFetcherOptions = {
  fetcher: Fetcher;
  exporter: Exporter;
  unpacker: Unpacker;
  syncer: Syncer;
  workspace: TempWorkspace;
  logger: Logger;
};

export function releaseArchiveUrl(version: string): string {
  return `${RELEASE_ARCHIVE_BASE}/wordpress-${version}.tar.gz`;
}

/**
 * Installs the WordPress source tree into the core directory from trunk,
 * the nightly build or a release archive.
 */
export class FrameworkFetcher {
  private readonly fetcher: Fetcher;
  private readonly exporter: Exporter;
  private readonly unpacker: Unpacker;
  private readonly syncer: Syncer;
  private readonly workspace: TempWorkspace;
  private readonly logger: Logger;

  constructor(options: FrameworkFetcherOptions) {
    this.fetcher = options.fetcher;
    this.exporter = options.exporter;
    this.unpacker = options.unpacker;
    this.syncer = options.syncer;
    this.workspace = options.workspace;
    this.logger = options.logger;
  }

  async install(channel: FrameworkChannel, coreDir: string): Promise<StepResult> {
    const staged = await this.stage(channel);
    if (staged === null) {
      return { status: 'fatal', message: `Could not install WordPress ${describeFrameworkChannel(channel)}.` };
    }
    if (!(await this.syncer.mirror(staged, coreDir))) {
      return { status: 'fatal', message: `Could not copy WordPress into ${coreDir}.` };
    }
    return { status: 'success', value: undefined };
  }

  /**
   * Fills the staging directory and returns the folder to mirror, or null.
   */
  private async stage(channel: FrameworkChannel): Promise<string | null> {
    const staging = this.workspace.coreStaging;
    switch (channel.kind) {
      case 'trunk': {
        this.logger.info('Installing WordPress trunk...');
        const exported = await this.exporter.export(`${SVN_BASE}/trunk/src/`, staging);
        return exported ? staging : null;
      }
      case 'nightly': {
        this.logger.info('Installing WordPress nightly...');
        const archive = this.workspace.nightlyArchive;
        if (!(await downloadFile(this.fetcher, this.logger, NIGHTLY_ARCHIVE_URL, archive))) {
          return null;
        }
        if (!(await this.unpacker.extractZip(archive, staging))) {
          return null;
        }
        return path.join(staging, 'wordpress');
      }
      case 'tagged': {
        this.logger.info(`Installing WordPress ${channel.version}...`);
        const archive = this.workspace.releaseArchive;
        if (!(await downloadFile(this.fetcher, this.logger, releaseArchiveUrl(channel.version), archive))) {
          return null;
        }
        if (!(await this.unpacker.extractTarGz(archive, staging, { stripComponents: 1 }))) {
          return null;
        }
        return staging;
      }
    }
  }
}

export function describeFrameworkChannel(channel: FrameworkChannel): string {
  switch (channel.kind) {
    case 'trunk':
    case 'nightly':
      return channel.kind;
    case 'tagged':
      return channel.version;
  }
}
