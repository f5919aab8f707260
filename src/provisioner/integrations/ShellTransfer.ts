import { existsSync } from 'node:fs';

import { succeeded } from '../execution/CommandExecutor.js';
import type {
  CommandRunner,
  Exporter,
  Fetcher,
  Syncer,
  Unpacker
} from '../shared/types.js';

/**
 * Downloads through wget.
 */
export class WgetFetcher implements Fetcher {
  constructor(private readonly runner: CommandRunner) {}

  async isReachable(url: string): Promise<boolean> {
    return succeeded(await this.runner.run('wget', ['--spider', url]));
  }

  async download(url: string, destination: string): Promise<boolean> {
    const result = await this.runner.run('wget', ['-q', '-O', destination, url]);
    return succeeded(result) && existsSync(destination);
  }

  async read(url: string): Promise<string | null> {
    const result = await this.runner.run('wget', ['-q', '-O', '-', url]);
    return succeeded(result) ? result.stdout : null;
  }
}

export class SvnExporter implements Exporter {
  constructor(private readonly runner: CommandRunner) {}

  async export(url: string, destination: string): Promise<boolean> {
    return succeeded(await this.runner.run('svn', ['export', '--quiet', '--force', url, destination]));
  }
}

export class ArchiveUnpacker implements Unpacker {
  constructor(private readonly runner: CommandRunner) {}

  async extractTarGz(
    archive: string,
    destination: string,
    options: { stripComponents?: number } = {}
  ): Promise<boolean> {
    const args = ['-zxmf', archive, '-C', destination];
    if (options.stripComponents) {
      args.unshift(`--strip-components=${options.stripComponents}`);
    }
    return succeeded(await this.runner.run('tar', args));
  }

  async extractZip(archive: string, destination: string): Promise<boolean> {
    return succeeded(await this.runner.run('unzip', ['-o', '-q', archive, '-d', destination]));
  }
}

/**
 * Mirrors directories with `rsync -a --delete`.
 */
export class RsyncSyncer implements Syncer {
  constructor(private readonly runner: CommandRunner) {}

  async mirror(source: string, destination: string): Promise<boolean> {
    const from = source.endsWith('/') ? source : `${source}/`;
    return succeeded(await this.runner.run('rsync', ['-a', '--delete', from, destination]));
  }
}
