import fs from 'node:fs/promises';
import path from 'node:path';

import { CONFIG_FILE_NAME } from '../config/constants.js';

/**
 * Fixed staging paths under the temp root. Everything except the config copy
 * lives only for one run.
 */
export class TempWorkspace {
  readonly root: string;
  readonly coreStaging: string;
  readonly testsStaging: string;
  readonly credentialsFile: string;
  readonly releaseArchive: string;
  readonly nightlyArchive: string;
  readonly composerInstaller: string;
  readonly configCopy: string;
  private readonly runnerVersions = new Set<string>();

  constructor(root: string) {
    this.root = root;
    this.coreStaging = path.join(root, 'tmp-wordpress');
    this.testsStaging = path.join(root, 'tmp-wordpress-tests-lib');
    this.credentialsFile = path.join(root, 'my.cnf');
    this.releaseArchive = path.join(root, 'wordpress.tar.gz');
    this.nightlyArchive = path.join(root, 'wordpress-latest.zip');
    this.composerInstaller = path.join(root, 'composer-setup.php');
    this.configCopy = path.join(root, CONFIG_FILE_NAME);
  }

  /**
   * Download path of a runner phar. Asking for it marks it for cleanup.
   */
  runnerArchive(runnerVersion: string): string {
    this.runnerVersions.add(runnerVersion);
    return path.join(this.root, `phpunit-${runnerVersion}.phar`);
  }

  /**
   * Removes staging directories, the credentials file and downloaded archives.
   * Safe to call repeatedly.
   */
  async cleanup(): Promise<void> {
    const runnerArchives = [...this.runnerVersions].map((version) =>
      path.join(this.root, `phpunit-${version}.phar`)
    );
    const targets = [
      this.coreStaging,
      this.testsStaging,
      this.credentialsFile,
      this.releaseArchive,
      this.nightlyArchive,
      this.composerInstaller,
      ...runnerArchives
    ];
    for (const target of targets) {
      await fs.rm(target, { recursive: true, force: true });
    }
  }

  async createStagingDirectories(): Promise<void> {
    await fs.mkdir(this.coreStaging, { recursive: true });
    await fs.mkdir(this.testsStaging, { recursive: true });
  }
}
