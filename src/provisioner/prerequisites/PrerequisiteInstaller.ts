import { existsSync } from 'node:fs';
import path from 'node:path';

import {
  APT_PACKAGES,
  BREW_PACKAGES,
  COMPOSER_INSTALLER_URL,
  COMPOSER_PATH_EXPORT,
  CONNECTION_MESSAGE,
  HOMEBREW_INSTALL_URL,
  REQUIRED_TOOLS
} from '../config/constants.js';
import type { ShellProfile } from '../environment/ShellProfile.js';
import type { Logger } from '../shared/logger.js';
import type { OsFamily, PackageManager, StepResult, ToolLocator } from '../shared/types.js';

type PrerequisiteInstallerOptions = {
  locator: ToolLocator;
  packageManager: PackageManager;
  shellProfile: ShellProfile;
  logger: Logger;
  binDir: string;
  composerInstaller: string;
  requiredTools?: readonly string[];
};

export type PrerequisiteReport = {
  action: 'none' | 'install' | 'update';
  missingBefore: string[];
};

/**
 * Makes sure wget, curl, svn, rsync, composer and git are available,
 * installing or updating them with the platform's package manager.
 */
export class PrerequisiteInstaller {
  private readonly locator: ToolLocator;
  private readonly packageManager: PackageManager;
  private readonly shellProfile: ShellProfile;
  private readonly logger: Logger;
  private readonly binDir: string;
  private readonly composerInstaller: string;
  private readonly requiredTools: readonly string[];

  constructor(options: PrerequisiteInstallerOptions) {
    this.locator = options.locator;
    this.packageManager = options.packageManager;
    this.shellProfile = options.shellProfile;
    this.logger = options.logger;
    this.binDir = options.binDir;
    this.composerInstaller = options.composerInstaller;
    this.requiredTools = options.requiredTools ?? REQUIRED_TOOLS;
  }

  async findMissingTools(): Promise<string[]> {
    const missing: string[] = [];
    for (const tool of this.requiredTools) {
      if (!(await this.locator.isInstalled(tool))) {
        missing.push(tool);
      }
    }
    return missing;
  }

  async ensure(osFamily: OsFamily, update: boolean): Promise<StepResult<PrerequisiteReport>> {
    const missingBefore = await this.findMissingTools();
    const install = missingBefore.length > 0;
    let action: PrerequisiteReport['action'] = 'none';

    if (install || update) {
      action = install ? 'install' : 'update';
      this.logger.info(install ? 'Installing packages...' : 'Updating packages...');
      switch (osFamily) {
        case 'mac':
          await this.installOnMac(install);
          break;
        case 'other':
          await this.installOnLinux();
          break;
      }
    }

    const stillMissing = await this.findMissingTools();
    if (stillMissing.length > 0) {
      return {
        status: 'fatal',
        message: `Missing packages: ${stillMissing.join(', ')}. ${CONNECTION_MESSAGE}`
      };
    }
    return { status: 'success', value: { action, missingBefore } };
  }

  private async installOnMac(install: boolean): Promise<void> {
    if (install) {
      await this.runOrWarn('xcode-select', ['--install']);
    }
    if (!(await this.locator.isInstalled('brew'))) {
      const script = await this.packageManager.capture('curl', ['-fsSL', HOMEBREW_INSTALL_URL]);
      if (script === null) {
        this.logger.warn(`Could not download the Homebrew installer. ${CONNECTION_MESSAGE}`);
      } else {
        await this.runOrWarn('/bin/bash', ['-c', script]);
      }
    }
    // Composer comes with the Local site shell.
    if (install) {
      for (const formula of BREW_PACKAGES) {
        await this.runOrWarn('brew', ['install', formula]);
      }
    } else {
      await this.runOrWarn('brew', ['upgrade', ...BREW_PACKAGES]);
    }
  }

  private async installOnLinux(): Promise<void> {
    await this.runOrWarn('apt-get', ['update', '-y']);
    await this.runOrWarn('apt-get', ['install', '-y', ...APT_PACKAGES]);

    const composerPath = path.join(this.binDir, 'composer');
    if (existsSync(composerPath)) {
      this.logger.info('Updating composer...');
      if (!(await this.packageManager.run(composerPath, ['self-update']))) {
        this.logger.warn(`Could not update composer. ${CONNECTION_MESSAGE}`);
      }
      return;
    }
    if (!(await this.locator.isInstalled('curl'))) {
      return;
    }

    const fetched = await this.packageManager.run('curl', ['-sS', '-o', this.composerInstaller, COMPOSER_INSTALLER_URL]);
    if (!fetched) {
      this.logger.warn(`Could not download the composer installer. ${CONNECTION_MESSAGE}`);
      return;
    }
    const installed = await this.runOrWarn('php', [
      this.composerInstaller,
      `--install-dir=${this.binDir}`,
      '--filename=composer'
    ]);
    if (!installed) {
      return;
    }
    if ((await this.shellProfile.exists()) && !(await this.shellProfile.containsLine(COMPOSER_PATH_EXPORT))) {
      this.logger.info('Adding .composer/vendor/bin to the PATH');
      await this.shellProfile.appendLine(COMPOSER_PATH_EXPORT);
    }
  }

  private async runOrWarn(command: string, args: string[]): Promise<boolean> {
    const ok = await this.packageManager.run(command, args);
    if (!ok) {
      this.logger.warn(`"${[command, ...args.slice(0, 1)].join(' ')}" did not complete successfully.`);
    }
    return ok;
  }
}
