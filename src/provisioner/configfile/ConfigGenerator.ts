import { existsSync } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';

import { CONFIG_FILE_NAME, CONFIG_PLACEHOLDERS, CONFIG_SAMPLE_FILE_NAME } from '../config/constants.js';
import type { Logger } from '../shared/logger.js';
import type { OsFamily, ProvisionPaths, StepResult } from '../shared/types.js';
import type { TempWorkspace } from '../workspace/TempWorkspace.js';

export type DatabaseCredentials = {
  dbName: string;
  dbUser: string;
  dbPassword: string;
};

export type ConfigGeneratorResult = {
  configFile: string;
  copies: string[];
};

/**
 * Replaces the database placeholders of a wp-tests-config template.
 */
export function applyCredentials(template: string, credentials: DatabaseCredentials): string {
  return template
    .replaceAll(CONFIG_PLACEHOLDERS.dbName, () => credentials.dbName)
    .replaceAll(CONFIG_PLACEHOLDERS.dbUser, () => credentials.dbUser)
    .replaceAll(CONFIG_PLACEHOLDERS.dbPassword, () => credentials.dbPassword);
}

/**
 * Points ABSPATH at the core directory and fills in the credentials.
 */
export function renderTestsConfig(template: string, coreDir: string, credentials: DatabaseCredentials): string {
  const abspath = `'${coreDir.replace(/\/+$/, '')}/'`;
  return applyCredentials(template.replaceAll(CONFIG_PLACEHOLDERS.abspath, () => abspath), credentials);
}

/**
 * Writes wp-tests-config.php with working paths and credentials, and places
 * copies where VVV and the Local site expect them.
 */
export class ConfigGenerator {
  constructor(
    private readonly workspace: TempWorkspace,
    private readonly logger: Logger
  ) {}

  async generate(options: {
    paths: ProvisionPaths;
    credentials: DatabaseCredentials;
    osFamily: OsFamily;
    publicDir?: string;
  }): Promise<StepResult<ConfigGeneratorResult>> {
    const { paths, credentials, osFamily, publicDir } = options;
    const configFile = path.join(paths.testsDir, CONFIG_FILE_NAME);
    if (!existsSync(configFile)) {
      return { status: 'fatal', message: `${configFile} does not exist.` };
    }

    this.logger.info(`Updating ${CONFIG_FILE_NAME}...`);
    const template = await fs.readFile(configFile, 'utf8');
    if (osFamily === 'mac') {
      await fs.writeFile(`${configFile}.bak`, template);
    }
    await fs.writeFile(configFile, renderTestsConfig(template, paths.coreDir, credentials));

    const copies: string[] = [];
    await this.copy(configFile, this.workspace.configCopy);
    copies.push(this.workspace.configCopy);

    if (!publicDir) {
      return { status: 'success', value: { configFile, copies } };
    }

    const publicSample = path.join(publicDir, CONFIG_SAMPLE_FILE_NAME);
    const publicConfig = path.join(publicDir, CONFIG_FILE_NAME);
    if (existsSync(publicSample)) {
      this.logger.info(`Create credentials for ${CONFIG_FILE_NAME}...`);
      const sample = await fs.readFile(publicSample, 'utf8');
      await fs.writeFile(publicConfig, applyCredentials(sample, credentials));
      copies.push(publicConfig);
    }
    if (!existsSync(publicConfig)) {
      await this.copy(configFile, publicConfig);
      copies.push(publicConfig);
    }
    return { status: 'success', value: { configFile, copies } };
  }

  private async copy(source: string, destination: string): Promise<void> {
    await fs.mkdir(path.dirname(destination), { recursive: true });
    await fs.copyFile(source, destination);
    this.logger.info(`'${source}' -> '${destination}'`);
  }
}
