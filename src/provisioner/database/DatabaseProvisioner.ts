import fs from 'node:fs/promises';
import path from 'node:path';

import type { DatabaseCredentials } from '../configfile/ConfigGenerator.js';
import type { Logger } from '../shared/logger.js';
import type { DbClient, StepResult } from '../shared/types.js';

export type DatabaseOutcome = 'created' | 'exists';

export function renderClientCredentials(credentials: DatabaseCredentials): string {
  return `[client]\npassword=${credentials.dbPassword}\nuser=${credentials.dbUser}`;
}

/**
 * Creates the test database unless it already exists.
 */
export class DatabaseProvisioner {
  constructor(
    private readonly client: DbClient,
    private readonly credentialsFile: string,
    private readonly logger: Logger
  ) {}

  /**
   * Lists the database with the show tool when available; anything it does
   * not find is retried with a direct `use`.
   */
  async databaseExists(name: string): Promise<boolean> {
    if ((await this.client.hasShowTool()) && (await this.client.showDatabase(name, this.credentialsFile))) {
      return true;
    }
    return this.client.useDatabase(name, this.credentialsFile);
  }

  async provision(credentials: DatabaseCredentials): Promise<StepResult<DatabaseOutcome>> {
    const name = credentials.dbName;
    this.logger.info(`Checking if database ${name} exists`);
    await fs.mkdir(path.dirname(this.credentialsFile), { recursive: true });
    await fs.writeFile(this.credentialsFile, renderClientCredentials(credentials), { mode: 0o600 });

    if (await this.databaseExists(name)) {
      this.logger.info(`Database ${name} already exists`);
      return { status: 'success', value: 'exists' };
    }

    this.logger.info(`Creating database ${name}`);
    if (!(await this.client.createDatabase(name, this.credentialsFile))) {
      return { status: 'fatal', message: `Could not create database ${name}.` };
    }
    return { status: 'success', value: 'created' };
  }
}
