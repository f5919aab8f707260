import fs from 'node:fs/promises';
import path from 'node:path';
import dotenv from 'dotenv';
import { expand } from 'dotenv-expand';

import { CORE_DIR_VARIABLE, TESTS_DIR_VARIABLE } from '../config/constants.js';
import type { Logger } from '../shared/logger.js';
import type { ProvisionPaths, StepResult } from '../shared/types.js';

/**
 * The user's shell startup file. Holds the `export WP_CORE_DIR=...` and
 * `export WP_TESTS_DIR=...` declarations shared with plugin test scaffolds.
 */
export class ShellProfile {
  private readonly filePath: string;
  private readonly processEnv: NodeJS.ProcessEnv;

  constructor(filePath: string, options: { processEnv?: NodeJS.ProcessEnv } = {}) {
    this.filePath = filePath;
    this.processEnv = options.processEnv ?? process.env;
  }

  get path(): string {
    return this.filePath;
  }

  async exists(): Promise<boolean> {
    try {
      const stat = await fs.stat(this.filePath);
      return stat.isFile();
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  async read(): Promise<string> {
    try {
      return await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        return '';
      }
      throw error;
    }
  }

  /**
   * Variables as a login shell would see them after sourcing the profile:
   * declarations in the file win over the inherited environment, and
   * `$NAME` / `${NAME}` references are expanded.
   */
  async variables(): Promise<Record<string, string | undefined>> {
    const declared = dotenv.parse(await this.read());
    const scope: Record<string, string> = {};
    for (const [name, value] of Object.entries(this.processEnv)) {
      if (value !== undefined && !(name in declared)) {
        scope[name] = value;
      }
    }
    // expand() writes into scope, never into this.processEnv
    const { parsed } = expand({ parsed: declared, processEnv: scope });
    return { ...this.processEnv, ...(parsed ?? declared) };
  }

  async containsLine(line: string): Promise<boolean> {
    const content = await this.read();
    return content.split(/\r?\n/).some((existing) => existing.trim() === line);
  }

  async appendLine(line: string): Promise<void> {
    const content = await this.read();
    const prefix = content.length > 0 && !content.endsWith('\n') ? '\n' : '';
    await fs.appendFile(this.filePath, `${prefix}${line}\n`);
  }

  /**
   * Reads WP_CORE_DIR and WP_TESTS_DIR, appending the defaults for whichever
   * is unset, then reads them back. Both must expand to absolute paths.
   */
  async loadOrCreatePaths(defaults: ProvisionPaths, logger: Logger): Promise<StepResult<ProvisionPaths>> {
    if (!(await this.exists())) {
      logger.info(`Creating ${this.filePath}`);
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, '');
    }

    const before = await this.variables();
    const declarations: Array<[string, string]> = [
      [TESTS_DIR_VARIABLE, defaults.testsDir],
      [CORE_DIR_VARIABLE, defaults.coreDir]
    ];
    for (const [name, value] of declarations) {
      if (!before[name]) {
        logger.info(`Setting ${name} environment variable`);
        await this.appendLine(`export ${name}=${value}`);
      }
    }

    const after = await this.variables();
    const coreDir = after[CORE_DIR_VARIABLE];
    const testsDir = after[TESTS_DIR_VARIABLE];
    if (!coreDir || !testsDir || !path.isAbsolute(coreDir) || !path.isAbsolute(testsDir)) {
      return { status: 'fatal', message: 'The WordPress directories for PHPUnit are not set' };
    }
    return { status: 'success', value: { coreDir, testsDir } };
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
