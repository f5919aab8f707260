import fs from 'node:fs/promises';
import { constants } from 'node:fs';

import { succeeded } from '../execution/CommandExecutor.js';
import type { Logger } from '../shared/logger.js';
import type {
  CommandRunner,
  DbClient,
  PackageManager,
  PhpRuntime,
  ToolLocator
} from '../shared/types.js';

/**
 * A tool counts as installed when `which` resolves it to an executable file.
 */
export class WhichToolLocator implements ToolLocator {
  constructor(private readonly runner: CommandRunner) {}

  async isInstalled(tool: string): Promise<boolean> {
    const result = await this.runner.run('which', [tool]);
    if (!succeeded(result)) {
      return false;
    }
    const resolved = result.stdout.trim().split(/\r?\n/)[0];
    if (!resolved) {
      return false;
    }
    try {
      const stat = await fs.stat(resolved);
      if (!stat.isFile()) {
        return false;
      }
      await fs.access(resolved, constants.X_OK);
      return true;
    } catch {
      return false;
    }
  }
}

/**
 * Runs package manager commands, streaming their output through the logger.
 */
export class SystemPackageManager implements PackageManager {
  constructor(
    private readonly runner: CommandRunner,
    private readonly logger: Logger
  ) {}

  async run(command: string, args: string[]): Promise<boolean> {
    const result = await this.runner.run(command, args, {
      hooks: {
        onStdout: (chunk) => this.logger.info(chunk.trimEnd())
      }
    });
    return succeeded(result);
  }

  async capture(command: string, args: string[]): Promise<string | null> {
    const result = await this.runner.run(command, args);
    return succeeded(result) ? result.stdout : null;
  }
}

export class CliPhpRuntime implements PhpRuntime {
  constructor(private readonly runner: CommandRunner) {}

  async version(): Promise<string | null> {
    const result = await this.runner.run('php', ['-r', 'echo PHP_VERSION;']);
    if (!succeeded(result)) {
      return null;
    }
    const version = result.stdout.trim();
    return version || null;
  }
}

/**
 * MySQL command-line clients reading credentials from a defaults file.
 */
export class MysqlClient implements DbClient {
  constructor(private readonly runner: CommandRunner) {}

  async hasShowTool(): Promise<boolean> {
    return succeeded(await this.runner.run('mysqlshow', ['--version']));
  }

  async showDatabase(name: string, credentialsFile: string): Promise<boolean> {
    const result = await this.runner.run('mysqlshow', [`--defaults-file=${credentialsFile}`, name]);
    if (!succeeded(result)) {
      return false;
    }
    return result.stdout
      .split(/\r?\n/)
      .filter((line) => !line.includes('Wildcard'))
      .some((line) => line.includes(name));
  }

  async useDatabase(name: string, credentialsFile: string): Promise<boolean> {
    return succeeded(
      await this.runner.run('mysql', [`--defaults-file=${credentialsFile}`, '-e', `use ${name}`])
    );
  }

  async createDatabase(name: string, credentialsFile: string): Promise<boolean> {
    return succeeded(
      await this.runner.run('mysqladmin', [`--defaults-file=${credentialsFile}`, 'create', name])
    );
  }
}
