import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import dotenv from 'dotenv';
import { z } from 'zod';

import type { Settings } from '../provisioner/shared/types.js';

export type LocalEnv = Record<string, string>;

export function loadLocalEnv(rootDir: string = process.cwd()): LocalEnv {
  const envPath = path.join(rootDir, '.env.local');
  if (!fs.existsSync(envPath)) {
    return {};
  }
  const content = fs.readFileSync(envPath);
  return dotenv.parse(content);
}

const nonEmpty = z.string().trim().min(1);

const SettingsSchema = z.object({
  WP_TEST_DB_NAME: nonEmpty.regex(/^[A-Za-z0-9_]+$/, 'may only contain letters, digits and underscores').default('wordpress_test'),
  WP_TEST_DB_USER: nonEmpty.default('root'),
  WP_TEST_DB_PASSWORD: z.string().default('root'),
  PHPUNIT_BIN_DIR: nonEmpty.default('/usr/local/bin'),
  SETUP_PHPUNIT_TMP_DIR: nonEmpty.default('/tmp'),
  SHELL_PROFILE: nonEmpty.optional(),
  COMMAND_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(0)
});

const SETTING_KEYS = Object.keys(SettingsSchema.shape);

/**
 * Builds the settings record from `.env.local`, then the process environment.
 * Throws when a value fails validation.
 */
export function loadSettings(
  options: { rootDir?: string; env?: LocalEnv; processEnv?: NodeJS.ProcessEnv; homeDir?: string } = {}
): Settings {
  const localEnv = options.env ?? loadLocalEnv(options.rootDir);
  const processEnv = options.processEnv ?? process.env;
  const merged: Record<string, string> = {};
  for (const key of SETTING_KEYS) {
    const value = localEnv[key] ?? processEnv[key];
    if (value !== undefined && value !== '') {
      merged[key] = value;
    }
  }

  const parsed = SettingsSchema.safeParse(merged);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid settings: ${details}`);
  }

  const values = parsed.data;
  const homeDir = options.homeDir ?? os.homedir();
  return {
    dbName: values.WP_TEST_DB_NAME,
    dbUser: values.WP_TEST_DB_USER,
    dbPassword: values.WP_TEST_DB_PASSWORD,
    binDir: path.resolve(values.PHPUNIT_BIN_DIR),
    tmpDir: path.resolve(values.SETUP_PHPUNIT_TMP_DIR),
    shellProfile: values.SHELL_PROFILE ?? path.join(homeDir, '.bashrc'),
    commandTimeoutMs: values.COMMAND_TIMEOUT_MS
  };
}
