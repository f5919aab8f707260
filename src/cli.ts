#!/usr/bin/env node
import fs from 'node:fs';
import { pathToFileURL } from 'node:url';

import { loadSettings } from './config/env.js';
import { createConsoleLogger, createPhpUnitProvisioner } from './provisioner/index.js';

const ROOT_DIR = process.cwd();

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const logger = createConsoleLogger();
  const settings = loadSettings({ rootDir: ROOT_DIR });
  const provisioner = createPhpUnitProvisioner({ settings, logger });
  return provisioner.runFromArguments(argv);
}

function isMainEntry() {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  const resolved = fs.existsSync(entry) ? fs.realpathSync(entry) : entry;
  return import.meta.url === pathToFileURL(resolved).href;
}

if (isMainEntry()) {
  main()
    .then((exitCode) => {
      process.exitCode = exitCode;
    })
    .catch((error) => {
      // eslint-disable-next-line no-console
      console.error('setup-phpunit failed:', error);
      process.exit(1);
    });
}
