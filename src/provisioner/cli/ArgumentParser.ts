import { parseArgs } from 'node:util';

import type { CliOptions, ParsedArguments } from '../shared/types.js';

export const HELP_TEXT = `Install PHPUnit, WordPress and the WordPress test suite for local plugin testing

Usage:
\tsetup-phpunit [option...]

Example:
\tsetup-phpunit --runner-version=6 --framework-version=trunk

Options:
\t--runner-version          PHPUnit major version to install
\t                          Default depends on the installed PHP version
\t--framework-version       WordPress version to install
\t                          Accepts a version number, 'latest', 'trunk' or 'nightly'. Default 'latest'
\t--test-library-version    WordPress test suite version to install
\t                          Accepts a version number, 'latest', 'trunk' or 'nightly'. Default --framework-version
\t--update-packages         Update all packages installed by this tool
\t                          Updates curl, wget, rsync, git, subversion and composer
\t-?|--help                 Display information about this tool

\t--phpunit-version, --wp-version and --wp-ts-version are accepted as aliases.
`;

export const HELP_HINT = 'Use "setup-phpunit --help" to see all options';

type ValueOption = 'runnerVersion' | 'frameworkVersion' | 'testLibraryVersion';

const VALUE_OPTIONS: Record<string, ValueOption> = {
  'runner-version': 'runnerVersion',
  'phpunit-version': 'runnerVersion',
  'framework-version': 'frameworkVersion',
  'wp-version': 'frameworkVersion',
  'test-library-version': 'testLibraryVersion',
  'wp-ts-version': 'testLibraryVersion'
};

const HELP_NAMES = new Set(['help', 'h', '?']);

/**
 * Parses `--name=value` flags. Positional arguments, unknown flags and value
 * flags without an inline `=value` are usage errors.
 */
export function parseArguments(argv: string[]): ParsedArguments {
  const { tokens } = parseArgs({
    args: argv,
    options: {
      'runner-version': { type: 'string' },
      'phpunit-version': { type: 'string' },
      'framework-version': { type: 'string' },
      'wp-version': { type: 'string' },
      'test-library-version': { type: 'string' },
      'wp-ts-version': { type: 'string' },
      'update-packages': { type: 'boolean' },
      help: { type: 'boolean', short: 'h' }
    },
    allowPositionals: true,
    strict: false,
    tokens: true
  });

  const values: Partial<Record<ValueOption, string>> = {};
  let updatePackages = false;

  for (const token of tokens) {
    if (token.kind === 'positional') {
      return usageError(token.value);
    }
    if (token.kind === 'option-terminator') {
      return usageError(argv[token.index]);
    }

    const raw = argv[token.index];
    if (HELP_NAMES.has(token.name) && !token.inlineValue) {
      return { kind: 'help' };
    }

    const target = VALUE_OPTIONS[token.name];
    if (target) {
      if (!token.inlineValue || token.value === undefined) {
        return usageError(raw);
      }
      values[target] = token.value;
      continue;
    }

    if (token.name === 'update-packages' && !token.inlineValue) {
      updatePackages = true;
      continue;
    }

    return usageError(raw);
  }

  const options: CliOptions = {
    frameworkVersion: values.frameworkVersion || 'latest',
    updatePackages
  };
  if (values.runnerVersion) {
    options.runnerVersion = values.runnerVersion;
  }
  if (values.testLibraryVersion) {
    options.testLibraryVersion = values.testLibraryVersion;
  }
  return { kind: 'run', options };
}

function usageError(token: string): ParsedArguments {
  return {
    kind: 'usage-error',
    token,
    message: `Unknown option: ${token}.\n${HELP_HINT}`
  };
}
