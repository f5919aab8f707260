import { z } from 'zod';

import {
  CONNECTION_MESSAGE,
  DEFAULT_RUNNER_VERSION,
  RUNNER_VERSION_TABLE,
  VERSION_CHECK_URL
} from '../config/constants.js';
import type {
  Fetcher,
  FrameworkChannel,
  StepResult,
  TestLibraryChannel
} from '../shared/types.js';

/**
 * Picks the PHPUnit major version for a PHP version string such as "7.1.33".
 */
export function selectRunnerVersion(phpVersion: string | null): string {
  const band = (phpVersion ?? '').slice(0, 3);
  return RUNNER_VERSION_TABLE[band] ?? DEFAULT_RUNNER_VERSION;
}

export function toFrameworkChannel(version: string): FrameworkChannel {
  switch (version) {
    case 'trunk':
      return { kind: 'trunk' };
    case 'nightly':
      return { kind: 'nightly' };
    default:
      return { kind: 'tagged', version };
  }
}

/**
 * Maps a test-library version onto the svn path it is exported from.
 * `latest` follows the resolved framework version.
 */
export function toTestLibraryChannel(testLibraryVersion: string, frameworkVersion: string): TestLibraryChannel {
  switch (testLibraryVersion) {
    case 'trunk':
    case 'nightly':
      return { kind: 'trunk' };
    case 'latest':
      return frameworkVersion === 'trunk' || frameworkVersion === 'nightly'
        ? { kind: 'trunk' }
        : { kind: 'tagged', version: frameworkVersion };
    default:
      return { kind: 'tagged', version: testLibraryVersion };
  }
}

export function archivePath(channel: TestLibraryChannel): string {
  switch (channel.kind) {
    case 'trunk':
      return 'trunk';
    case 'tagged':
      return `tags/${channel.version}`;
  }
}

export function describeTestLibraryChannel(channel: TestLibraryChannel): string {
  switch (channel.kind) {
    case 'trunk':
      return 'trunk';
    case 'tagged':
      return channel.version;
  }
}

const VersionCheckSchema = z.object({
  offers: z
    .array(z.object({ version: z.string().trim().min(1) }).passthrough())
    .nonempty()
});

/**
 * Extracts the first offered version from a version-check response body.
 */
export function parseLatestVersion(body: string): string | null {
  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch {
    return null;
  }
  const parsed = VersionCheckSchema.safeParse(payload);
  return parsed.success ? parsed.data.offers[0].version : null;
}

/**
 * Resolves symbolic WordPress versions. The version-check endpoint is queried
 * at most once.
 */
export class VersionResolver {
  private readonly fetcher: Fetcher;
  private readonly versionCheckUrl: string;
  private latest: Promise<string | null> | null = null;

  constructor(fetcher: Fetcher, options: { versionCheckUrl?: string } = {}) {
    this.fetcher = fetcher;
    this.versionCheckUrl = options.versionCheckUrl ?? VERSION_CHECK_URL;
  }

  latestVersion(): Promise<string | null> {
    if (!this.latest) {
      this.latest = this.fetcher
        .read(this.versionCheckUrl)
        .then((body) => (body === null ? null : parseLatestVersion(body)));
    }
    return this.latest;
  }

  async resolveFrameworkVersion(requested: string): Promise<StepResult<string>> {
    if (requested !== 'latest') {
      return { status: 'success', value: requested };
    }
    const latest = await this.latestVersion();
    if (!latest) {
      return {
        status: 'fatal',
        message: `Could not get latest WordPress version from api.wordpress.org. ${CONNECTION_MESSAGE}`
      };
    }
    return { status: 'success', value: latest };
  }
}
