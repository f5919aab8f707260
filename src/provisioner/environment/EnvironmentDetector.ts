import os from 'node:os';
import path from 'node:path';

import type { EnvironmentInfo, OsFamily } from '../shared/types.js';

export function detectOsFamily(kernelName: string = os.type()): OsFamily {
  return kernelName === 'Darwin' ? 'mac' : 'other';
}

/**
 * Finds the site's public directory from the working directory.
 * Running from `.../app/public` yields the cwd; from `.../app`, `<cwd>/public`.
 */
export function resolvePublicDir(cwd: string): string | undefined {
  const index = cwd.indexOf('app');
  if (index < 0) {
    return undefined;
  }
  const tail = cwd.slice(index);
  if (tail === 'app/public') {
    return cwd;
  }
  if (tail === 'app') {
    return path.join(cwd, 'public');
  }
  return undefined;
}

export function detectEnvironment(
  options: { cwd?: string; kernelName?: string } = {}
): EnvironmentInfo {
  const cwd = options.cwd ?? process.cwd();
  const info: EnvironmentInfo = {
    osFamily: detectOsFamily(options.kernelName),
    cwd
  };
  const publicDir = resolvePublicDir(cwd);
  if (publicDir) {
    info.publicDir = publicDir;
  }
  return info;
}

export function describeOsFamily(osFamily: OsFamily): string {
  switch (osFamily) {
    case 'mac':
      return 'MacOS';
    case 'other':
      return 'Linux/WSL';
  }
}
