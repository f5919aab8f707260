import { existsSync } from 'node:fs';

import { CONNECTION_MESSAGE } from '../config/constants.js';
import type { Logger } from '../shared/logger.js';
import type { Fetcher } from '../shared/types.js';

/**
 * Checks the URL is reachable, downloads it and checks the file landed. Warns with the URL on failure.
 */
export async function downloadFile(
  fetcher: Fetcher,
  logger: Logger,
  url: string,
  destination: string
): Promise<boolean> {
  if ((await fetcher.isReachable(url)) && (await fetcher.download(url, destination)) && existsSync(destination)) {
    return true;
  }
  logger.warn(`Could not download ${url} ${CONNECTION_MESSAGE}`);
  return false;
}
