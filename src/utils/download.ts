/**
 * Single-attempt file download used for toolchain tarballs
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { getLogger } from './logger.js';
import { ProvisioningFailedError } from './errors.js';

export type FetchFn = (input: string) => Promise<Response>;

export async function downloadToFile(
  url: string,
  destination: string,
  fetchImpl: FetchFn = (input) => fetch(input)
): Promise<void> {
  const logger = getLogger();
  logger.info(`Downloading ${url}...`);

  let response: Response;
  try {
    response = await fetchImpl(url);
  } catch (error) {
    throw ProvisioningFailedError.fromStep(`Download of ${url}`, error);
  }

  if (!response.ok) {
    throw new ProvisioningFailedError(
      `Download of ${url} failed with HTTP ${response.status}`,
      response.statusText || undefined
    );
  }

  const buffer = Buffer.from(await response.arrayBuffer());
  await mkdir(dirname(destination), { recursive: true });
  await writeFile(destination, buffer);
  logger.debug(`Saved ${buffer.length} bytes to ${destination}`);
}
