/**
 * Append-only install log: one "Started at" line per invocation
 */

import { appendFile, mkdir } from 'fs/promises';
import { dirname } from 'path';
import { formatTimestamp, getInstallLogPath } from './paths.js';

export async function recordInstallStart(home: string, appName: string, now: Date): Promise<string> {
  const logPath = getInstallLogPath(home, appName);
  await mkdir(dirname(logPath), { recursive: true });
  await appendFile(logPath, `Started at ${formatTimestamp(now)}\n`, 'utf-8');
  return logPath;
}
