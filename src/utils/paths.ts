/**
 * Path layout for per-user installs
 * Everything is derived from the HOME captured at startup, never from cwd.
 */

import { access } from 'fs/promises';
import { join } from 'path';

/**
 * Canonical layout below $HOME
 */
export const INSTALL_LAYOUT = {
  /** Application directories */
  APPS_DIR: 'apps',
  /** Per-app install logs */
  LOGS_DIR: 'logs/apps',
  /** Install log filename */
  INSTALL_LOG: 'install.log',
  /** User binaries */
  BIN_DIR: 'bin',
  /** Scaffolded site inside the app directory */
  SITE_DIR: 'demo-site',
} as const;

/**
 * Get the application directory, e.g. ~/apps/myblog
 */
export function getAppDir(home: string, appName: string): string {
  return join(home, INSTALL_LAYOUT.APPS_DIR, appName);
}

/**
 * Get the demo site directory inside the application directory
 */
export function getSiteDir(home: string, appName: string): string {
  return join(getAppDir(home, appName), INSTALL_LAYOUT.SITE_DIR);
}

export function getInstallLogPath(home: string, appName: string): string {
  return join(home, INSTALL_LAYOUT.LOGS_DIR, appName, INSTALL_LAYOUT.INSTALL_LOG);
}

export function getUserBinDir(home: string): string {
  return join(home, INSTALL_LAYOUT.BIN_DIR);
}

/**
 * Format a date as YYYY-MM-DD in local time
 */
export function formatDate(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

/**
 * Format a date as YYYY-MM-DD HH:MM:SS in local time
 */
export function formatTimestamp(date: Date): string {
  const hh = String(date.getHours()).padStart(2, '0');
  const mm = String(date.getMinutes()).padStart(2, '0');
  const ss = String(date.getSeconds()).padStart(2, '0');
  return `${formatDate(date)} ${hh}:${mm}:${ss}`;
}

/**
 * Format a local-time UTC offset as ±HHMM
 */
export function formatUtcOffset(date: Date): string {
  const offsetMinutes = -date.getTimezoneOffset();
  const sign = offsetMinutes >= 0 ? '+' : '-';
  const abs = Math.abs(offsetMinutes);
  const hours = String(Math.floor(abs / 60)).padStart(2, '0');
  const minutes = String(abs % 60).padStart(2, '0');
  return `${sign}${hours}${minutes}`;
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}
