/**
 * Utility functions for logging, errors, paths and external commands
 */

export { getLogger, resetLogger, Logger } from './logger.js';
export type { LoggerConfig } from './logger.js';

export {
  InstallerError,
  MissingParameterError,
  ApiCallFailedError,
  ProvisioningFailedError,
  getExitCode,
  handleError,
  USAGE_TEXT,
} from './errors.js';

export { ExecaCommandRunner, formatCommand, runChecked, runUnchecked } from './exec.js';
export type { CommandRunner, CommandSpec, CommandResult } from './exec.js';

export { downloadToFile } from './download.js';
export { recordInstallStart } from './install-log.js';

export {
  INSTALL_LAYOUT,
  getAppDir,
  getSiteDir,
  getInstallLogPath,
  getUserBinDir,
  formatDate,
  formatTimestamp,
  formatUtcOffset,
  pathExists,
} from './paths.js';
