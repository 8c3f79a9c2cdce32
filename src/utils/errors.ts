/**
 * Installer error taxonomy
 * Every class carries the exit code the CLI terminates with and an optional
 * details line that is only printed in verbose mode.
 */

import { getLogger } from './logger.js';

export const USAGE_TEXT = `This command requires the following parameters to function:
    -i App UUID, used to make API calls to the control panel.
    -n Application NAME, must match the name in the control panel.
    OPAL_TOKEN: Control panel token, used to authenticate to the API.
    API_URL: The API endpoint.`;

/**
 * Base error class with exit code
 */
export abstract class InstallerError extends Error {
  abstract readonly code: number;
  readonly details?: string;

  constructor(message: string, details?: string) {
    super(message);
    this.name = this.constructor.name;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  getExitCode(): number {
    return this.code;
  }

  log(): void {
    const logger = getLogger();
    logger.error(this.message);
    if (this.details) {
      logger.debug(`Details: ${this.details}`);
    }
  }
}

/**
 * A required flag or environment variable is absent or blank
 */
export class MissingParameterError extends InstallerError {
  readonly code = 1;
  readonly missing: readonly string[];

  constructor(missing: readonly string[]) {
    super(`Missing required parameters: ${missing.join(', ')}`, USAGE_TEXT);
    this.missing = missing;
  }

  static fromMissing(missing: readonly string[]): MissingParameterError {
    return new MissingParameterError(missing);
  }

  log(): void {
    const logger = getLogger();
    logger.error(this.message);
    logger.error(USAGE_TEXT);
  }
}

/**
 * A control-panel read call failed: transport error, non-2xx status or
 * a response body without the expected field
 */
export class ApiCallFailedError extends InstallerError {
  readonly code = 1;
  readonly status?: number;

  constructor(message: string, details?: string, status?: number) {
    super(message, details);
    this.status = status;
  }

  static fromStatus(operation: string, status: number, body: string): ApiCallFailedError {
    return new ApiCallFailedError(
      `${operation} failed.`,
      `HTTP ${status}: ${body.slice(0, 200)}`,
      status
    );
  }

  static fromNetwork(operation: string, cause: unknown): ApiCallFailedError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new ApiCallFailedError(`${operation} failed.`, `Request error: ${reason}`);
  }

  static fromInvalidBody(operation: string, reason: string): ApiCallFailedError {
    return new ApiCallFailedError(
      `${operation} failed.`,
      `Unexpected response body: ${reason}`
    );
  }
}

/**
 * A toolchain install, scaffold or build step exited non-zero
 */
export class ProvisioningFailedError extends InstallerError {
  readonly code = 1;
  readonly exitCode?: number;

  constructor(message: string, details?: string, exitCode?: number) {
    super(message, details);
    this.exitCode = exitCode;
  }

  static fromCommand(commandLine: string, exitCode: number, stderr: string): ProvisioningFailedError {
    return new ProvisioningFailedError(
      `Command failed with exit code ${exitCode}: ${commandLine}`,
      stderr ? stderr.slice(-500) : undefined,
      exitCode
    );
  }

  static fromStep(step: string, cause: unknown): ProvisioningFailedError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new ProvisioningFailedError(`${step} failed: ${reason}`);
  }
}

/**
 * Map error to exit code
 */
export function getExitCode(error: unknown): number {
  if (error instanceof InstallerError) {
    return error.getExitCode();
  }
  return 1;
}

/**
 * Handle and log error, then exit
 */
export function handleError(error: unknown): never {
  if (error instanceof InstallerError) {
    error.log();
    process.exit(error.getExitCode());
  }

  const logger = getLogger();
  if (error instanceof Error) {
    logger.error(`Unexpected error: ${error.message}`);
    if (error.stack) {
      logger.debug(`Stack: ${error.stack}`);
    }
  } else {
    logger.error(`Unexpected error: ${String(error)}`);
  }
  process.exit(1);
}
