/**
 * Logger utility with verbose mode support
 * - info(): always prints
 * - debug(): only prints with --verbose
 * - success()/error(): highlighted green/red on a terminal
 */

export interface LoggerConfig {
  verbose?: boolean;
  color?: boolean;
}

const PREFIX = '[ssg-install]';

const ANSI = {
  red: '\u001b[1;91m',
  green: '\u001b[1;92m',
  yellow: '\u001b[1;93m',
  reset: '\u001b[0m',
} as const;

type Highlight = Exclude<keyof typeof ANSI, 'reset'>;

class Logger {
  private verbose: boolean = false;
  private color: boolean;

  constructor(config?: LoggerConfig) {
    this.verbose = config?.verbose ?? false;
    this.color = config?.color ?? Boolean(process.stdout.isTTY);
  }

  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  isVerbose(): boolean {
    return this.verbose;
  }

  private paint(text: string, highlight: Highlight): string {
    return this.color ? `${ANSI[highlight]}${text}${ANSI.reset}` : text;
  }

  /**
   * Always prints - used for step progress lines
   */
  info(message: string): void {
    console.log(`${PREFIX} ${message}`);
  }

  /**
   * Only prints in verbose mode - command output, skipped steps
   */
  debug(message: string): void {
    if (this.verbose) {
      console.log(`${PREFIX} DEBUG: ${message}`);
    }
  }

  success(message: string): void {
    console.log(`${PREFIX} ${this.paint(message, 'green')}`);
  }

  /**
   * Print a phase start message (verbose only)
   */
  phaseStart(phaseName: string): void {
    this.debug(`Starting phase: ${phaseName}`);
  }

  phaseComplete(phaseName: string, details?: string): void {
    const msg = details
      ? `${phaseName} complete: ${details}`
      : `${phaseName} complete`;
    this.info(msg);
  }

  warn(message: string): void {
    console.warn(`${PREFIX} ${this.paint(`WARNING: ${message}`, 'yellow')}`);
  }

  error(message: string): void {
    console.error(`${PREFIX} ${this.paint(`ERROR: ${message}`, 'red')}`);
  }
}

// Singleton instance
let loggerInstance: Logger | null = null;

/**
 * Get or create the logger singleton
 */
export function getLogger(config?: LoggerConfig): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger(config);
  }
  return loggerInstance;
}

/**
 * Reset logger (useful for testing)
 */
export function resetLogger(): void {
  loggerInstance = null;
}

export { Logger };
