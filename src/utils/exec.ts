/**
 * External command execution
 * Provisioners talk to toolchains (go, git, gem, docker …) only through a
 * CommandRunner so tests can substitute a recording fake.
 */

import execa from 'execa';
import { getLogger } from './logger.js';
import { ProvisioningFailedError } from './errors.js';

export interface CommandSpec {
  file: string;
  args?: string[];
  cwd?: string;
  /** Extra variables layered over the inherited environment */
  env?: Record<string, string>;
}

export type CommandResult = {
  ok: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
};

export interface CommandRunner {
  run(spec: CommandSpec): Promise<CommandResult>;
}

function normalizeText(value: unknown): string {
  if (value === undefined || value === null) return '';
  return String(value).trim();
}

export function formatCommand(spec: CommandSpec): string {
  return [spec.file, ...(spec.args ?? [])]
    .map((part) => (/[\s'"]/.test(part) ? JSON.stringify(part) : part))
    .join(' ');
}

export class ExecaCommandRunner implements CommandRunner {
  async run(spec: CommandSpec): Promise<CommandResult> {
    const res = await execa(spec.file, spec.args ?? [], {
      cwd: spec.cwd,
      env: spec.env,
      encoding: 'utf8',
      reject: false,
    });

    return {
      ok: (res.exitCode ?? 1) === 0,
      exitCode: res.exitCode ?? 1,
      stdout: normalizeText(res.stdout),
      stderr: normalizeText(res.stderr),
    };
  }
}

/**
 * Run a command and throw ProvisioningFailedError on a non-zero exit
 */
export async function runChecked(runner: CommandRunner, spec: CommandSpec): Promise<CommandResult> {
  const logger = getLogger();
  const commandLine = formatCommand(spec);
  logger.debug(`Running: ${commandLine}${spec.cwd ? ` (in ${spec.cwd})` : ''}`);

  const result = await runner.run(spec);
  if (result.stdout) {
    logger.debug(result.stdout);
  }
  if (!result.ok) {
    throw ProvisioningFailedError.fromCommand(commandLine, result.exitCode, result.stderr);
  }
  return result;
}

/**
 * Run a command and hand back its result without judging the exit code
 */
export async function runUnchecked(runner: CommandRunner, spec: CommandSpec): Promise<CommandResult> {
  const logger = getLogger();
  logger.debug(`Running: ${formatCommand(spec)}${spec.cwd ? ` (in ${spec.cwd})` : ''}`);

  const result = await runner.run(spec);
  if (result.stdout) {
    logger.debug(result.stdout);
  }
  return result;
}
