#!/usr/bin/env node
import { captureHostEnvironment, buildInstallRequest } from '../config/index.js';
import { runInstall } from '../core/index.js';
import { createProvisioner } from '../provisioners/index.js';
import { getLogger, handleError } from '../utils/index.js';
import { createProgram } from './program.js';
import type { InstallAction } from './types.js';

const install: InstallAction = async (variant, options) => {
  const logger = getLogger({ verbose: options.verbose });

  try {
    const env = process.env;
    const input = buildInstallRequest(options, env);
    const host = captureHostEnvironment(env);

    if (options.verbose) {
      logger.debug(`Variant: ${variant}`);
      logger.debug(`App: ${input.appName ?? '(unset)'} (${input.uuid ?? 'no uuid'})`);
      logger.debug(`API: ${input.apiBaseUrl ?? '(unset)'}`);
      logger.debug(`Home: ${host.home}, user: ${host.user}`);
    }

    await runInstall(input, host, createProvisioner(variant));
    process.exit(0);
  } catch (err) {
    handleError(err);
  }
};

function run(): void {
  const program = createProgram(install);

  if (!process.argv.slice(2).length) {
    program.outputHelp();
    process.exit(1);
  }

  program.parseAsync(process.argv).catch(handleError);
}

run();
