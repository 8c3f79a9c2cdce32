/**
 * Jekyll demo site provisioner backed by a container image.
 * Each jekyll call is a throwaway `docker run --rm` with the working
 * directory bind-mounted; only the mounted directory survives.
 */

import { getLogger } from '../utils/logger.js';
import { runChecked } from '../utils/exec.js';
import type { CommandSpec } from '../utils/exec.js';
import { INSTALL_LAYOUT, getAppDir, getSiteDir } from '../utils/paths.js';
import { ensureDirectory, ensurePresent, ensureWelcomePost } from './steps.js';
import type { ProvisionContext, ProvisionOutcome, Provisioner, StepRecord } from './types.js';

export const JEKYLL_CONTAINER = {
  IMAGE: 'jekyll/jekyll:latest',
  MOUNT_POINT: '/srv/jekyll',
} as const;

export function jekyllContainerCommand(hostDir: string, jekyllArgs: string[]): CommandSpec {
  return {
    file: 'docker',
    args: [
      'run',
      '--rm',
      '-v',
      `${hostDir}:${JEKYLL_CONTAINER.MOUNT_POINT}`,
      JEKYLL_CONTAINER.IMAGE,
      'jekyll',
      ...jekyllArgs,
    ],
  };
}

export class JekyllDockerProvisioner implements Provisioner {
  readonly id = 'jekyll-docker';
  readonly noticeLead = 'Created Jekyll app';

  async provision(context: ProvisionContext): Promise<ProvisionOutcome> {
    const logger = getLogger();
    const { request, host, runner, now } = context;

    logger.info(`Pulling ${JEKYLL_CONTAINER.IMAGE}...`);
    await runChecked(runner, { file: 'docker', args: ['pull', JEKYLL_CONTAINER.IMAGE] });

    const appDir = getAppDir(host.home, request.appName);
    await ensureDirectory(appDir);
    const siteDir = getSiteDir(host.home, request.appName);
    const steps: StepRecord[] = [];

    steps.push(
      await ensurePresent(`Jekyll site ${INSTALL_LAYOUT.SITE_DIR}`, siteDir, () =>
        runChecked(runner, jekyllContainerCommand(appDir, ['new', INSTALL_LAYOUT.SITE_DIR]))
      )
    );

    steps.push(await ensureWelcomePost(siteDir, now));

    logger.info('Building the Jekyll site...');
    const build = await runChecked(runner, jekyllContainerCommand(siteDir, ['build']));

    logger.success('Jekyll app installation complete.');
    return { siteDir, steps, build: { ok: build.ok, exitCode: build.exitCode } };
  }
}
