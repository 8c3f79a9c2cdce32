/**
 * Jekyll demo site provisioner using RubyGems --user-install.
 * The gem bin directory is discovered at runtime from Gem.user_dir.
 * The final build is reported, not enforced: a failed build still lets the
 * workflow send its notifications.
 */

import { join } from 'path';
import { getLogger } from '../utils/logger.js';
import { ProvisioningFailedError } from '../utils/errors.js';
import { runChecked, runUnchecked } from '../utils/exec.js';
import { INSTALL_LAYOUT, getAppDir, getSiteDir } from '../utils/paths.js';
import { ensureDirectory, ensurePresent, ensureWelcomePost } from './steps.js';
import { ensureCronEntry, writeServiceFiles } from './jekyll-service.js';
import type { ProvisionContext, ProvisionOutcome, Provisioner, StepRecord } from './types.js';

export const JEKYLL_GEMS = ['jekyll', 'bundler'] as const;

export class JekyllNativeProvisioner implements Provisioner {
  readonly id = 'jekyll';
  readonly noticeLead = 'Created Jekyll demo site';

  async provision(context: ProvisionContext): Promise<ProvisionOutcome> {
    const logger = getLogger();
    const { request, host, runner, now } = context;

    logger.info('Installing Jekyll and Bundler into your user environment...');
    await runChecked(runner, {
      file: 'gem',
      args: ['install', ...JEKYLL_GEMS, '--user-install'],
      cwd: host.home,
    });

    const gemUserDir = await this.discoverGemUserDir(context);
    const env: Record<string, string> = { PATH: `${join(gemUserDir, 'bin')}:${host.path}` };

    const version = await runChecked(runner, { file: 'jekyll', args: ['-v'], env });
    logger.info(`Jekyll version installed: ${version.stdout}`);

    const appDir = getAppDir(host.home, request.appName);
    await ensureDirectory(appDir);
    const siteDir = getSiteDir(host.home, request.appName);
    const steps: StepRecord[] = [];

    steps.push(
      await ensurePresent(`Jekyll site ${INSTALL_LAYOUT.SITE_DIR}`, siteDir, () =>
        runChecked(runner, { file: 'jekyll', args: ['new', INSTALL_LAYOUT.SITE_DIR], cwd: appDir, env })
      )
    );

    steps.push(await ensureWelcomePost(siteDir, now));

    logger.info('Building the Jekyll site...');
    const build = await runUnchecked(runner, {
      file: 'bundle',
      args: ['exec', 'jekyll', 'build'],
      cwd: siteDir,
      env,
    });

    const serviceFiles = await this.writeServiceFilesOptional(appDir);
    if (serviceFiles) {
      steps.push(serviceFiles);
    }
    const minute = Math.floor(context.random() * 10);
    steps.push(await ensureCronEntry(runner, host.home, appDir, minute));

    logger.success('Jekyll demo site installation complete.');
    return { siteDir, steps, build: { ok: build.ok, exitCode: build.exitCode } };
  }

  /**
   * Start/stop scripts and README are conveniences; failing to write them
   * is logged and recorded, not thrown
   */
  private async writeServiceFilesOptional(appDir: string): Promise<StepRecord | undefined> {
    try {
      await writeServiceFiles(appDir);
      return undefined;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      getLogger().warn(`Could not write the start/stop scripts: ${reason}`);
      return { step: 'service files', status: 'failed', path: appDir };
    }
  }

  private async discoverGemUserDir(context: ProvisionContext): Promise<string> {
    const result = await runChecked(context.runner, {
      file: 'ruby',
      args: ['-r', 'rubygems', '-e', 'puts Gem.user_dir'],
    });
    const dir = result.stdout.trim();
    if (!dir) {
      throw new ProvisioningFailedError('Could not determine the RubyGems user directory');
    }
    getLogger().debug(`Gem user directory: ${dir}`);
    return dir;
  }
}
