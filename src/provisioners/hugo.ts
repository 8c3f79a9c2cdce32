/**
 * Hugo demo site provisioner
 * Installs a user-only Go toolchain, builds Hugo extended from source,
 * scaffolds demo-site with the Ananke theme as a git submodule and builds it.
 */

import { appendFile, mkdir, rename, rm } from 'fs/promises';
import { join } from 'path';
import { getLogger } from '../utils/logger.js';
import { ProvisioningFailedError } from '../utils/errors.js';
import { runChecked } from '../utils/exec.js';
import { INSTALL_LAYOUT, getAppDir, getSiteDir, getUserBinDir } from '../utils/paths.js';
import { ensureDirectory, ensurePresent } from './steps.js';
import type { ProvisionContext, ProvisionOutcome, Provisioner, StepRecord } from './types.js';

export const HUGO_TOOLCHAIN = {
  GO_VERSION: '1.23.0',
  GO_DOWNLOAD_BASE: 'https://go.dev/dl',
  GO_PLATFORM: 'linux-amd64',
  HUGO_MODULE: 'github.com/gohugoio/hugo@latest',
  HUGO_BUILD_TAGS: 'extended,withdeploy',
  THEME_NAME: 'ananke',
  THEME_REPO: 'https://github.com/theNewDynamic/gohugo-theme-ananke.git',
  SITE_CONFIG: 'config.toml',
  SAMPLE_POST: 'posts/my-first-post.md',
} as const;

interface HugoToolchain {
  hugoBin: string;
  env: Record<string, string>;
}

export class HugoProvisioner implements Provisioner {
  readonly id = 'hugo';
  readonly noticeLead = 'Created Hugo demo site';

  async provision(context: ProvisionContext): Promise<ProvisionOutcome> {
    const logger = getLogger();
    const { request, host, runner } = context;

    logger.phaseStart('toolchain');
    const { hugoBin, env } = await this.installToolchain(context);

    logger.phaseStart('site');
    const appDir = getAppDir(host.home, request.appName);
    await ensureDirectory(appDir);
    const siteDir = getSiteDir(host.home, request.appName);
    const steps: StepRecord[] = [];

    steps.push(
      await ensurePresent(`Hugo site ${INSTALL_LAYOUT.SITE_DIR}`, siteDir, () =>
        runChecked(runner, { file: hugoBin, args: ['new', 'site', INSTALL_LAYOUT.SITE_DIR], cwd: appDir, env })
      )
    );

    // submodules need a repository
    steps.push(
      await ensurePresent('git repository', join(siteDir, '.git'), () =>
        runChecked(runner, { file: 'git', args: ['init'], cwd: siteDir, env })
      )
    );

    steps.push(
      await ensurePresent(
        `${HUGO_TOOLCHAIN.THEME_NAME} theme`,
        join(siteDir, 'themes', HUGO_TOOLCHAIN.THEME_NAME),
        async () => {
          await runChecked(runner, {
            file: 'git',
            args: ['submodule', 'add', HUGO_TOOLCHAIN.THEME_REPO, `themes/${HUGO_TOOLCHAIN.THEME_NAME}`],
            cwd: siteDir,
            env,
          });
          await appendFile(
            join(siteDir, HUGO_TOOLCHAIN.SITE_CONFIG),
            `theme = "${HUGO_TOOLCHAIN.THEME_NAME}"\n`,
            'utf-8'
          );
        }
      )
    );

    steps.push(
      await ensurePresent('sample post', join(siteDir, 'content', HUGO_TOOLCHAIN.SAMPLE_POST), () =>
        runChecked(runner, { file: hugoBin, args: ['new', HUGO_TOOLCHAIN.SAMPLE_POST], cwd: siteDir, env })
      )
    );

    logger.info('Building Hugo site...');
    const build = await runChecked(runner, { file: hugoBin, cwd: siteDir, env });

    logger.success('Hugo demo site installation complete.');
    return { siteDir, steps, build: { ok: build.ok, exitCode: build.exitCode } };
  }

  /**
   * Reinstalls Go and Hugo on every run; there is no version check.
   */
  private async installToolchain(context: ProvisionContext): Promise<HugoToolchain> {
    const logger = getLogger();
    const { host, runner, download } = context;
    const { GO_VERSION, GO_DOWNLOAD_BASE, GO_PLATFORM } = HUGO_TOOLCHAIN;

    const binDir = getUserBinDir(host.home);
    await ensureDirectory(binDir);

    const tarball = `go${GO_VERSION}.${GO_PLATFORM}.tar.gz`;
    const tarballPath = join(host.home, tarball);
    await download(`${GO_DOWNLOAD_BASE}/${tarball}`, tarballPath);

    logger.info('Extracting Go...');
    await runChecked(runner, { file: 'tar', args: ['-xzf', tarball], cwd: host.home });

    const goRoot = join(host.home, `.go-${GO_VERSION}`);
    try {
      await rm(goRoot, { recursive: true, force: true });
      await rename(join(host.home, 'go'), goRoot);
      await rm(tarballPath, { force: true });
    } catch (error) {
      throw ProvisioningFailedError.fromStep('Installing Go', error);
    }

    const goPath = join(host.home, '.gopath');
    await mkdir(join(goPath, 'bin'), { recursive: true });

    const env: Record<string, string> = {
      GOROOT: goRoot,
      GOPATH: goPath,
      PATH: [join(goRoot, 'bin'), join(goPath, 'bin'), binDir, host.path].join(':'),
    };
    const goBin = join(goRoot, 'bin', 'go');

    const goVersion = await runChecked(runner, { file: goBin, args: ['version'], env });
    logger.info(`Go version: ${goVersion.stdout}`);

    logger.info('Installing Hugo extended...');
    await runChecked(runner, {
      file: goBin,
      args: ['install', '-tags', HUGO_TOOLCHAIN.HUGO_BUILD_TAGS, HUGO_TOOLCHAIN.HUGO_MODULE],
      cwd: host.home,
      env: { ...env, CGO_ENABLED: '1' },
    });

    const hugoBin = join(binDir, 'hugo');
    try {
      await rename(join(goPath, 'bin', 'hugo'), hugoBin);
    } catch (error) {
      throw ProvisioningFailedError.fromStep('Relocating the hugo binary', error);
    }

    const hugoVersion = await runChecked(runner, { file: hugoBin, args: ['version'], env });
    logger.info(`Hugo version: ${hugoVersion.stdout}`);

    return { hugoBin, env };
  }
}
