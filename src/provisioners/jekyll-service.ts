/**
 * Post-install helpers for the native Jekyll site: start/stop scripts,
 * a README with next steps, and a crontab entry that keeps `jekyll serve` up.
 */

import { randomBytes } from 'crypto';
import { chmod, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { getLogger } from '../utils/logger.js';
import { runUnchecked } from '../utils/exec.js';
import type { CommandRunner } from '../utils/exec.js';
import { INSTALL_LAYOUT } from '../utils/paths.js';
import type { StepRecord } from './types.js';

export const SERVICE_FILES = {
  START_SCRIPT: 'start_jekyll',
  STOP_SCRIPT: 'stop_jekyll',
  README: 'README',
  PID_FILE: 'jekyll.pid',
  LOG_FILE: 'jekyll.log',
} as const;

export function renderStartScript(appDir: string): string {
  const site = `$APPDIR/${INSTALL_LAYOUT.SITE_DIR}`;
  return `#!/bin/bash
APPDIR=${appDir}
cd ${site}
# Start Jekyll serve in the background and write the PID to a file.
nohup bundle exec jekyll serve > ${site}/${SERVICE_FILES.LOG_FILE} 2>&1 &
echo $! > ${site}/${SERVICE_FILES.PID_FILE}
echo "Jekyll server started."
`;
}

export function renderStopScript(appDir: string): string {
  return `#!/bin/bash
APPDIR=${appDir}
PIDFILE=$APPDIR/${INSTALL_LAYOUT.SITE_DIR}/${SERVICE_FILES.PID_FILE}
if [ -f "$PIDFILE" ]; then
    kill $(cat "$PIDFILE")
    rm -f "$PIDFILE"
    echo "Jekyll server stopped."
else
    echo "Jekyll server is not running (no PID file found)."
fi
`;
}

export function renderReadme(appDir: string): string {
  const siteDir = join(appDir, INSTALL_LAYOUT.SITE_DIR);
  return `# Jekyll Demo Site README

## Post-install Steps

1. To preview your Jekyll site, execute:

       ${join(appDir, SERVICE_FILES.START_SCRIPT)}

   This will start the Jekyll server (running in the background).

2. To stop the server, execute:

       ${join(appDir, SERVICE_FILES.STOP_SCRIPT)}

3. Your generated site files are located in:

       ${join(siteDir, '_site')}

4. Edit your Jekyll site by modifying files in the ${INSTALL_LAYOUT.SITE_DIR} directory.
   To add more posts, add markdown files to the ${INSTALL_LAYOUT.SITE_DIR}/_posts directory.

5. For further customization, refer to the [Jekyll documentation](https://jekyllrb.com/docs/).

Enjoy your new Jekyll demo site!
`;
}

async function writeWithMode(path: string, contents: string, mode: number): Promise<void> {
  await writeFile(path, contents, 'utf-8');
  await chmod(path, mode);
  getLogger().debug(`Created file ${path} with permissions ${mode.toString(8)}`);
}

/**
 * Rewritten on every run so the scripts always point at the current app dir
 */
export async function writeServiceFiles(appDir: string): Promise<string[]> {
  const written = [
    join(appDir, SERVICE_FILES.START_SCRIPT),
    join(appDir, SERVICE_FILES.STOP_SCRIPT),
    join(appDir, SERVICE_FILES.README),
  ];
  await writeWithMode(written[0], renderStartScript(appDir), 0o700);
  await writeWithMode(written[1], renderStopScript(appDir), 0o700);
  await writeWithMode(written[2], renderReadme(appDir), 0o644);
  return written;
}

/**
 * Ten-minute schedule offset by `minute` (0-9), e.g. 03,13,23,33,43,53
 */
export function buildCronLine(appDir: string, minute: number): string {
  const schedule = [0, 1, 2, 3, 4, 5].map((tens) => `${tens}${minute}`).join(',');
  return `${schedule} * * * * ${join(appDir, SERVICE_FILES.START_SCRIPT)} > /dev/null 2>&1`;
}

/**
 * Append the keep-alive entry to the user's crontab unless one for this
 * app's start script is already installed. A crontab that refuses the
 * new table yields a `failed` record instead of an error.
 */
export async function ensureCronEntry(
  runner: CommandRunner,
  home: string,
  appDir: string,
  minute: number
): Promise<StepRecord> {
  const logger = getLogger();
  const startScript = join(appDir, SERVICE_FILES.START_SCRIPT);
  const step = 'cron job';

  // non-zero exit means the user has no crontab yet
  const current = await runUnchecked(runner, { file: 'crontab', args: ['-l'] });
  const existing = current.ok ? current.stdout.replace(/\n+$/, '') : '';

  if (existing.split('\n').some((line) => line.includes(startScript))) {
    logger.info(`Cron job for ${startScript} already installed. Skipping.`);
    return { step, status: 'skipped', path: startScript };
  }

  const cronLine = buildCronLine(appDir, minute);
  const tmpPath = join(home, `.tmp${randomBytes(10).toString('hex')}`);
  const contents = existing ? `${existing}\n${cronLine}\n` : `${cronLine}\n`;

  await writeFile(tmpPath, contents, 'utf-8');
  const installed = await runUnchecked(runner, { file: 'crontab', args: [tmpPath] }).finally(() =>
    rm(tmpPath, { force: true })
  );

  if (!installed.ok) {
    logger.warn(
      `Could not install the cron job (crontab exited with code ${installed.exitCode})${
        installed.stderr ? `: ${installed.stderr}` : ''
      }. Start the site manually with ${startScript}.`
    );
    return { step, status: 'failed', path: startScript };
  }

  logger.info(`Added cron job: ${cronLine}`);
  return { step, status: 'created', path: startScript };
}
