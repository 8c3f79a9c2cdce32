/**
 * Idempotent building blocks shared by the provisioners
 */

import { chmod, mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { getLogger } from '../utils/logger.js';
import { formatDate, formatTimestamp, formatUtcOffset, pathExists } from '../utils/paths.js';
import type { StepRecord } from './types.js';

export const WELCOME_POST = {
  POSTS_DIR: '_posts',
  SLUG: 'welcome-to-jekyll',
  TAGLINE: "Let's get jek yas!",
} as const;

export async function ensureDirectory(path: string): Promise<void> {
  await mkdir(path, { recursive: true });
}

/**
 * Run `create` only when `path` does not exist yet
 */
export async function ensurePresent(
  step: string,
  path: string,
  create: () => Promise<unknown>
): Promise<StepRecord> {
  const logger = getLogger();

  if (await pathExists(path)) {
    logger.info(`${step} already exists at ${path}. Skipping.`);
    return { step, status: 'skipped', path };
  }

  logger.info(`Creating ${step}...`);
  await create();
  return { step, status: 'created', path };
}

export function getWelcomePostPath(siteDir: string, now: Date): string {
  return join(siteDir, WELCOME_POST.POSTS_DIR, `${formatDate(now)}-${WELCOME_POST.SLUG}.md`);
}

export function renderWelcomePost(now: Date): string {
  return [
    '---',
    'layout: post',
    'title:  "Welcome to Jekyll"',
    `date:   ${formatTimestamp(now)} ${formatUtcOffset(now)}`,
    'categories: jekyll demo',
    '---',
    `Hey there! This is your first post on a brand new Jekyll site. ${WELCOME_POST.TAGLINE}`,
    '',
  ].join('\n');
}

/**
 * Write the dated sample post unless today's post is already there
 */
export async function ensureWelcomePost(siteDir: string, now: Date): Promise<StepRecord> {
  const postPath = getWelcomePostPath(siteDir, now);
  return ensurePresent('sample demo post', postPath, async () => {
    await ensureDirectory(join(siteDir, WELCOME_POST.POSTS_DIR));
    await writeFile(postPath, renderWelcomePost(now), 'utf-8');
    await chmod(postPath, 0o644);
  });
}
