/**
 * Site provisioner contract
 */

import type { HostEnvironment, InstallRequest } from '../config/types.js';
import type { CommandRunner } from '../utils/exec.js';

export type ProvisionerId = 'hugo' | 'jekyll' | 'jekyll-docker';

/** `failed` is only recorded for optional steps that do not stop the run */
export type StepStatus = 'created' | 'skipped' | 'failed';

export interface StepRecord {
  step: string;
  status: StepStatus;
  path: string;
}

/**
 * Result of the verification build. Variants with a strict build policy
 * throw instead of returning ok: false.
 */
export interface BuildResult {
  ok: boolean;
  exitCode: number;
}

export interface ProvisionOutcome {
  siteDir: string;
  steps: StepRecord[];
  build: BuildResult;
}

export type Downloader = (url: string, destination: string) => Promise<void>;

export interface ProvisionContext {
  request: InstallRequest;
  host: HostEnvironment;
  runner: CommandRunner;
  download: Downloader;
  now: Date;
  /** Source of randomness in [0, 1), used for the cron minute offset */
  random: () => number;
}

export interface Provisioner {
  readonly id: ProvisionerId;
  /** Opening words of the control-panel notice, e.g. "Created Hugo demo site" */
  readonly noticeLead: string;
  provision(context: ProvisionContext): Promise<ProvisionOutcome>;
}
