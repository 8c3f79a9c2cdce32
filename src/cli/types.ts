/**
 * CLI argument parsing types
 */

import type { ProvisionerId } from '../provisioners/types.js';

export interface CliOptions {
  uuid?: string;
  name?: string;
  token?: string;
  verbose?: boolean;
}

export type InstallAction = (variant: ProvisionerId, options: CliOptions) => Promise<void>;
