/**
 * Site provisioners, one per supported generator variant
 */

import { HugoProvisioner } from './hugo.js';
import { JekyllDockerProvisioner } from './jekyll-docker.js';
import { JekyllNativeProvisioner } from './jekyll-native.js';
import type { Provisioner, ProvisionerId } from './types.js';

export { HugoProvisioner, HUGO_TOOLCHAIN } from './hugo.js';
export { JekyllDockerProvisioner, JEKYLL_CONTAINER, jekyllContainerCommand } from './jekyll-docker.js';
export { JekyllNativeProvisioner, JEKYLL_GEMS } from './jekyll-native.js';
export { ensurePresent, ensureWelcomePost, renderWelcomePost, getWelcomePostPath, WELCOME_POST } from './steps.js';
export type {
  Provisioner,
  ProvisionerId,
  ProvisionContext,
  ProvisionOutcome,
  BuildResult,
  StepRecord,
  StepStatus,
  Downloader,
} from './types.js';

export function createProvisioner(id: ProvisionerId): Provisioner {
  switch (id) {
    case 'hugo':
      return new HugoProvisioner();
    case 'jekyll':
      return new JekyllNativeProvisioner();
    case 'jekyll-docker':
      return new JekyllDockerProvisioner();
  }
}
