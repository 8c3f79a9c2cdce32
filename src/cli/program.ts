import { Command } from 'commander';
import type { ProvisionerId } from '../provisioners/types.js';
import type { CliOptions, InstallAction } from './types.js';

const VARIANTS: { id: ProvisionerId; description: string }[] = [
  { id: 'hugo', description: 'Install Go and Hugo extended, then create a Hugo demo site' },
  { id: 'jekyll', description: 'Install Jekyll with RubyGems --user-install, then create a Jekyll demo site' },
  { id: 'jekyll-docker', description: 'Create a Jekyll demo site using the jekyll/jekyll container image' },
];

/**
 * Build the program; `action` receives the variant and raw options.
 * Required values are checked later so every missing one is reported together.
 */
export function createProgram(action: InstallAction): Command {
  const program = new Command();

  program
    .name('ssg-install')
    .description('Provision a static-site generator demo in a control-panel app directory')
    .version('0.1.0');

  for (const variant of VARIANTS) {
    program
      .command(variant.id)
      .description(variant.description)
      .option('-i, --uuid <uuid>', 'App UUID, used to make API calls to the control panel')
      .option('-n, --name <appName>', 'Application name, must match the name in the control panel')
      .option('-t, --token <token>', 'Control panel API token (default: $OPAL_TOKEN)')
      .option('--verbose', 'Enable verbose logging')
      .allowUnknownOption()
      .allowExcessArguments()
      .action(async (options: CliOptions) => {
        await action(variant.id, options);
      });
  }

  return program;
}
