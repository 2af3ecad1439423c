// Generate command - create a roadmap from the command line

import { Command } from 'commander';
import { GlobalOptions, withServices } from '../utils/context.js';
import { withErrorHandling, success } from '../utils/error-handler.js';
import { formatRoadmapText } from '../utils/format.js';

interface GenerateOptions {
  name?: string;
  size?: string;
  industry?: string;
  maturity?: string;
  goals?: string;
  json?: boolean;
}

/**
 * Maps command options onto the form field names the web form submits
 */
export function toRawForm(options: GenerateOptions): Record<string, unknown> {
  return {
    organization_name: options.name,
    organization_size: options.size,
    industry: options.industry,
    ai_maturity: options.maturity,
    goals: options.goals
      ?.split(',')
      .map(goal => goal.trim())
      .filter(goal => goal !== '')
  };
}

export function registerGenerateCommand(program: Command): void {
  program
    .command('generate')
    .description('Generate and store a roadmap')
    .option('-n, --name <name>', 'Organization name')
    .option('-s, --size <size>', 'Organization size (small, medium, large, enterprise)')
    .option('-i, --industry <industry>', 'Industry')
    .option('-m, --maturity <level>', 'AI maturity (none, exploring, piloting, scaling)')
    .option('-g, --goals <goals>', 'Comma-separated goals, e.g. automation,efficiency')
    .option('--json', 'Print the stored roadmap as JSON')
    .action(withErrorHandling(async (options: GenerateOptions, command: Command) => {
      await withServices(command.optsWithGlobals<GlobalOptions>(), async ({ submissions }) => {
        const result = await submissions.handleSubmit(toRawForm(options));

        if (options.json) {
          console.log(JSON.stringify(result, null, 2)); // eslint-disable-line no-console
          return;
        }
        success(`Stored roadmap #${result.id}`);
        console.log(`\n${formatRoadmapText(result)}`); // eslint-disable-line no-console
      });
    }));
}
