// List command - show stored roadmaps

import { Command } from 'commander';
import { GlobalOptions, withServices } from '../utils/context.js';
import { withErrorHandling } from '../utils/error-handler.js';
import { formatSummaryTable } from '../utils/format.js';

export const listCommand = new Command('list')
  .description('List stored roadmaps, newest first')
  .option('--json', 'Output as JSON')
  .action(withErrorHandling(async (options: { json?: boolean }, command: Command) => {
    await withServices(command.optsWithGlobals<GlobalOptions>(), async ({ store }) => {
      const summaries = await store.listAll();
      const output = options.json ? JSON.stringify(summaries, null, 2) : formatSummaryTable(summaries);
      console.log(output); // eslint-disable-line no-console
    });
  }));
