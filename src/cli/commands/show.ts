// Show command - print one stored roadmap

import { Command } from 'commander';
import { validateRoadmapId } from '../../core/validation.js';
import { GlobalOptions, withServices } from '../utils/context.js';
import { withErrorHandling } from '../utils/error-handler.js';
import { formatRoadmapText } from '../utils/format.js';

export const showCommand = new Command('show')
  .description('Show a stored roadmap')
  .argument('<id>', 'Roadmap ID')
  .option('--json', 'Output as JSON')
  .option('--no-chart', 'Leave out the timeline chart')
  .action(withErrorHandling(async (id: string, options: { json?: boolean; chart: boolean }, command: Command) => {
    const roadmapId = validateRoadmapId(id);
    await withServices(command.optsWithGlobals<GlobalOptions>(), async ({ store }) => {
      const result = await store.get(roadmapId);
      const output = options.json ? JSON.stringify(result, null, 2) : formatRoadmapText(result, options.chart);
      console.log(output); // eslint-disable-line no-console
    });
  }));
