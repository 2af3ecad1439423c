#!/usr/bin/env node
// AI Roadmap Generator CLI

import { Command } from 'commander';
import { serveCommand } from './commands/serve.js';
import { registerGenerateCommand } from './commands/generate.js';
import { listCommand } from './commands/list.js';
import { showCommand } from './commands/show.js';
import { exportCommand } from './commands/export.js';

const program = new Command();

program
  .name('roadmap')
  .description('AI Roadmap Generator - generate, store and export AI implementation roadmaps')
  .version('0.1.0')
  .option('-c, --config <path>', 'YAML settings file (default: ROADMAP_CONFIG or roadmap.config.yaml)');

program.addCommand(serveCommand);
registerGenerateCommand(program);
program.addCommand(listCommand);
program.addCommand(showCommand);
program.addCommand(exportCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(error); // eslint-disable-line no-console
  process.exit(1);
});
