#!/usr/bin/env node

import { Command } from 'commander';
import { AnalyzeCommand } from './commands/analyze';
import { StatsCommand } from './commands/stats';
import { registerTaskCommands } from './commands/task';

const program = new Command();

program
  .name('revq')
  .description('revq - asynchronous pull request review queue')
  .version('0.1.0');

new AnalyzeCommand().register(program);
registerTaskCommands(program);
new StatsCommand().register(program);

program.parseAsync().catch((error: unknown) => {
  console.error('❌ Fatal error:', error);
  process.exit(1);
});
