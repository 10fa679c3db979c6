#!/usr/bin/env node
/**
 * Miniserver CLI
 */

import { Command } from 'commander';
import { watchCommand } from './commands/watch.mjs';
import { sendCommand } from './commands/send.mjs';

const program = new Command();

program
  .name('miniserver-client')
  .description('Miniserver CLI - stream state events and send commands')
  .version('1.0.0');

program.addCommand(watchCommand);
program.addCommand(sendCommand);

program.parseAsync().catch((err: unknown) => {
  console.error('Error:', err instanceof Error ? err.message : err);
  process.exit(1);
});
