#!/usr/bin/env node

/**
 * wiredriver CLI entry point.
 * All logic lives in the library.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerStartCommand, registerStatusCommand, registerSessionsCommand } from './commands.js';

const program = new Command();

program
  .name('wiredriver')
  .description(
    'Launch a JSON Wire Protocol browser driver and talk to it over HTTP.',
  )
  .version('0.1.0');

registerStartCommand(program);
registerStatusCommand(program);
registerSessionsCommand(program);

program.parse();
