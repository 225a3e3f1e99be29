#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { forgetCommand } from './commands/forget';
import { runCommand } from './commands/run';
import { statusCommand } from './commands/status';

void yargs(hideBin(process.argv))
  .scriptName('tunnel-provisioner')
  .usage('$0 [command] [options]')
  .command(runCommand)
  .command(statusCommand)
  .command(forgetCommand)
  .strict()
  .help()
  .parse();
