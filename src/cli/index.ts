#!/usr/bin/env -S node --import tsx

import { Command } from 'commander';
import { createComposeCommand } from './commands/compose.ts';
import { createBuildCommand } from './commands/build.ts';
import { createScrubCommand } from './commands/scrub.ts';
import { createOptionsCommand } from './commands/options.ts';
import { createConfigCommand } from './commands/config.ts';
import { getVersion } from './utils/get-version.ts';

const program = new Command();

program
  .name('docs-compose')
  .description('Compose documentation settings and assemble the options manual')
  .version(getVersion());

// Register subcommands
program.addCommand(createComposeCommand());
program.addCommand(createBuildCommand());
program.addCommand(createScrubCommand());
program.addCommand(createOptionsCommand());
program.addCommand(createConfigCommand());

await program.parseAsync(process.argv);
