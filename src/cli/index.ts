#!/usr/bin/env node
// Course registration acceptance CLI

import { Command } from 'commander';
import { validateCommand } from './commands/validate.js';
import { handleError } from './utils/error-handler.js';

const program = new Command();

program
  .name('course-acceptance')
  .description('Validate course registration pull requests')
  .version('0.1.0');

program.addCommand(validateCommand, { isDefault: true });

program.parseAsync().catch(handleError);
