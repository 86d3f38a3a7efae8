#!/usr/bin/env node
import { program } from './cli/index.js';
import { fail } from './cli/context.js';

program.parseAsync(process.argv).catch(fail);
