#!/usr/bin/env node
import { buildProgram } from './cli/program.js';
import { consoleCommand } from './cli/console.js';

await buildProgram(consoleCommand).parseAsync();
