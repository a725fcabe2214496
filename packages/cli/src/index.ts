#!/usr/bin/env node
import { Command } from 'commander';
import { createRequire } from 'node:module';
import { registerInitCommand } from './commands/init.js';
import { registerClassifyCommand } from './commands/classify.js';
import { registerAskCommand } from './commands/ask.js';
import { registerLoadCommand } from './commands/load.js';
import { registerStatusCommand } from './commands/status.js';
import { registerServeCommand } from './commands/serve.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

const program = new Command();
program
  .name('papergraph')
  .description('PaperGraph: question answering over a research paper knowledge graph')
  .version(pkg.version);

registerInitCommand(program);
registerClassifyCommand(program);
registerAskCommand(program);
registerLoadCommand(program);
registerStatusCommand(program);
registerServeCommand(program);

program.parse();
