#!/usr/bin/env node

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { Command, CommanderError } from 'commander';
import { registerIndexCommand } from './commands/index.js';
import { registerAskCommand } from './commands/ask.js';
import { registerDocsCommand } from './commands/docs.js';
import { registerStatsCommand } from './commands/stats.js';
import { registerHealthCommand } from './commands/health.js';
import { registerMcpCommand } from './commands/mcp.js';
import { CrossdocError } from '../domain/errors/DomainErrors.js';

/** 往上找最近的 package.json 讀版本號（原始碼與 dist 的深度不同） */
function readVersion(): string {
  let dir = path.dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const candidate = path.join(dir, 'package.json');
    if (fs.existsSync(candidate)) {
      const pkg: unknown = JSON.parse(fs.readFileSync(candidate, 'utf-8'));
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
      }
    }
    const parent = path.dirname(dir);
    if (parent === dir) return '0.0.0';
    dir = parent;
  }
}

const program = new Command();

program
  .name('crossdoc')
  .description('Cross-document question answering over PDF, text, tabular, spreadsheet, Word and JSON files')
  .version(readVersion());

registerIndexCommand(program);
registerAskCommand(program);
registerDocsCommand(program);
registerStatsCommand(program);
registerHealthCommand(program);
registerMcpCommand(program);

/** 全域錯誤處理 */
program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
        process.exit(0);
      }
      process.exit(err.exitCode);
    }
    if (err instanceof CrossdocError) {
      process.stderr.write(`Error [${err.code}]: ${err.message}\n`);
    } else {
      process.stderr.write(`Error: ${err instanceof Error ? err.message : 'Unknown error'}\n`);
    }
    process.exit(1);
  }
}

void main();
