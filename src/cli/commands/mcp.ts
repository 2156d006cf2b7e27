import type { Command } from 'commander';
import { createRuntime } from '../runtime.js';
import { createMcpServer } from '../../mcp/McpServer.js';
import { startStdioTransport } from '../../mcp/transports/StdioTransport.js';

interface McpOptions {
  repoRoot: string;
}

/**
 * 註冊 mcp 指令
 *
 * 用法：
 *   crossdoc mcp [--repo-root .]
 */
export function registerMcpCommand(program: Command): void {
  program
    .command('mcp')
    .description('Start MCP server for LLM tool integration (stdio)')
    .option('--repo-root <path>', 'Repository root directory', '.')
    .action(async (opts: McpOptions) => {
      const runtime = createRuntime(opts.repoRoot);

      const server = createMcpServer({
        search: runtime.search,
        index: runtime.index,
        collection: runtime.collection,
        repoRoot: runtime.repoRoot,
        collectionRoot: runtime.collectionRoot,
        logger: runtime.logger.child('mcp'),
      });

      // stdio 模式：持續執行直到 stdin 關閉
      await startStdioTransport(server);

      const shutdown = () => {
        runtime.close();
        process.exit(0);
      };
      process.on('SIGINT', shutdown);
      process.on('SIGTERM', shutdown);
    });
}
