import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import path from 'node:path';
import { z } from 'zod';
import type { McpDependencies } from '../McpServer.js';
import { domainErrorResult, textResult } from './toolResult.js';

/**
 * MCP Tool: crossdoc_index_refresh
 * 對應 CLI: crossdoc index [paths...]
 * 只重新分析內容雜湊改變的檔案。
 */
export function registerIndexRefreshTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'crossdoc_index_refresh',
    'Re-index changed documents: the whole collection root, or only the given paths',
    {
      paths: z.array(z.string()).optional().describe('Files to refresh (relative to the repository root)'),
    },
    async ({ paths }) => {
      try {
        const report = paths && paths.length > 0
          ? await deps.index.ensureFresh(paths.map((p) => path.resolve(deps.repoRoot, p)))
          : await deps.index.ensureFreshDirectory(deps.collectionRoot);

        const lines = [
          `Indexed: ${report.documentsIndexed} | Unchanged: ${report.documentsSkipped} | Removed: ${report.documentsRemoved} | Chunks embedded: ${report.chunksEmbedded} (${report.durationMs}ms)`,
        ];
        for (const f of report.failures) {
          lines.push(`FAILED ${f.path} [${f.code}] ${f.message}`);
        }
        return textResult(lines.join('\n'));
      } catch (err) {
        return domainErrorResult(err);
      }
    },
  );
}
