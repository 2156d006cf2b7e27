import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { McpDependencies } from '../McpServer.js';
import { textResult } from './toolResult.js';

/**
 * MCP Tool: crossdoc_collection_stats
 * 對應 CLI: crossdoc stats
 */
export function registerCollectionStatsTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'crossdoc_collection_stats',
    'Show document and chunk counts, file types and per-document topics',
    {},
    async () => {
      const analysis = deps.collection.analyzeCollection();
      const types = Object.entries(analysis.typesBreakdown)
        .map(([type, count]) => `${type}=${count}`)
        .join(', ');

      const lines = [
        `Documents: ${analysis.totalDocuments} | Chunks: ${analysis.totalChunks}`,
        `Types: ${types || '(none)'}`,
      ];
      for (const d of analysis.documents) {
        lines.push('', `## ${d.name} (${d.fileType}, ${d.chunkCount} chunks)`);
        if (d.topics.length > 0) lines.push(`topics: ${d.topics.join(', ')}`);
        lines.push(d.summary);
      }
      return textResult(lines.join('\n'));
    },
  );
}
