import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import path from 'node:path';
import type { McpDependencies } from '../McpServer.js';
import { textResult } from './toolResult.js';

/**
 * MCP Tool: crossdoc_list_documents
 * 對應 CLI: crossdoc docs list
 */
export function registerListDocumentsTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'crossdoc_list_documents',
    'List the indexed documents with their ids, types and topics',
    {},
    async () => {
      const entries = deps.collection.listDocuments();
      if (entries.length === 0) {
        return textResult('No documents indexed.');
      }
      const lines = [`${entries.length} document(s):`];
      for (const e of entries) {
        lines.push(`- ${e.documentId} ${path.basename(e.sourcePath)} (${e.fileType})`);
        if (e.topics.length > 0) lines.push(`  topics: ${e.topics.slice(0, 10).join(', ')}`);
      }
      return textResult(lines.join('\n'));
    },
  );
}
