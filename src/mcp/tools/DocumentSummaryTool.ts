import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { McpDependencies } from '../McpServer.js';
import { domainErrorResult, textResult } from './toolResult.js';

/**
 * MCP Tool: crossdoc_document_summary
 * 對應 CLI: crossdoc docs show <id>
 */
export function registerDocumentSummaryTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'crossdoc_document_summary',
    'Show the summary, topics and structure of one indexed document',
    {
      document: z.string().min(1).describe('Document id (doc_...) or file name'),
    },
    async ({ document }) => {
      try {
        const summary = deps.collection.getDocumentSummary(document);
        return textResult([
          `${summary.documentId} ${summary.sourcePath}`,
          `type: ${summary.fileType} | chunks: ${summary.chunkCount}`,
          `topics: ${summary.topics.join(', ') || '(none)'}`,
          '',
          summary.summaryText,
          '',
          `structure: ${JSON.stringify(summary.structure)}`,
        ].join('\n'));
      } catch (err) {
        return domainErrorResult(err);
      }
    },
  );
}
