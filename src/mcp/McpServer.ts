import { McpServer as SDKMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { SearchUseCase } from '../application/SearchUseCase.js';
import type { IndexUseCase } from '../application/IndexUseCase.js';
import type { CollectionUseCase } from '../application/CollectionUseCase.js';
import type { Logger } from '../shared/Logger.js';
import { registerAskTool } from './tools/AskTool.js';
import { registerListDocumentsTool } from './tools/ListDocumentsTool.js';
import { registerDocumentSummaryTool } from './tools/DocumentSummaryTool.js';
import { registerCollectionStatsTool } from './tools/CollectionStatsTool.js';
import { registerIndexRefreshTool } from './tools/IndexRefreshTool.js';

/**
 * MCP Server Factory
 *
 * 建立 MCP server 實例並註冊所有工具，工具與 CLI 指令一一對應。
 */

export interface McpDependencies {
  search: SearchUseCase;
  index: IndexUseCase;
  collection: CollectionUseCase;
  repoRoot: string;
  collectionRoot: string;
  logger?: Logger;
}

export function createMcpServer(deps: McpDependencies): SDKMcpServer {
  const server = new SDKMcpServer(
    { name: 'crossdoc', version: '0.1.0' },
    { instructions: buildInstructions(deps.repoRoot, deps.collectionRoot) },
  );

  registerAskTool(server, deps);
  registerListDocumentsTool(server, deps);
  registerDocumentSummaryTool(server, deps);
  registerCollectionStatsTool(server, deps);
  registerIndexRefreshTool(server, deps);

  return server;
}

/** 建構 MCP server 的 instructions 文字 */
export function buildInstructions(repoRoot: string, collectionRoot: string): string {
  return [
    'crossdoc: question answering across a collection of PDF, text, CSV/TSV, XLSX, DOCX and JSON documents.',
    '',
    'Available tools:',
    '- crossdoc_ask: Answer a question from the documents, with citations (depth: quick, standard, deep)',
    '- crossdoc_list_documents: List indexed documents with their topics',
    '- crossdoc_document_summary: Summary, topics and structure of one document',
    '- crossdoc_collection_stats: Document and chunk counts per file type',
    '- crossdoc_index_refresh: Re-index changed files (whole collection or given paths)',
    '',
    'Depth guide:',
    '- quick: 2 documents, 5 excerpts. Fact lookups.',
    '- standard: 3 documents, 8 excerpts. Default.',
    '- deep: 5 documents, 15 excerpts. Comparisons across many documents.',
    '',
    'crossdoc_ask refreshes the index before answering, so a separate refresh is rarely needed.',
    '',
    `Repository root: ${repoRoot}`,
    `Collection root: ${collectionRoot}`,
  ].join('\n');
}
