import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import path from 'node:path';
import { z } from 'zod';
import { GenerationError } from '../../domain/errors/DomainErrors.js';
import { ANALYSIS_DEPTHS } from '../../domain/value-objects/AnalysisDepth.js';
import type { SearchResponse } from '../../application/dto/SearchResponse.js';
import type { McpDependencies } from '../McpServer.js';
import { domainErrorResult, textResult } from './toolResult.js';

const depthSchema = z.enum(['quick', 'standard', 'deep']);

/**
 * MCP Tool: crossdoc_ask
 * 對應 CLI: crossdoc ask <question>
 */
export function registerAskTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'crossdoc_ask',
    `Answer a question from the indexed documents with citations. Depth: ${ANALYSIS_DEPTHS.join(' | ')}`,
    {
      question: z.string().min(1).describe('Question to answer'),
      depth: depthSchema.optional().default('standard').describe('How many documents and excerpts to consult'),
      sourcePaths: z.array(z.string()).optional().describe('Only refresh these files before answering'),
      skipRefresh: z.boolean().optional().default(false).describe('Skip the index freshness sweep'),
    },
    async ({ question, depth, sourcePaths, skipRefresh }) => {
      try {
        const response = await deps.search.comprehensiveSearch({
          question,
          depth,
          sourcePaths: sourcePaths?.map((p) => path.resolve(deps.repoRoot, p)),
          skipFreshness: skipRefresh,
        });
        return textResult(formatAskResponse(response));
      } catch (err) {
        if (err instanceof GenerationError) {
          deps.logger?.warn('Generation failed, returning retrieved context', { error: err.message });
          return {
            content: [{
              type: 'text' as const,
              text: `${err.message}\n\nRetrieved context:\n${err.context}`,
            }],
            isError: true,
          };
        }
        return domainErrorResult(err);
      }
    },
  );
}

export function formatAskResponse(response: SearchResponse): string {
  const lines = [response.answer, '', 'Sources:'];
  for (const c of response.citedDocuments) {
    lines.push(`- ${path.basename(c.sourcePath)} (${c.fileType}): ${c.locations.join(', ')}`);
  }
  if (response.citedDocuments.length === 0) lines.push('- none');

  const { indexMs, searchMs, generationMs } = response.timing;
  lines.push('', `depth: ${response.depth} | index ${indexMs}ms | search ${searchMs}ms | generation ${generationMs}ms`);
  if (response.warnings.length > 0) {
    lines.push(`Warnings: ${response.warnings.join('; ')}`);
  }
  return lines.join('\n');
}
