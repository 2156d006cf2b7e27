export type AnalysisDepth = 'quick' | 'standard' | 'deep';

export const ANALYSIS_DEPTHS: readonly AnalysisDepth[] = ['quick', 'standard', 'deep'];

export interface DepthParameters {
  numDocuments: number;
  numChunks: number;
}

export type DepthTable = Record<AnalysisDepth, DepthParameters>;

export const DEFAULT_DEPTHS: DepthTable = {
  quick: { numDocuments: 2, numChunks: 5 },
  standard: { numDocuments: 3, numChunks: 8 },
  deep: { numDocuments: 5, numChunks: 15 },
};

export function isAnalysisDepth(value: string): value is AnalysisDepth {
  return ANALYSIS_DEPTHS.some((d) => d === value);
}
