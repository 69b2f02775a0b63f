// ============================================
// Chart Generator Interface
// Anything that turns a data summary into chart configs
// ============================================

import type { ChartConfig, DataSummary } from '../../shared/types';

export interface ChartGenerationRequest {
  summary: DataSummary;
  model?: string;
  maxCharts: number;
}

export interface ChartGenerationResult {
  charts: ChartConfig[];
  modelUsed: string;
  inputTokens?: number;
  outputTokens?: number;
}

export interface ChartGenerator {
  getProviderName(): string;
  generateCharts(request: ChartGenerationRequest): Promise<ChartGenerationResult>;
}
