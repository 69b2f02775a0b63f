import type {
  ChartGenerationRequest,
  ChartGenerationResult,
  ChartGenerator
} from '../../src/server/charts/chartGenerator';

/**
 * Deterministic stand-in for the LLM client
 */
export class FakeChartGenerator implements ChartGenerator {
  readonly requests: ChartGenerationRequest[] = [];
  beforeReply?: () => Promise<void>;

  getProviderName(): string {
    return 'fake';
  }

  async generateCharts(request: ChartGenerationRequest): Promise<ChartGenerationResult> {
    this.requests.push(request);
    if (this.beforeReply) {
      await this.beforeReply();
    }
    return {
      charts: [{ id: 'c1', title: 'Revenue by region', type: 'bar', option: { series: [] } }],
      modelUsed: request.model ?? 'fake-model'
    };
  }
}
