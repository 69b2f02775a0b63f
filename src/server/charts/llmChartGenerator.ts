// ============================================
// LLM Chart Generator
// OpenAI-compatible /chat/completions, ECharts options out
// ============================================

import { AxiosError, type AxiosInstance } from 'axios';
import Joi from 'joi';
import { randomUUID } from 'crypto';
import type { ChartConfig, DataSummary } from '../../shared/types';
import type { ChartGenerationRequest, ChartGenerationResult, ChartGenerator } from './chartGenerator';
import { createHttpClient } from './httpClient';
import type { LlmConfig } from '../config';
import { retryWithBackoff, isRetryableRequestError } from '../utils/retryHelper';
import { AppError, ChartGenerationError, ErrorCode } from '../../shared/utils/errors';
import { logger, errorMessage } from '../../shared/utils/logger';

const SYSTEM_PROMPT = [
  'You are a data visualization assistant.',
  'Given a summary of a tabular dataset, propose charts that reveal its most useful patterns.',
  'Reply with a JSON array only. Each element must have:',
  '"title" (string), "type" (bar | line | pie | scatter | area | heatmap),',
  '"option" (a complete Apache ECharts option object using the preview values),',
  '"description" (one sentence) and "data_source" (array of column names).'
].join(' ');

interface ChatCompletionResponse {
  model?: string;
  choices?: Array<{ message?: { content?: string | null } }>;
  usage?: { prompt_tokens?: number; completion_tokens?: number };
}

interface ChartDraft {
  id?: string;
  title: string;
  type: string;
  option: Record<string, unknown>;
  description?: string;
  data_source?: string[];
}

const chartDraftSchema = Joi.object<ChartDraft>({
  id: Joi.string().optional(),
  title: Joi.string().min(1).required(),
  type: Joi.string().min(1).required(),
  option: Joi.object().unknown(true).required(),
  description: Joi.string().allow('').optional(),
  data_source: Joi.array().items(Joi.string()).optional()
});

const chartListSchema = Joi.array<ChartDraft[]>().items(chartDraftSchema).min(1);

export class LlmChartGenerator implements ChartGenerator {
  private readonly httpClient: AxiosInstance;
  private readonly config: LlmConfig;

  constructor(config: LlmConfig, httpClient?: AxiosInstance) {
    this.config = config;
    this.validateConfig();
    this.httpClient = httpClient ?? createHttpClient(config.baseUrl, config.timeoutMs);
  }

  validateConfig(): void {
    if (!this.config.apiKey || this.config.apiKey.trim() === '') {
      throw new Error('LLM API key is required');
    }
  }

  getProviderName(): string {
    return 'openai-compatible';
  }

  async generateCharts(request: ChartGenerationRequest): Promise<ChartGenerationResult> {
    const model = request.model || this.config.model;
    const prompt = buildPrompt(request.summary, request.maxCharts);

    logger.info(`[${this.getProviderName()}] Requesting charts`, {
      model,
      columns: request.summary.columns.length,
      maxCharts: request.maxCharts
    });

    let response: ChatCompletionResponse;
    try {
      response = await retryWithBackoff(
        () => this.complete(model, prompt),
        'Chart generation',
        {
          maxAttempts: this.config.maxRetries,
          shouldRetry: isRetryableRequestError
        }
      );
    } catch (error) {
      throw toChartGenerationError(error);
    }

    const content = response.choices?.[0]?.message?.content;
    if (!content) {
      throw new ChartGenerationError(ErrorCode.LLM_RESPONSE_INVALID, 'LLM returned an empty response');
    }

    const charts = parseChartResponse(content).slice(0, request.maxCharts);

    logger.info(`[${this.getProviderName()}] Charts generated`, {
      model,
      charts: charts.length,
      inputTokens: response.usage?.prompt_tokens,
      outputTokens: response.usage?.completion_tokens
    });

    return {
      charts,
      modelUsed: response.model || model,
      inputTokens: response.usage?.prompt_tokens,
      outputTokens: response.usage?.completion_tokens
    };
  }

  private async complete(model: string, prompt: string): Promise<ChatCompletionResponse> {
    const response = await this.httpClient.post<ChatCompletionResponse>(
      '/chat/completions',
      {
        model,
        temperature: 0.3,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: prompt }
        ]
      },
      {
        headers: { Authorization: `Bearer ${this.config.apiKey}` }
      }
    );
    return response.data;
  }
}

function toChartGenerationError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  const status = error instanceof AxiosError ? error.response?.status : undefined;
  if (status !== undefined && !isRetryableRequestError(error)) {
    return new ChartGenerationError(
      ErrorCode.LLM_API_ERROR,
      `LLM request rejected with status ${status}`,
      errorMessage(error)
    );
  }

  return new ChartGenerationError(
    ErrorCode.LLM_API_ERROR,
    'LLM request failed',
    error instanceof Error ? error.message : undefined
  );
}

export function buildPrompt(summary: DataSummary, maxCharts: number): string {
  const columns = summary.columns
    .map(column => {
      const stats = summary.stats[column];
      const statsText = stats ? ` (min ${stats.min}, max ${stats.max}, mean ${stats.mean})` : '';
      return `- ${column}: ${summary.column_types[column]}${statsText}`;
    })
    .join('\n');

  const preview = [summary.columns, ...summary.preview_rows].map(row => row.join(' | ')).join('\n');

  return [
    `Dataset with ${summary.row_count} rows and ${summary.columns.length} columns.`,
    'Columns:',
    columns,
    'Preview:',
    preview,
    `Propose at most ${maxCharts} charts.`
  ].join('\n');
}

/**
 * Pull the chart array out of a model reply (bare JSON, fenced JSON,
 * or an object with a "charts" key) and validate every element.
 */
export function parseChartResponse(content: string): ChartConfig[] {
  const fenced = content.match(/```(?:json)?\s*([\s\S]*?)```/);
  const body = (fenced ? fenced[1] : content).trim();

  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJson(body));
  } catch (error) {
    throw new ChartGenerationError(
      ErrorCode.LLM_RESPONSE_INVALID,
      'LLM response is not valid JSON',
      error instanceof Error ? error.message : undefined
    );
  }

  const list = isChartEnvelope(parsed) ? parsed.charts : parsed;
  const { error, value } = chartListSchema.validate(list, { stripUnknown: true });

  if (error || !value) {
    throw new ChartGenerationError(
      ErrorCode.LLM_RESPONSE_INVALID,
      'LLM response does not contain valid charts',
      error?.message
    );
  }

  return value.map(draft => ({
    ...draft,
    id: draft.id || randomUUID()
  }));
}

function extractJson(body: string): string {
  if (body.startsWith('[') || body.startsWith('{')) {
    return body;
  }
  const start = body.search(/[[{]/);
  const end = Math.max(body.lastIndexOf(']'), body.lastIndexOf('}'));
  return start >= 0 && end > start ? body.slice(start, end + 1) : body;
}

function isChartEnvelope(value: unknown): value is { charts: unknown } {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && 'charts' in value;
}
