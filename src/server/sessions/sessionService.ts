// ============================================
// SessionService
// Request path: create, read and chart sessions
// ============================================

import { randomUUID } from 'crypto';
import path from 'path';
import type { ArtifactStore } from '../storage/artifactStore';
import type { SessionRegistry } from './sessionRegistry';
import type { ChartGenerator } from '../charts/chartGenerator';
import { summarizeCsv } from '../charts/dataSummary';
import { summarizeWorkbook } from '../charts/spreadsheet';
import type { ChartRecord, DataSummary, FileInfo, ModelInfo, SessionView } from '../../shared/types';
import {
  BadRequestError,
  ErrorCode,
  FileValidationError,
  NotFoundError,
  ServiceUnavailableError
} from '../../shared/utils/errors';
import { logger } from '../../shared/utils/logger';

export interface UploadInput {
  filename: string;
  contentType?: string;
  data: Buffer;
}

export interface UploadResult {
  session_id: string;
  created_at: string;
  file_info: FileInfo;
  data_summary: DataSummary;
}

export interface SessionServiceOptions {
  maxUploadBytes: number;
  allowedExtensions: string[];
  /** Models a chart request may name; the first is the default */
  models: string[];
}

const CONTENT_TYPES: Record<string, string> = {
  '.csv': 'text/csv',
  '.xlsx': 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet'
};

export class SessionService {
  private readonly store: ArtifactStore;
  private readonly registry: SessionRegistry;
  private readonly chartGenerator: ChartGenerator | null;
  private readonly options: SessionServiceOptions;

  constructor(
    store: ArtifactStore,
    registry: SessionRegistry,
    chartGenerator: ChartGenerator | null,
    options: SessionServiceOptions
  ) {
    this.store = store;
    this.registry = registry;
    this.chartGenerator = chartGenerator;
    this.options = options;
  }

  /**
   * Validate, summarize and persist an upload as a new session
   */
  async createSession(input: UploadInput): Promise<UploadResult> {
    const extension = this.validateFile(input.filename, input.data.length);
    const contentType = input.contentType || CONTENT_TYPES[extension] || 'application/octet-stream';

    const summary = extension === '.xlsx'
      ? await summarizeWorkbook(input.data)
      : summarizeCsv(input.data.toString('utf-8'));
    const sessionId = randomUUID();

    const ref = await this.store.put(sessionId, 'upload', {
      filename: input.filename,
      contentType,
      data: input.data,
      summary
    });

    await this.registry.register({ sessionId, createdAt: ref.createdAt });

    logger.info('📥 Session created', {
      sessionId,
      file: input.filename,
      size: input.data.length,
      rows: summary.row_count,
      columns: summary.columns.length
    });

    const stored = await this.store.get(sessionId);

    return {
      session_id: sessionId,
      created_at: new Date(ref.createdAt).toISOString(),
      file_info: stored?.upload?.file_info ?? {
        original_filename: input.filename,
        stored_filename: input.filename,
        size: input.data.length,
        content_type: contentType
      },
      data_summary: summary
    };
  }

  /**
   * Models a chart request may name. All unavailable without a chart generator.
   */
  listModels(): ModelInfo[] {
    const generator = this.chartGenerator;
    return this.options.models.map((name, index): ModelInfo => ({
      name,
      provider: generator ? generator.getProviderName() : 'none',
      default: index === 0,
      status: generator ? 'available' : 'unavailable'
    }));
  }

  async getSession(sessionId: string): Promise<SessionView> {
    const stored = await this.store.get(sessionId);
    if (!stored) {
      throw new NotFoundError(`Session ${sessionId} does not exist`);
    }

    return {
      session_id: stored.sessionId,
      created_at: new Date(stored.createdAt).toISOString(),
      file_info: stored.upload?.file_info ?? null,
      data_summary: stored.upload?.data_summary ?? null,
      charts: stored.chart?.charts ?? [],
      model_used: stored.chart?.model_used ?? null
    };
  }

  /**
   * Ask the chart generator for charts and store them as the session's
   * chart artifact. Regenerating replaces the previous record.
   */
  async generateCharts(sessionId: string, options: { model?: string; maxCharts: number }): Promise<ChartRecord> {
    if (!this.chartGenerator) {
      throw new ServiceUnavailableError('Chart generation is not configured');
    }
    if (options.model && !this.options.models.includes(options.model)) {
      throw new BadRequestError(`Unknown model "${options.model}". Available: ${this.options.models.join(', ')}`);
    }

    const stored = await this.store.get(sessionId);
    const summary = stored?.upload?.data_summary;
    if (!stored || !stored.upload) {
      throw new NotFoundError(`Session ${sessionId} does not exist`);
    }
    if (!summary) {
      throw new FileValidationError(ErrorCode.FILE_CONTENT_INVALID, `Session ${sessionId} has no data summary`);
    }

    const startTime = Date.now();
    const result = await this.chartGenerator.generateCharts({
      summary,
      model: options.model,
      maxCharts: options.maxCharts
    });
    const generationTimeMs = Date.now() - startTime;

    // Throws NotFoundError if cleanup removed the session meanwhile
    await this.store.put(sessionId, 'chart', {
      charts: result.charts,
      modelUsed: result.modelUsed,
      generationTimeMs
    });

    const updated = await this.store.get(sessionId);
    if (!updated?.chart) {
      throw new NotFoundError(`Session ${sessionId} does not exist`);
    }

    logger.info('📊 Charts stored', {
      sessionId,
      charts: result.charts.length,
      model: result.modelUsed,
      generationTimeMs
    });

    return updated.chart;
  }

  private validateFile(filename: string, size: number): string {
    const extension = path.extname(filename).toLowerCase();
    if (!this.options.allowedExtensions.includes(extension)) {
      throw new FileValidationError(
        ErrorCode.FILE_FORMAT_UNSUPPORTED,
        `Unsupported file type "${extension || filename}". Allowed: ${this.options.allowedExtensions.join(', ')}`
      );
    }

    if (size === 0) {
      throw new FileValidationError(ErrorCode.FILE_CONTENT_INVALID, 'File is empty');
    }

    if (size > this.options.maxUploadBytes) {
      throw new FileValidationError(
        ErrorCode.FILE_TOO_LARGE,
        `File exceeds the ${(this.options.maxUploadBytes / 1024 / 1024).toFixed(1)}MB limit`
      );
    }

    return extension;
  }
}
