import { beforeEach, describe, expect, it } from 'vitest';
import { SessionService } from '../src/server/sessions/sessionService';
import { MemoryArtifactStore } from '../src/server/storage/memoryArtifactStore';
import { MemorySessionRegistry } from '../src/server/sessions/memorySessionRegistry';
import ExcelJS from 'exceljs';
import {
  BadRequestError,
  FileValidationError,
  NotFoundError,
  ServiceUnavailableError
} from '../src/shared/utils/errors';
import { FakeChartGenerator } from './support/fakeChartGenerator';

const NOW = Date.UTC(2024, 2, 1, 9, 30, 0);
const CSV = Buffer.from('region,revenue\nnorth,10\nsouth,30\n');
const MODELS = ['fake-model', 'other-model'];

describe('SessionService', () => {
  let store: MemoryArtifactStore;
  let registry: MemorySessionRegistry;
  let generator: FakeChartGenerator;
  let service: SessionService;

  beforeEach(() => {
    store = new MemoryArtifactStore('memory://test', () => NOW);
    registry = new MemorySessionRegistry();
    generator = new FakeChartGenerator();
    service = new SessionService(store, registry, generator, {
      maxUploadBytes: 64,
      allowedExtensions: ['.csv'],
      models: MODELS
    });
  });

  it('creates a session with a summary and registers it', async () => {
    const result = await service.createSession({ filename: 'Q1 sales.csv', data: CSV });

    expect(result.session_id).toMatch(/^[0-9a-f-]{36}$/);
    expect(result.created_at).toBe('2024-03-01T09:30:00.000Z');
    expect(result.file_info).toEqual({
      original_filename: 'Q1 sales.csv',
      stored_filename: 'Q1_sales.csv',
      size: CSV.length,
      content_type: 'text/csv'
    });
    expect(result.data_summary.columns).toEqual(['region', 'revenue']);
    await expect(registry.list()).resolves.toEqual([{ sessionId: result.session_id, createdAt: NOW }]);
  });

  it('rejects unsupported, empty and oversized files', async () => {
    await expect(service.createSession({ filename: 'data.xlsx', data: CSV })).rejects.toMatchObject({
      code: 'FILE_001',
      message: 'Unsupported file type ".xlsx". Allowed: .csv'
    });
    await expect(service.createSession({ filename: 'data.csv', data: Buffer.alloc(0) })).rejects.toMatchObject({
      code: 'FILE_003',
      message: 'File is empty'
    });
    await expect(service.createSession({ filename: 'data.csv', data: Buffer.alloc(65, 'a') })).rejects.toBeInstanceOf(
      FileValidationError
    );
    await expect(store.stats()).resolves.toMatchObject({ active_sessions: 0 });
  });

  it('reads a session back', async () => {
    const { session_id: sessionId } = await service.createSession({ filename: 'data.csv', data: CSV });

    const view = await service.getSession(sessionId);

    expect(view).toMatchObject({
      session_id: sessionId,
      created_at: '2024-03-01T09:30:00.000Z',
      charts: [],
      model_used: null
    });
    expect(view.data_summary?.row_count).toBe(2);
  });

  it('throws NotFoundError for unknown sessions', async () => {
    await expect(service.getSession('missing')).rejects.toBeInstanceOf(NotFoundError);
    await expect(service.generateCharts('missing', { maxCharts: 2 })).rejects.toBeInstanceOf(NotFoundError);
  });

  it('stores generated charts on the session', async () => {
    const { session_id: sessionId } = await service.createSession({ filename: 'data.csv', data: CSV });

    const record = await service.generateCharts(sessionId, { model: 'other-model', maxCharts: 3 });

    expect(generator.requests).toHaveLength(1);
    expect(generator.requests[0]).toMatchObject({ model: 'other-model', maxCharts: 3 });
    expect(generator.requests[0].summary.columns).toEqual(['region', 'revenue']);
    expect(record).toMatchObject({
      session_id: sessionId,
      created_at: '2024-03-01T09:30:00.000Z',
      model_used: 'other-model'
    });
    expect((await service.getSession(sessionId)).charts.map(chart => chart.id)).toEqual(['c1']);
  });

  it('does not bring back a session deleted while charts were generated', async () => {
    const { session_id: sessionId } = await service.createSession({ filename: 'data.csv', data: CSV });
    generator.beforeReply = async () => {
      await store.delete(sessionId);
    };

    await expect(service.generateCharts(sessionId, { maxCharts: 2 })).rejects.toBeInstanceOf(NotFoundError);
    await expect(store.get(sessionId)).resolves.toBeNull();
  });

  it('reports chart generation as unavailable without a generator', async () => {
    const withoutLlm = new SessionService(store, registry, null, {
      maxUploadBytes: 64,
      allowedExtensions: ['.csv'],
      models: MODELS
    });
    const { session_id: sessionId } = await withoutLlm.createSession({ filename: 'data.csv', data: CSV });

    await expect(withoutLlm.generateCharts(sessionId, { maxCharts: 2 })).rejects.toBeInstanceOf(
      ServiceUnavailableError
    );
  });

  it('rejects a model outside the configured list', async () => {
    const { session_id: sessionId } = await service.createSession({ filename: 'data.csv', data: CSV });

    const rejection = service.generateCharts(sessionId, { model: 'unknown-model', maxCharts: 2 });

    await expect(rejection).rejects.toBeInstanceOf(BadRequestError);
    await expect(rejection).rejects.toMatchObject({
      code: 'SYS_003',
      message: 'Unknown model "unknown-model". Available: fake-model, other-model'
    });
    expect(generator.requests).toHaveLength(0);
  });

  it('lists models with the first as default', () => {
    expect(service.listModels()).toEqual([
      { name: 'fake-model', provider: 'fake', default: true, status: 'available' },
      { name: 'other-model', provider: 'fake', default: false, status: 'available' }
    ]);

    const withoutLlm = new SessionService(store, registry, null, {
      maxUploadBytes: 64,
      allowedExtensions: ['.csv'],
      models: ['fake-model']
    });
    expect(withoutLlm.listModels()).toEqual([
      { name: 'fake-model', provider: 'none', default: true, status: 'unavailable' }
    ]);
  });

  it('summarizes an uploaded workbook', async () => {
    const workbook = new ExcelJS.Workbook();
    const sheet = workbook.addWorksheet('Data');
    sheet.addRow(['region', 'revenue']);
    sheet.addRow(['north', 10]);
    sheet.addRow(['south', 30]);
    const data = Buffer.from(await workbook.xlsx.writeBuffer());

    const spreadsheets = new SessionService(store, registry, generator, {
      maxUploadBytes: 1024 * 1024,
      allowedExtensions: ['.csv', '.xlsx'],
      models: MODELS
    });
    const result = await spreadsheets.createSession({ filename: 'sales.xlsx', data });

    expect(result.file_info.content_type).toBe('application/vnd.openxmlformats-officedocument.spreadsheetml.sheet');
    expect(result.data_summary.column_types).toEqual({ region: 'categorical', revenue: 'numeric' });
    expect(result.data_summary.row_count).toBe(2);
  });
});
