// ============================================
// FileArtifactStore
// uploads/{id}/meta.json + uploads/{id}/{file}, charts/{id}.json
// ============================================

import { randomUUID } from 'crypto';
import { type Dirent, promises as fs } from 'fs';
import path from 'path';
import type {
  ArtifactEntry,
  ArtifactKind,
  ArtifactPayloads,
  ArtifactRef,
  ChartPayload,
  ChartRecord,
  FileStats,
  StoredSession,
  UploadArtifact,
  UploadPayload
} from '../../shared/types';
import { type ArtifactStore, isValidSessionId } from './artifactStore';
import { NotFoundError, StorageError, isMissingFileError } from '../../shared/utils/errors';
import { logger, errorMessage } from '../../shared/utils/logger';

const META_FILE = 'meta.json';

// {id}.json for a chart, {id}.json.{nonce}.tmp for one still being written (or abandoned)
const CHART_FILE_PATTERN = /^([A-Za-z0-9_-]{1,128})\.json(\.[A-Za-z0-9-]+\.tmp)?$/;

interface UploadMeta {
  session_id: string;
  created_at: string;
  file_info: UploadArtifact['file_info'];
  data_summary?: UploadArtifact['data_summary'];
}

export class FileArtifactStore implements ArtifactStore {
  readonly root: string;
  private readonly uploadsDir: string;
  private readonly chartsDir: string;
  private readonly clock: () => number;

  constructor(root: string, clock: () => number = Date.now) {
    this.root = root;
    this.uploadsDir = path.join(root, 'uploads');
    this.chartsDir = path.join(root, 'charts');
    this.clock = clock;
  }

  async init(): Promise<void> {
    try {
      await fs.mkdir(this.uploadsDir, { recursive: true });
      await fs.mkdir(this.chartsDir, { recursive: true });
      logger.info('📂 Temp directories ready', {
        uploads: this.uploadsDir,
        charts: this.chartsDir
      });
    } catch (error) {
      throw new StorageError(`Cannot prepare temp directory ${this.root}`, { cause: error });
    }
  }

  // ============================================
  // Writes
  // ============================================

  async put<K extends ArtifactKind>(sessionId: string, kind: K, payload: ArtifactPayloads[K]): Promise<ArtifactRef>;
  async put(sessionId: string, kind: ArtifactKind, payload: UploadPayload | ChartPayload): Promise<ArtifactRef> {
    this.assertSessionId(sessionId);

    if (kind === 'upload' && 'data' in payload) {
      return this.putUpload(sessionId, payload);
    }
    if (kind === 'chart' && 'charts' in payload) {
      return this.putChart(sessionId, payload);
    }
    throw new StorageError(`Payload does not match artifact kind ${kind}`, { sessionId });
  }

  private async putUpload(sessionId: string, payload: UploadPayload): Promise<ArtifactRef> {
    const sessionDir = path.join(this.uploadsDir, sessionId);
    const storedFilename = cleanFilename(payload.filename);
    const createdAt = this.clock();

    const meta: UploadMeta = {
      session_id: sessionId,
      created_at: new Date(createdAt).toISOString(),
      file_info: {
        original_filename: payload.filename,
        stored_filename: storedFilename,
        size: payload.data.length,
        content_type: payload.contentType
      },
      data_summary: payload.summary
    };

    try {
      await fs.mkdir(sessionDir, { recursive: true });
      // Timestamp lands before the file so a listing never sees an undated session
      await fs.writeFile(path.join(sessionDir, META_FILE), JSON.stringify(meta, null, 2), 'utf-8');
      await fs.writeFile(path.join(sessionDir, storedFilename), payload.data);
    } catch (error) {
      throw new StorageError(`Failed to write upload for session ${sessionId}`, { sessionId, cause: error });
    }

    logger.debug('💾 Upload artifact written', { sessionId, file: storedFilename, size: payload.data.length });

    return { sessionId, kind: 'upload', createdAt, location: sessionDir };
  }

  private async putChart(sessionId: string, payload: ChartPayload): Promise<ArtifactRef> {
    const meta = await this.readUploadMeta(sessionId);
    if (!meta) {
      throw new NotFoundError(`Session ${sessionId} does not exist`);
    }

    const createdAt = Date.parse(meta.created_at);
    const chartPath = this.chartPath(sessionId);
    const record: ChartRecord = {
      session_id: sessionId,
      created_at: meta.created_at,
      updated_at: new Date(this.clock()).toISOString(),
      model_used: payload.modelUsed,
      charts: payload.charts,
      generation_time_ms: payload.generationTimeMs
    };

    const tmpPath = `${chartPath}.${randomUUID()}.tmp`;
    try {
      await fs.writeFile(tmpPath, JSON.stringify(record, null, 2), 'utf-8');
      await fs.rename(tmpPath, chartPath);
    } catch (error) {
      await this.removeFile(tmpPath);
      // A concurrent delete swept the tmp file away with the session
      if (isMissingFileError(error) && !(await this.readUploadMeta(sessionId))) {
        throw new NotFoundError(`Session ${sessionId} does not exist`);
      }
      throw new StorageError(`Failed to write charts for session ${sessionId}`, { sessionId, cause: error });
    }

    // A delete that ran between the metadata read and the rename leaves an orphaned chart
    if (!(await this.readUploadMeta(sessionId))) {
      await this.removeFile(chartPath);
      throw new NotFoundError(`Session ${sessionId} does not exist`);
    }

    logger.debug('💾 Chart artifact written', { sessionId, charts: payload.charts.length });

    return { sessionId, kind: 'chart', createdAt, location: chartPath };
  }

  // ============================================
  // Reads
  // ============================================

  async get(sessionId: string): Promise<StoredSession | null> {
    if (!isValidSessionId(sessionId)) {
      return null;
    }

    // Charts never outlive their upload
    const meta = await this.readUploadMeta(sessionId);
    if (!meta) {
      return null;
    }
    const chart = await this.readChartRecord(sessionId);

    return {
      sessionId,
      createdAt: Date.parse(meta.created_at),
      upload: {
        location: path.join(this.uploadsDir, sessionId),
        file_info: meta.file_info,
        data_summary: meta.data_summary
      },
      chart: chart ?? undefined
    };
  }

  async list(): Promise<ArtifactEntry[]> {
    const entries: ArtifactEntry[] = [];

    const sessionDirs = await this.readDir(this.uploadsDir);
    for (const dirent of sessionDirs) {
      const sessionId = dirent.name;
      if (!dirent.isDirectory() || !isValidSessionId(sessionId)) continue;

      const createdAt = await this.uploadCreatedAt(sessionId);
      if (createdAt !== null) {
        entries.push({ sessionId, kind: 'upload', createdAt });
      }
    }

    const chartFiles = await this.readDir(this.chartsDir);
    for (const dirent of chartFiles) {
      const match = dirent.isFile() ? CHART_FILE_PATTERN.exec(dirent.name) : null;
      if (!match) continue;

      const sessionId = match[1];
      const createdAt = match[2]
        ? await this.fallbackCreatedAt(sessionId, path.join(this.chartsDir, dirent.name))
        : await this.chartCreatedAt(sessionId);
      if (createdAt !== null) {
        entries.push({ sessionId, kind: 'chart', createdAt });
      }
    }

    return entries;
  }

  async stats(): Promise<FileStats> {
    const sessionDirs = await this.readDir(this.uploadsDir);
    const chartFiles = await this.readDir(this.chartsDir);

    return {
      active_sessions: sessionDirs.filter(dirent => dirent.isDirectory() && isValidSessionId(dirent.name)).length,
      total_chart_files: chartFiles.filter(isFinishedChartFile).length,
      temp_dir: this.root
    };
  }

  // ============================================
  // Removal
  // ============================================

  async delete(sessionId: string): Promise<boolean> {
    if (!isValidSessionId(sessionId)) {
      return false;
    }

    const sessionDir = path.join(this.uploadsDir, sessionId);
    const chartPath = this.chartPath(sessionId);

    const leftovers = await this.abandonedChartFiles(sessionId);
    const hadUpload = await this.exists(sessionDir);
    const hadChart = (await this.exists(chartPath)) || leftovers.length > 0;

    try {
      // force: a concurrent delete that got there first is not an error
      await fs.rm(sessionDir, { recursive: true, force: true });
      await fs.rm(chartPath, { force: true });
      for (const file of leftovers) {
        await fs.rm(file, { force: true });
      }
    } catch (error) {
      throw new StorageError(`Failed to delete session ${sessionId}`, { sessionId, cause: error });
    }

    if (hadUpload || hadChart) {
      logger.debug('🗑️ Session artifacts deleted', { sessionId, upload: hadUpload, chart: hadChart });
    }

    return hadUpload || hadChart;
  }

  // ============================================
  // Helpers
  // ============================================

  private chartPath(sessionId: string): string {
    return path.join(this.chartsDir, `${sessionId}.json`);
  }

  private assertSessionId(sessionId: string): void {
    if (!isValidSessionId(sessionId)) {
      throw new StorageError(`Invalid session id: ${sessionId}`, { sessionId });
    }
  }

  private async readDir(dir: string): Promise<Dirent[]> {
    try {
      return await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      throw new StorageError(`Artifact directory unavailable: ${dir}`, { cause: error });
    }
  }

  private async abandonedChartFiles(sessionId: string): Promise<string[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.chartsDir);
    } catch (error) {
      if (isMissingFileError(error)) return [];
      throw new StorageError(`Artifact directory unavailable: ${this.chartsDir}`, { cause: error });
    }

    return names
      .filter(name => CHART_FILE_PATTERN.exec(name)?.[1] === sessionId && name.endsWith('.tmp'))
      .map(name => path.join(this.chartsDir, name));
  }

  private async removeFile(target: string): Promise<void> {
    try {
      await fs.rm(target, { force: true });
    } catch (error) {
      logger.warn('⚠️ Could not remove chart file', { path: target, error: errorMessage(error) });
    }
  }

  private async exists(target: string): Promise<boolean> {
    try {
      await fs.stat(target);
      return true;
    } catch (error) {
      if (isMissingFileError(error)) return false;
      throw new StorageError(`Cannot inspect ${target}`, { cause: error });
    }
  }

  private async readJson<T>(file: string): Promise<T | null> {
    try {
      const raw = await fs.readFile(file, 'utf-8');
      const parsed: T = JSON.parse(raw);
      return parsed;
    } catch (error) {
      if (isMissingFileError(error)) return null;
      if (error instanceof SyntaxError) {
        logger.warn('Unreadable artifact metadata', { file, error: error.message });
        return null;
      }
      throw new StorageError(`Cannot read ${file}`, { cause: error });
    }
  }

  private readUploadMeta(sessionId: string): Promise<UploadMeta | null> {
    return this.readJson<UploadMeta>(path.join(this.uploadsDir, sessionId, META_FILE));
  }

  private readChartRecord(sessionId: string): Promise<ChartRecord | null> {
    return this.readJson<ChartRecord>(this.chartPath(sessionId));
  }

  private async uploadCreatedAt(sessionId: string): Promise<number | null> {
    const meta = await this.readUploadMeta(sessionId);
    const stored = meta ? Date.parse(meta.created_at) : Number.NaN;
    if (Number.isFinite(stored)) {
      return stored;
    }
    return this.fallbackCreatedAt(sessionId, path.join(this.uploadsDir, sessionId));
  }

  private async chartCreatedAt(sessionId: string): Promise<number | null> {
    const record = await this.readChartRecord(sessionId);
    const stored = record ? Date.parse(record.created_at) : Number.NaN;
    if (Number.isFinite(stored)) {
      return stored;
    }
    return this.fallbackCreatedAt(sessionId, this.chartPath(sessionId));
  }

  /**
   * Artifacts without a stored timestamp age from their mtime
   */
  private async fallbackCreatedAt(sessionId: string, target: string): Promise<number | null> {
    try {
      const stats = await fs.stat(target);
      logger.warn('⚠️ Artifact has no stored creation time, using mtime', {
        sessionId,
        path: target
      });
      return stats.mtimeMs;
    } catch (error) {
      // Deleted while we were listing
      if (isMissingFileError(error)) return null;
      logger.error('Cannot stat artifact', { sessionId, path: target, error: errorMessage(error) });
      return null;
    }
  }
}

function isFinishedChartFile(dirent: Dirent): boolean {
  const match = CHART_FILE_PATTERN.exec(dirent.name);
  return dirent.isFile() && match !== null && match[2] === undefined;
}

/**
 * Strip directories and anything outside a conservative character set
 */
export function cleanFilename(filename: string): string {
  const base = path.basename(filename.replace(/\\/g, '/'));
  const cleaned = base
    .replace(/[^A-Za-z0-9._-]+/g, '_')
    .replace(/^\.+/, '')
    .slice(0, 200);

  if (!cleaned || cleaned === META_FILE) {
    return `upload${path.extname(base).toLowerCase()}`;
  }
  return cleaned;
}
