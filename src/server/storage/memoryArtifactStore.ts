// ============================================
// MemoryArtifactStore
// In-memory artifacts for development and tests
// ============================================

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
import { NotFoundError, StorageError } from '../../shared/utils/errors';
import { cleanFilename } from './fileArtifactStore';
import { logger } from '../../shared/utils/logger';

interface MemorySession {
  createdAt: number;
  upload?: UploadArtifact & { data: Buffer };
  chart?: ChartRecord;
}

/**
 * Runs before a session is removed; throw to simulate a failed delete,
 * await to simulate slow storage.
 */
export type DeleteHook = (sessionId: string) => Promise<void> | void;

export class MemoryArtifactStore implements ArtifactStore {
  readonly root: string;
  private sessions: Map<string, MemorySession> = new Map();
  private readonly clock: () => number;
  private deleteHook?: DeleteHook;

  constructor(root: string = 'memory://artifacts', clock: () => number = Date.now) {
    this.root = root;
    this.clock = clock;
  }

  async init(): Promise<void> {
    logger.info('📦 MemoryArtifactStore initialized', { root: this.root });
  }

  setDeleteHook(hook: DeleteHook | undefined): void {
    this.deleteHook = hook;
  }

  async put<K extends ArtifactKind>(sessionId: string, kind: K, payload: ArtifactPayloads[K]): Promise<ArtifactRef>;
  async put(sessionId: string, kind: ArtifactKind, payload: UploadPayload | ChartPayload): Promise<ArtifactRef> {
    if (!isValidSessionId(sessionId)) {
      throw new StorageError(`Invalid session id: ${sessionId}`, { sessionId });
    }

    if (kind === 'upload' && 'data' in payload) {
      const createdAt = this.clock();
      const storedFilename = cleanFilename(payload.filename);
      this.sessions.set(sessionId, {
        createdAt,
        upload: {
          location: `${this.root}/uploads/${sessionId}`,
          file_info: {
            original_filename: payload.filename,
            stored_filename: storedFilename,
            size: payload.data.length,
            content_type: payload.contentType
          },
          data_summary: payload.summary,
          data: payload.data
        }
      });
      return { sessionId, kind: 'upload', createdAt, location: `${this.root}/uploads/${sessionId}` };
    }

    if (kind === 'chart' && 'charts' in payload) {
      const session = this.sessions.get(sessionId);
      if (!session || !session.upload) {
        throw new NotFoundError(`Session ${sessionId} does not exist`);
      }
      const createdAtIso = new Date(session.createdAt).toISOString();
      session.chart = {
        session_id: sessionId,
        created_at: createdAtIso,
        updated_at: new Date(this.clock()).toISOString(),
        model_used: payload.modelUsed,
        charts: payload.charts,
        generation_time_ms: payload.generationTimeMs
      };
      return { sessionId, kind: 'chart', createdAt: session.createdAt, location: `${this.root}/charts/${sessionId}.json` };
    }

    throw new StorageError(`Payload does not match artifact kind ${kind}`, { sessionId });
  }

  async get(sessionId: string): Promise<StoredSession | null> {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return null;
    }

    let upload: UploadArtifact | undefined;
    if (session.upload) {
      const { data: _data, ...artifact } = session.upload;
      upload = artifact;
    }

    return { sessionId, createdAt: session.createdAt, upload, chart: session.chart };
  }

  async list(): Promise<ArtifactEntry[]> {
    const entries: ArtifactEntry[] = [];
    for (const [sessionId, session] of this.sessions.entries()) {
      if (session.upload) entries.push({ sessionId, kind: 'upload', createdAt: session.createdAt });
      if (session.chart) entries.push({ sessionId, kind: 'chart', createdAt: session.createdAt });
    }
    return entries;
  }

  async stats(): Promise<FileStats> {
    const sessions = Array.from(this.sessions.values());
    return {
      active_sessions: sessions.filter(session => session.upload).length,
      total_chart_files: sessions.filter(session => session.chart).length,
      temp_dir: this.root
    };
  }

  async delete(sessionId: string): Promise<boolean> {
    if (this.deleteHook) {
      await this.deleteHook(sessionId);
    }
    return this.sessions.delete(sessionId);
  }
}
