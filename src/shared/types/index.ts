// ============================================
// Shared Types - Used by storage, cleanup and routes
// ============================================

// ============================================
// Sessions & Artifacts
// ============================================

export type ArtifactKind = 'upload' | 'chart';

export interface SessionEntry {
  sessionId: string;
  createdAt: number; // epoch ms, set once at upload time
}

export interface ArtifactEntry extends SessionEntry {
  kind: ArtifactKind;
}

export interface ArtifactRef extends ArtifactEntry {
  location: string; // directory or file path (or memory key)
}

export interface FileInfo {
  original_filename: string;
  stored_filename: string;
  size: number;
  content_type: string;
}

export interface UploadPayload {
  filename: string;
  contentType: string;
  data: Buffer;
  summary?: DataSummary;
}

export interface ChartPayload {
  charts: ChartConfig[];
  modelUsed: string;
  generationTimeMs: number;
}

export interface ArtifactPayloads {
  upload: UploadPayload;
  chart: ChartPayload;
}

export interface UploadArtifact {
  location: string;
  file_info: FileInfo;
  data_summary?: DataSummary;
}

export interface ChartRecord {
  session_id: string;
  created_at: string;
  updated_at: string;
  model_used: string;
  charts: ChartConfig[];
  generation_time_ms: number;
}

export interface StoredSession extends SessionEntry {
  upload?: UploadArtifact;
  chart?: ChartRecord;
}

export interface FileStats {
  active_sessions: number;
  total_chart_files: number;
  temp_dir: string;
}

// ============================================
// Cleanup
// ============================================

export type SchedulerState = 'stopped' | 'running';

export type PassTrigger = 'interval' | 'manual';

export interface CleanupFailure {
  session_id: string;
  error: string;
}

export interface CleanupRunRecord {
  trigger: PassTrigger;
  started_at: string;
  finished_at: string;
  duration_ms: number;
  ttl_seconds: number;
  sessions_cleaned: number;
  charts_cleaned: number;
  sessions_failed: number;
  failures: CleanupFailure[];
  registry_pruned: number;
  stats_before: FileStats;
  stats_after: FileStats;
  temp_dir: string;
  message: string;
}

export interface CleanupStatus {
  running: boolean;
  cleanup_interval_seconds: number;
  cleanup_interval_minutes: number;
  session_ttl_seconds: number;
  thread_alive: boolean;
  pass_in_progress: boolean;
  passes_completed: number;
  last_run: CleanupRunRecord | null;
  file_stats: FileStats;
}

export interface CleanupConfigView {
  auto_cleanup_enabled: boolean;
  cleanup_interval_seconds: number;
  cleanup_interval_minutes: number;
  cleanup_interval_hours: number;
  session_ttl_seconds: number;
  run_on_start: boolean;
  temp_directory: string;
}

// ============================================
// Data Summary & Charts
// ============================================

export type ColumnType = 'numeric' | 'datetime' | 'categorical' | 'text';

export interface NumericColumnStats {
  min: number;
  max: number;
  mean: number;
}

export interface DataSummary {
  columns: string[];
  row_count: number;
  column_types: Record<string, ColumnType>;
  stats: Record<string, NumericColumnStats>;
  preview_rows: string[][];
}

export interface ChartConfig {
  id: string;
  title: string;
  type: string;
  option: Record<string, unknown>; // handed as-is to the client charting library
  description?: string;
  data_source?: string[];
}

export interface SessionView {
  session_id: string;
  created_at: string;
  file_info: FileInfo | null;
  data_summary: DataSummary | null;
  charts: ChartConfig[];
  model_used: string | null;
}

export type ModelStatus = 'available' | 'unavailable';

export interface ModelInfo {
  name: string;
  provider: string;
  default: boolean;
  status: ModelStatus;
}
