import { beforeEach, describe, expect, it, vi } from 'vitest';
import { CleanupScheduler } from '../src/server/cleanup/cleanupScheduler';
import { CleanupService } from '../src/server/cleanup/cleanupService';
import { MemoryArtifactStore } from '../src/server/storage/memoryArtifactStore';
import { MemorySessionRegistry } from '../src/server/sessions/memorySessionRegistry';
import { StorageError } from '../src/shared/utils/errors';

const csv = {
  filename: 'data.csv',
  contentType: 'text/csv',
  data: Buffer.from('a\n1\n')
};

describe('CleanupService', () => {
  let now: number;
  let store: MemoryArtifactStore;
  let registry: MemorySessionRegistry;
  let scheduler: CleanupScheduler;
  let service: CleanupService;

  beforeEach(() => {
    now = 0;
    const clock = () => now;
    store = new MemoryArtifactStore('memory://test', clock);
    registry = new MemorySessionRegistry();
    scheduler = new CleanupScheduler(store, registry, {
      ttlMs: 120_000,
      intervalMs: 1_800_000,
      runOnStart: false,
      clock
    });
    service = new CleanupService(scheduler, store, registry);
  });

  it('reports status before any pass', async () => {
    await store.put('s1', 'upload', csv);

    await expect(service.getStatus()).resolves.toEqual({
      running: false,
      cleanup_interval_seconds: 1800,
      cleanup_interval_minutes: 30,
      session_ttl_seconds: 120,
      thread_alive: false,
      pass_in_progress: false,
      passes_completed: 0,
      last_run: null,
      file_stats: { active_sessions: 1, total_chart_files: 0, temp_dir: 'memory://test' }
    });
  });

  it('reports the last pass and the live loop', async () => {
    const record = await service.forceRun();
    scheduler.start();

    const status = await service.getStatus();

    expect(status.running).toBe(true);
    expect(status.thread_alive).toBe(true);
    expect(status.passes_completed).toBe(1);
    expect(status.last_run).toEqual(record);

    await scheduler.stop();
  });

  it('renders status when the store cannot be read', async () => {
    vi.spyOn(store, 'stats').mockRejectedValue(new StorageError('Artifact directory unavailable'));

    const status = await service.getStatus();

    expect(status.file_stats).toEqual({ active_sessions: 0, total_chart_files: 0, temp_dir: 'memory://test' });
  });

  it('describes the configuration', () => {
    expect(service.getConfig()).toEqual({
      auto_cleanup_enabled: false,
      cleanup_interval_seconds: 1800,
      cleanup_interval_minutes: 30,
      cleanup_interval_hours: 0.5,
      session_ttl_seconds: 120,
      run_on_start: false,
      temp_directory: 'memory://test'
    });
  });

  it('purges fresh sessions only when asked to', async () => {
    await store.put('s1', 'upload', csv);

    const normal = await service.forceRun();
    const purge = await service.forceRun({ purgeAll: true });

    expect(normal.sessions_cleaned).toBe(0);
    expect(purge.sessions_cleaned).toBe(1);
    expect(purge.trigger).toBe('manual');
  });

  it('surfaces an unavailable store from a forced run', async () => {
    vi.spyOn(store, 'list').mockRejectedValue(new StorageError('Artifact directory unavailable'));

    await expect(service.forceRun()).rejects.toBeInstanceOf(StorageError);
  });

  it('deletes a session from store and registry', async () => {
    await store.put('s1', 'upload', csv);
    await registry.register({ sessionId: 's1', createdAt: 0 });

    await expect(service.deleteSession('s1')).resolves.toBe(true);
    await expect(store.get('s1')).resolves.toBeNull();
    await expect(registry.has('s1')).resolves.toBe(false);
    await expect(service.deleteSession('s1')).resolves.toBe(false);
  });

  it('deletes a session known only to the registry', async () => {
    await registry.register({ sessionId: 'dangling', createdAt: 0 });

    await expect(service.deleteSession('dangling')).resolves.toBe(true);
  });
});
