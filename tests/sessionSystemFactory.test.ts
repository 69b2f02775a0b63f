import { describe, expect, it } from 'vitest';
import { createSessionSystem, hydrateRegistry } from '../src/server/utils/sessionSystemFactory';
import { loadConfig } from '../src/server/config';
import { MemoryArtifactStore } from '../src/server/storage/memoryArtifactStore';
import { MemorySessionRegistry } from '../src/server/sessions/memorySessionRegistry';
import { FileArtifactStore } from '../src/server/storage/fileArtifactStore';

const csv = { filename: 'data.csv', contentType: 'text/csv', data: Buffer.from('a\n1\n') };

describe('hydrateRegistry', () => {
  it('registers sessions found in storage', async () => {
    let now = 1_000;
    const store = new MemoryArtifactStore('memory://test', () => now);
    await store.put('s1', 'upload', csv);
    now = 2_000;
    await store.put('s2', 'upload', csv);
    const registry = new MemorySessionRegistry();
    await registry.register({ sessionId: 's2', createdAt: 2_000 });

    await expect(hydrateRegistry(store, registry)).resolves.toBe(1);
    await expect(registry.list()).resolves.toEqual([
      { sessionId: 's2', createdAt: 2_000 },
      { sessionId: 's1', createdAt: 1_000 }
    ]);
  });
});

describe('createSessionSystem', () => {
  it('picks the store from configuration', () => {
    const fileConfig = loadConfig({ NODE_ENV: 'test', TEMP_DIR: './tmp-artifacts' });
    const memoryConfig = loadConfig({ NODE_ENV: 'test', ARTIFACT_STORE: 'memory' });

    expect(createSessionSystem(fileConfig).store).toBeInstanceOf(FileArtifactStore);
    expect(createSessionSystem(memoryConfig).store).toBeInstanceOf(MemoryArtifactStore);
  });

  it('starts and stops the scheduler with the system', async () => {
    const config = loadConfig({
      NODE_ENV: 'test',
      ARTIFACT_STORE: 'memory',
      CLEANUP_RUN_ON_START: 'false'
    });
    const system = createSessionSystem(config, { chartGenerator: null });

    await system.start();
    expect(system.scheduler.getState()).toBe('running');

    await system.stop();
    expect(system.scheduler.getState()).toBe('stopped');
  });
});
