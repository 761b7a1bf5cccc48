// End-to-end behavior of a wired engine host over in-memory repositories

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  createInMemoryMirrorRepository,
  createInMemoryRepositoryContext,
  type InMemoryRepositoryContext,
  type MirrorRepository,
} from '@enginehost/repositories';
import { createEngineHost, type EngineHost } from './host.js';
import {
  AlgorithmFailureError,
  AlreadyTrainingError,
  DuplicateIdError,
  EngineNotFoundError,
  MirrorNotFoundError,
  UnsupportedOperationError,
  UnsupportedUpdateError,
  ValidationError,
} from './errors.js';
import {
  createEngineFactoryRegistry,
  registerReferenceEngines,
  type Engine,
} from './engines/index.js';
import { createCapturingLogger } from './logger.js';

// --- Test Fixtures ---

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

const tick = () => new Promise((r) => setTimeout(r, 5));

function counterParams(engineId: string, extra: Record<string, unknown> = {}) {
  return { engineId, engineFactory: 'reference.counter', ...extra };
}

function popularityParams(engineId: string, algorithm: Record<string, unknown> = {}) {
  return {
    engineId,
    engineFactory: 'reference.popularity',
    algorithm: { eventNames: ['buy'], ...algorithm },
  };
}

function view(entityId: string, eventTime?: string) {
  return { entityType: 'user', entityId, event: 'view', eventTime };
}

function buy(entityId: string, item: string) {
  return {
    entityType: 'user',
    entityId,
    event: 'buy',
    targetEntityType: 'item',
    targetEntityId: item,
  };
}

describe('engine host', () => {
  let repos: InMemoryRepositoryContext;
  let host: EngineHost;

  beforeEach(async () => {
    repos = createInMemoryRepositoryContext();
    host = await createEngineHost({ repos });
  });

  afterEach(async () => {
    await host.shutdown();
  });

  describe('isolation', () => {
    it('keeps datasets and models of different instances apart', async () => {
      await host.admin.create(counterParams('a'));
      await host.admin.create(counterParams('b'));

      await host.router.input('a', view('u1'));
      await host.router.input('a', view('u2'));

      expect(await repos.datasets.count('a')).toBe(2);
      expect(await repos.datasets.count('b')).toBe(0);
      expect(await host.router.query('a', {})).toEqual({ counts: { view: 2 }, total: 2 });
      expect(await host.router.query('b', {})).toEqual({ counts: {}, total: 0 });
    });
  });

  describe('lifecycle', () => {
    it('create, destroy, create yields a fresh instance', async () => {
      await host.admin.create(counterParams('x'));
      await host.router.input('x', view('u1'));
      await host.router.input('x', view('u2'));

      await host.admin.destroy('x');
      expect(host.admin.has('x')).toBe(false);
      expect(await repos.engines.get('x')).toBeNull();
      expect(repos._data.models.has('x')).toBe(false);

      await host.admin.create(counterParams('x'));

      const status = await host.admin.status('x');
      expect(status.datasetSize).toBe(0);
      expect(await host.router.query('x', {})).toEqual({ counts: {}, total: 0 });
    });

    it('destroy waits for an in-flight training run before clearing data', async () => {
      await host.admin.create(popularityParams('p'));
      await host.router.input('p', buy('u1', 'i1'));

      const gate = deferred<void>();
      const getModel = repos.models.get.bind(repos.models);
      vi.spyOn(repos.models, 'get').mockImplementationOnce(async (engineId) => {
        await gate.promise;
        return getModel(engineId);
      });

      await host.router.train('p');
      let destroyed = false;
      const destroying = host.admin.destroy('p').then(() => {
        destroyed = true;
      });
      await tick();

      expect(destroyed).toBe(false);
      expect(host.admin.has('p')).toBe(false);
      expect(await repos.datasets.count('p')).toBe(1);

      gate.resolve();
      await destroying;

      expect(await repos.datasets.count('p')).toBe(0);
      expect(await repos.models.get('p')).toBeNull();
      expect(await repos.engines.get('p')).toBeNull();
    });

    it('applies an input that was being mirrored when destroy was called', async () => {
      const gate = deferred<void>();
      const appending = deferred<void>();
      const inner = createInMemoryMirrorRepository();
      const gated: MirrorRepository = {
        ...inner,
        async append(record) {
          appending.resolve();
          await gate.promise;
          await inner.append(record);
        },
      };
      await host.shutdown();
      host = await createEngineHost({ repos, openFileMirror: () => gated });
      await host.admin.create(counterParams('g', { mirrorType: 'file' }));

      const input = host.router.input('g', view('u1'));
      await appending.promise;
      const destroying = host.admin.destroy('g');
      gate.resolve();

      await expect(input).resolves.toEqual({ accepted: true, sequence: 1 });
      await destroying;
      expect(await inner.count('g')).toBe(1);
      await expect(host.router.input('g', view('u2'))).rejects.toBeInstanceOf(EngineNotFoundError);
    });

    it('persists metadata on create', async () => {
      await host.admin.create(counterParams('m', { mirrorType: 'db', description: 'views' }));

      const metadata = await repos.engines.get('m');
      expect(metadata).toMatchObject({
        engineId: 'm',
        engineFactory: 'reference.counter',
        mirrorType: 'db',
        params: { engineId: 'm', engineFactory: 'reference.counter', mirrorType: 'db', description: 'views' },
      });
    });

    it('rejects a duplicate id', async () => {
      await host.admin.create(counterParams('dup'));
      await expect(host.admin.create(counterParams('dup'))).rejects.toBeInstanceOf(DuplicateIdError);
    });

    it('rejects malformed params before building anything', async () => {
      await expect(host.admin.create(counterParams('bad id'))).rejects.toMatchObject({
        code: 'VALIDATION_ERROR',
        field: 'engineId',
      });
      await expect(host.admin.create('{not json')).rejects.toBeInstanceOf(ValidationError);
      await expect(
        host.admin.create({ engineId: 'e1', engineFactory: 'no.such.engine' })
      ).rejects.toMatchObject({ field: 'engineFactory' });

      expect(host.admin.list()).toEqual([]);
      expect(await repos.engines.list()).toEqual([]);
    });

    it('accepts params as a JSON string and keeps unknown keys', async () => {
      const id = await host.admin.create(
        JSON.stringify({ ...counterParams('json-1'), sharedDBName: 'shared', extra: { a: 1 } })
      );

      expect(id).toBe('json-1');
      expect(host.admin.get('json-1').params).toMatchObject({ sharedDBName: 'shared', extra: { a: 1 } });
    });

    it('reports an invalid algorithm section by key path', async () => {
      await expect(
        host.admin.create({ ...popularityParams('p'), algorithm: { num: 5 } })
      ).rejects.toMatchObject({
        field: 'algorithm',
        message: 'Invalid parameter "algorithm": Must have either "eventNames" or "indicators"',
      });
      await expect(
        host.admin.create(popularityParams('p', { num: 'ten' }))
      ).rejects.toMatchObject({ field: 'algorithm.num' });
    });

    it('leaves nothing behind when engine init fails', async () => {
      const factories = registerReferenceEngines(
        createEngineFactoryRegistry({
          'test.broken': (): Engine => ({
            capabilities: { incrementalUpdate: true, batchTrain: false },
            discipline: 'continuous',
            init: async () => {
              throw new Error('model container unavailable');
            },
            update: async () => {},
            input: async () => {},
            query: async () => null,
            destroy: async () => {},
          }),
        })
      );
      const custom = await createEngineHost({ repos, factories });

      await expect(
        custom.admin.create({ engineId: 'broken', engineFactory: 'test.broken' })
      ).rejects.toBeInstanceOf(AlgorithmFailureError);
      expect(custom.admin.has('broken')).toBe(false);
      expect(await repos.engines.get('broken')).toBeNull();
    });

    it('reports unknown ids as not found', async () => {
      await expect(host.router.input('nope', view('u1'))).rejects.toBeInstanceOf(EngineNotFoundError);
      await expect(host.router.query('nope', {})).rejects.toBeInstanceOf(EngineNotFoundError);
      await expect(host.admin.destroy('nope')).rejects.toBeInstanceOf(EngineNotFoundError);
      expect(() => host.admin.get('nope')).toThrow(EngineNotFoundError);
    });
  });

  describe('update', () => {
    it('never alters the accumulated dataset', async () => {
      await host.admin.create(popularityParams('p'));
      await host.router.input('p', buy('u1', 'i1'));
      await host.router.input('p', buy('u2', 'i2'));
      const before = await repos.datasets.list('p');

      const updated = await host.admin.update('p', popularityParams('p', { num: 1 }));

      expect(updated.state).toBe('active');
      expect(await repos.datasets.list('p')).toEqual(before);
      expect((await repos.engines.get('p'))?.params).toMatchObject({ algorithm: { num: 1 } });
    });

    it('refuses a different engine id or factory', async () => {
      await host.admin.create(counterParams('c'));

      await expect(host.admin.update('c', counterParams('other'))).rejects.toMatchObject({
        field: 'engineId',
      });
      await expect(
        host.admin.update('c', { engineId: 'c', engineFactory: 'reference.popularity' })
      ).rejects.toBeInstanceOf(UnsupportedUpdateError);
    });

    it('keeps the old configuration when the engine refuses the change', async () => {
      await host.admin.create(counterParams('c', { algorithm: { eventNames: ['view'] } }));

      await expect(
        host.admin.update('c', counterParams('c', { algorithm: { eventNames: ['buy'] } }))
      ).rejects.toBeInstanceOf(UnsupportedUpdateError);

      await host.router.input('c', view('u1'));
      expect(await host.router.query('c', { event: 'view' })).toEqual({ event: 'view', count: 1 });
      expect(host.admin.get('c').params).toMatchObject({ algorithm: { eventNames: ['view'] } });
      expect(host.admin.get('c').state).toBe('active');
    });

    it('starts mirroring when an update enables it', async () => {
      await host.admin.create(counterParams('c'));
      await host.router.input('c', view('u1'));

      await host.admin.update('c', counterParams('c', { mirrorType: 'db' }));
      const result = await host.router.input('c', view('u2'));

      expect(result).toEqual({ accepted: true, sequence: 1 });
      expect(await repos.mirror.count('c')).toBe(1);
    });
  });

  describe('input', () => {
    it('validates events before mirroring them', async () => {
      await host.admin.create(counterParams('c', { mirrorType: 'db' }));

      await expect(
        host.router.input('c', { entityType: 'user', event: 'view' })
      ).rejects.toMatchObject({ code: 'VALIDATION_ERROR', field: 'entityId' });
      await expect(
        host.router.input('c', { ...view('u1'), eventTime: 'yesterday' })
      ).rejects.toMatchObject({ field: 'eventTime' });

      expect(await repos.mirror.count('c')).toBe(0);
      expect(await repos.datasets.count('c')).toBe(0);
    });

    it('defaults eventTime to the acceptance time', async () => {
      await host.admin.create(counterParams('c'));
      await host.router.input('c', view('u1'));
      await host.router.input('c', view('u2', '2023-12-31T23:00:00Z'));

      const [first, second] = await repos.datasets.list('c');
      expect(first.eventTime).toBe(first.creationTime);
      expect(second.eventTime).toBe('2023-12-31T23:00:00Z');
    });

    it('mirrors N concurrent inputs with distinct gapless sequences', async () => {
      await host.admin.create(counterParams('c', { mirrorType: 'db' }));

      const results = await Promise.all(
        Array.from({ length: 25 }, (_, i) => host.router.input('c', view(`u${i}`)))
      );

      const sequences = results.map((r) => r.sequence ?? 0).sort((a, b) => a - b);
      expect(sequences).toEqual(Array.from({ length: 25 }, (_, i) => i + 1));
      expect(await repos.mirror.count('c')).toBe(25);
      expect(await repos.datasets.count('c')).toBe(25);
      expect(await host.router.query('c', {})).toEqual({ counts: { view: 25 }, total: 25 });
      expect(await host.mirror.verify('c')).toMatchObject({ records: 25, gaps: [] });
    });

    it('applies inputs in mirror order', async () => {
      await host.admin.create(counterParams('c', { mirrorType: 'db' }));

      await Promise.all(['u1', 'u2', 'u3', 'u4'].map((id) => host.router.input('c', view(id))));

      const mirrored: string[] = [];
      for await (const record of repos.mirror.stream('c')) mirrored.push(record.event.entityId);
      const applied = (await repos.datasets.list('c')).map((e) => e.entityId);
      expect(applied).toEqual(mirrored);
    });

    it('rejects reserved events the engine cannot apply, without mirroring them', async () => {
      await host.admin.create(counterParams('c', { mirrorType: 'db' }));

      await expect(
        host.router.input('c', { entityType: 'item', entityId: 'i1', event: '$set', properties: { color: 'red' } })
      ).rejects.toBeInstanceOf(UnsupportedOperationError);
      expect(await repos.mirror.count('c')).toBe(0);
    });
  });

  describe('training', () => {
    it('rank-1: a second train call while training gets AlreadyTraining; the first reaches idle with a new model', async () => {
      await host.admin.create(popularityParams('rank-1'));
      await host.router.input('rank-1', buy('u1', 'i1'));
      await host.router.input('rank-1', buy('u2', 'i1'));
      await host.router.input('rank-1', buy('u3', 'i2'));

      const [first, second] = await Promise.allSettled([
        host.router.train('rank-1'),
        host.router.train('rank-1'),
      ]);

      expect(first.status).toBe('fulfilled');
      expect(second.status).toBe('rejected');
      if (second.status === 'rejected') {
        expect(second.reason).toBeInstanceOf(AlreadyTrainingError);
      }

      await host.orchestrator.awaitIdle('rank-1');

      const status = host.router.trainingStatus('rank-1');
      expect(status.state).toBe('idle');
      expect(status.lastJob?.status).toBe('succeeded');
      expect(await host.router.query('rank-1', {})).toEqual({
        result: [
          { item: 'i1', score: 2 },
          { item: 'i2', score: 1 },
        ],
      });
    });

    it('excludes what the user already bought', async () => {
      await host.admin.create(popularityParams('p'));
      await host.router.input('p', buy('u1', 'i1'));
      await host.router.input('p', buy('u2', 'i1'));
      await host.router.input('p', buy('u2', 'i2'));

      await host.router.train('p');
      await host.orchestrator.awaitIdle('p');

      expect(await host.router.query('p', { user: 'u1' })).toEqual({ result: [{ item: 'i2', score: 1 }] });
      expect(await host.router.query('p', { item: 'i1', num: 5 })).toEqual({ result: [{ item: 'i2', score: 1 }] });
    });

    it('holds $set behind a periodic run that was in flight when the engine became mixed', async () => {
      await host.admin.create(popularityParams('p'));
      await host.router.input('p', buy('u1', 'i1'));

      const gate = deferred<void>();
      const getModel = repos.models.get.bind(repos.models);
      vi.spyOn(repos.models, 'get').mockImplementationOnce(async (engineId) => {
        await gate.promise;
        return getModel(engineId);
      });

      await host.router.train('p');
      await host.admin.update('p', popularityParams('p', { realtimeProperties: true }));
      const setting = host.router.input('p', {
        entityType: 'item',
        entityId: 'i1',
        event: '$set',
        properties: { color: 'red' },
      });
      await tick();
      gate.resolve();

      await setting;
      await host.orchestrator.awaitIdle('p');

      expect(await host.router.query('p', {})).toEqual({
        result: [{ item: 'i1', score: 1, properties: { color: 'red' } }],
      });
    });

    it('rejects train on a continuous engine', async () => {
      await host.admin.create(counterParams('c'));
      await expect(host.router.train('c')).rejects.toBeInstanceOf(UnsupportedOperationError);
    });

    it('applies $set on a mixed engine and keeps properties across training', async () => {
      await host.admin.create(popularityParams('rt', { realtimeProperties: true }));
      expect(host.admin.get('rt').trainingDiscipline).toBe('mixed');

      await host.router.input('rt', {
        entityType: 'item',
        entityId: 'i1',
        event: '$set',
        properties: { color: 'red' },
      });
      await host.router.input('rt', buy('u1', 'i1'));

      await host.router.train('rt');
      await host.orchestrator.awaitIdle('rt');

      expect(await host.router.query('rt', {})).toEqual({
        result: [{ item: 'i1', score: 1, properties: { color: 'red' } }],
      });
      await expect(
        host.router.input('rt', { entityType: 'item', entityId: 'i1', event: '$delete' })
      ).rejects.toBeInstanceOf(UnsupportedOperationError);
    });
  });

  describe('replay', () => {
    it('reproduces the accepted event sequence in a fresh instance', async () => {
      await host.admin.create(counterParams('src', { mirrorType: 'db' }));
      await host.router.input('src', view('u1', '2024-01-01T00:00:00Z'));
      await host.router.input('src', view('u2', '2024-01-02T00:00:00Z'));
      await host.router.input('src', view('u3', '2024-01-03T00:00:00Z'));

      await host.admin.create(counterParams('sink'));
      const report = await host.router.replay('src', 'sink');

      expect(report).toEqual({ sourceId: 'src', sinkId: 'sink', replayed: 3, failed: [], gaps: [] });
      expect(await repos.datasets.list('sink')).toEqual(await repos.datasets.list('src'));
      expect(await host.router.query('sink', {})).toEqual({ counts: { view: 3 }, total: 3 });
    });

    it('refuses to replay a source with no mirror log', async () => {
      await host.admin.create(counterParams('plain'));
      await host.admin.create(counterParams('sink'));
      await host.router.input('plain', view('u1'));

      await expect(host.router.replay('plain', 'sink')).rejects.toBeInstanceOf(MirrorNotFoundError);
      await expect(host.router.replay('ghost', 'sink')).rejects.toBeInstanceOf(MirrorNotFoundError);
    });
  });

  describe('restore', () => {
    it('rebuilds persisted instances and reports failures', async () => {
      await host.admin.create(counterParams('c', { mirrorType: 'db' }));
      await host.admin.create(popularityParams('p'));
      await host.router.input('c', view('u1'));
      await repos.engines.save({
        engineId: 'broken',
        engineFactory: 'missing.engine',
        params: { engineId: 'broken', engineFactory: 'missing.engine' },
        createdAt: '2099-01-01T00:00:00.000Z',
        updatedAt: '2099-01-01T00:00:00.000Z',
      });
      await host.shutdown();

      const logger = createCapturingLogger();
      host = await createEngineHost({ repos, logger });

      expect(host.restored).toEqual({
        restored: ['c', 'p'],
        failed: [{ engineId: 'broken', error: 'Unknown engine factory "missing.engine"' }],
      });
      expect(logger.entries.some((e) => e.level === 'error' && e.message === 'Engine restore failed')).toBe(true);
      expect(host.admin.list().map((i) => i.id)).toEqual(['c', 'p']);

      const next = await host.router.input('c', view('u2'));
      expect(next.sequence).toBe(2);
      expect(await host.router.query('c', {})).toEqual({ counts: { view: 2 }, total: 2 });
    });
  });
});

describe('reco-1 with a file mirror', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'enginehost-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('rebuilds the dataset from the mirror after destroy and re-create', async () => {
    const repos = createInMemoryRepositoryContext();
    const host = await createEngineHost({ repos, mirrorRoot: root });
    const params = counterParams('reco-1', { mirrorType: 'file' });

    await host.admin.create(params);
    await host.router.input('reco-1', view('u1'));
    await host.router.input('reco-1', view('u2'));
    await host.router.input('reco-1', view('u3'));

    await host.admin.destroy('reco-1');
    await host.admin.create(params);
    expect((await host.admin.status('reco-1')).datasetSize).toBe(0);

    const report = await host.router.replay('reco-1', 'reco-1');

    expect(report.replayed).toBe(3);
    expect((await host.admin.status('reco-1')).datasetSize).toBe(3);

    const log = await fs.readFile(path.join(root, 'reco-1.ndjson'), 'utf-8');
    expect(log.trim().split('\n')).toHaveLength(3);

    await host.shutdown();
  });

  it('replays a destroyed file-mirrored instance into a differently configured one', async () => {
    const repos = createInMemoryRepositoryContext();
    const host = await createEngineHost({ repos, mirrorRoot: root });

    await host.admin.create(counterParams('reco-1', { mirrorType: 'file', mirrorLocation: 'tenant-a' }));
    await host.router.input('reco-1', view('u1'));
    await host.router.input('reco-1', view('u2'));
    await host.router.input('reco-1', view('u3'));
    await host.admin.destroy('reco-1');

    await host.admin.create(counterParams('reco-2', { mirrorType: 'db' }));
    const report = await host.router.replay('reco-1', 'reco-2');

    expect(report).toEqual({ sourceId: 'reco-1', sinkId: 'reco-2', replayed: 3, failed: [], gaps: [] });
    expect(await host.router.query('reco-2', {})).toEqual({ counts: { view: 3 }, total: 3 });
    expect(await repos.mirror.count('reco-2')).toBe(3);

    await host.shutdown();
  });

  it('survives a torn final line after a crash', async () => {
    const torn = '{"sequence":2,"eventTi';
    const repos = createInMemoryRepositoryContext();
    let host = await createEngineHost({ repos, mirrorRoot: root });
    await host.admin.create(counterParams('m', { mirrorType: 'file' }));
    await host.router.input('m', view('u1'));
    await host.shutdown();

    await fs.appendFile(path.join(root, 'm.ndjson'), torn);
    host = await createEngineHost({ repos, mirrorRoot: root });

    expect(await host.mirror.verify('m')).toEqual({
      engineId: 'm',
      records: 1,
      lastSequence: 1,
      gaps: [],
      torn: [{ line: 2, content: torn }],
    });
    expect(await host.router.input('m', view('u2'))).toEqual({ accepted: true, sequence: 2 });
    expect(await host.router.query('m', {})).toEqual({ counts: { view: 2 }, total: 2 });

    await host.shutdown();
  });
});
