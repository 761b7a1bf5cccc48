import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import type { Event, MirrorRecord } from '@enginehost/protocol';
import { FileMirrorRepository } from './mirror-repository.js';

function record(engineId: string, sequence: number, entityId = 'u1'): MirrorRecord {
  const event: Event = {
    entityType: 'user',
    entityId,
    event: 'view',
    targetEntityType: 'item',
    targetEntityId: 'i1',
    properties: {},
    eventTime: '2024-01-01T00:00:00.000Z',
    creationTime: '2024-01-01T00:00:01.000Z',
  };
  return {
    engineId,
    sequence,
    eventTime: event.eventTime,
    creationTime: event.creationTime,
    event,
  };
}

describe('FileMirrorRepository', () => {
  let dir: string;
  let repo: FileMirrorRepository;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'mirror-'));
    repo = new FileMirrorRepository(path.join(dir, 'nested'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('treats a missing log as empty', async () => {
    expect(await repo.lastSequence('absent')).toBe(0);
    expect(await repo.count('absent')).toBe(0);
  });

  it('writes one line per record under <dir>/<engineId>.ndjson', async () => {
    await repo.append(record('reco-1', 1));
    await repo.append(record('reco-1', 2, 'u2'));

    const content = await fs.readFile(path.join(dir, 'nested', 'reco-1.ndjson'), 'utf-8');
    const lines = content.trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[1])).toMatchObject({ sequence: 2, event: { entityId: 'u2' } });
  });

  it('reports the highest sequence and count', async () => {
    await repo.append(record('reco-1', 1));
    await repo.append(record('reco-1', 2));
    await repo.append(record('reco-1', 3));

    expect(await repo.lastSequence('reco-1')).toBe(3);
    expect(await repo.count('reco-1')).toBe(3);
  });

  it('streams in sequence order and stops at untilSequence', async () => {
    await repo.append(record('reco-1', 2));
    await repo.append(record('reco-1', 1));
    await repo.append(record('reco-1', 3));

    const all: number[] = [];
    for await (const r of repo.stream('reco-1')) all.push(r.sequence);
    expect(all).toEqual([1, 2, 3]);

    const upTo: number[] = [];
    for await (const r of repo.stream('reco-1', 2)) upTo.push(r.sequence);
    expect(upTo).toEqual([1, 2]);
  });

  it('keeps engines in separate files', async () => {
    await repo.append(record('a', 1));
    await repo.append(record('b', 1));
    await repo.append(record('b', 2));

    expect(await repo.count('a')).toBe(1);
    expect(await repo.count('b')).toBe(2);

    const streamed: MirrorRecord[] = [];
    for await (const r of repo.stream('a')) streamed.push(r);
    expect(streamed[0].engineId).toBe('a');
  });

  it('skips a torn final line and starts the next append on a fresh line', async () => {
    const torn = '{"sequence":2,"eventTi';
    await repo.append(record('m', 1));
    await fs.appendFile(repo.pathFor('m'), torn);

    expect(await repo.lastSequence('m')).toBe(1);
    expect(await repo.tornWrites('m')).toEqual([{ line: 2, content: torn }]);

    await repo.append(record('m', 2));

    const sequences: number[] = [];
    for await (const r of repo.stream('m')) sequences.push(r.sequence);
    expect(sequences).toEqual([1, 2]);
    expect(await repo.tornWrites('m')).toEqual([{ line: 2, content: torn }]);

    const lines = (await fs.readFile(repo.pathFor('m'), 'utf-8')).split('\n');
    expect(lines).toHaveLength(4);
    expect(lines[1]).toBe(torn);
  });
});
