// Filesystem mirror log
//
// One NDJSON file per engine: <directory>/<engineId>.ndjson
// Each append is fsync'd before it resolves. A line left unfinished by a
// crash is skipped on read, reported by tornWrites(), and never continued:
// the next append starts on a fresh line.

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Id, MirrorRecord, TornLine } from '@enginehost/protocol';
import {
  parseNdjson,
  stringifyNdjsonLine,
  toMirrorLine,
  fromMirrorLine,
  mirrorLineSchema,
} from '@enginehost/protocol';
import type { MirrorRepository } from '../interfaces/index.js';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

const NEWLINE = 0x0a;

async function endsMidLine(handle: fs.FileHandle): Promise<boolean> {
  const { size } = await handle.stat();
  if (size === 0) return false;

  const last = Buffer.alloc(1);
  await handle.read(last, 0, 1, size - 1);
  return last[0] !== NEWLINE;
}

export class FileMirrorRepository implements MirrorRepository {
  constructor(readonly directory: string) {}

  /**
   * Path of the log file for an engine.
   */
  pathFor(engineId: Id): string {
    return path.join(this.directory, `${engineId}.ndjson`);
  }

  async append(record: MirrorRecord): Promise<void> {
    await fs.mkdir(this.directory, { recursive: true });

    const handle = await fs.open(this.pathFor(record.engineId), 'a+');
    try {
      const line = stringifyNdjsonLine(toMirrorLine(record));
      const midLine = await endsMidLine(handle);
      await handle.appendFile(midLine ? `\n${line}` : line, 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
  }

  async lastSequence(engineId: Id): Promise<number> {
    const { records } = await this.read(engineId);
    return records.reduce((max, record) => Math.max(max, record.sequence), 0);
  }

  async count(engineId: Id): Promise<number> {
    return (await this.read(engineId)).records.length;
  }

  async *stream(engineId: Id, untilSequence?: number): AsyncGenerator<MirrorRecord> {
    const { records } = await this.read(engineId);
    records.sort((a, b) => a.sequence - b.sequence);
    for (const record of records) {
      if (untilSequence !== undefined && record.sequence > untilSequence) break;
      yield record;
    }
  }

  async tornWrites(engineId: Id): Promise<TornLine[]> {
    return (await this.read(engineId)).torn;
  }

  private async read(engineId: Id): Promise<{ records: MirrorRecord[]; torn: TornLine[] }> {
    let content: string;
    try {
      content = await fs.readFile(this.pathFor(engineId), 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return { records: [], torn: [] };
      throw error;
    }

    const { items, torn } = parseNdjson(content, mirrorLineSchema);
    return { records: items.map((line) => fromMirrorLine(engineId, line)), torn };
  }
}

/**
 * Create a MirrorRepository that writes NDJSON files under a directory.
 */
export function createFileMirrorRepository(directory: string): FileMirrorRepository {
  return new FileMirrorRepository(directory);
}
