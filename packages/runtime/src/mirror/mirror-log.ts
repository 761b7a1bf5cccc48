// Mirror log service
//
// Records every accepted event for mirrored engines, ahead of the engine
// seeing it, so an instance can be rebuilt by replaying its log.

import * as path from 'node:path';
import type { Event, Id, MirrorRecord, MirrorType, TornLine } from '@enginehost/protocol';
import {
  createFileMirrorRepository,
  type MirrorRepository,
  type RepositoryContext,
} from '@enginehost/repositories';
import { KeyedMutex } from '../concurrency/index.js';
import {
  EngineHostError,
  EngineNotFoundError,
  MirrorNotFoundError,
  StorageFailureError,
} from '../errors.js';
import { silentLogger, type EngineLogger } from '../logger.js';

export type MirrorLogOptions = {
  repos: RepositoryContext;
  /** Base directory for file mirrors; relative `mirrorLocation`s resolve against it */
  mirrorRoot?: string;
  /** Opens the file-backed store for a directory. Tests swap this out. */
  openFileMirror?: (directory: string) => MirrorRepository;
  logger?: EngineLogger;
};

/**
 * The keys of the parameter tree the mirror log reads.
 */
export type MirrorSettings = {
  mirrorType?: MirrorType;
  mirrorLocation?: string;
};

export type MirrorInfo = {
  enabled: boolean;
  type?: MirrorType;
  location?: string;
};

export type MirrorVerification = {
  engineId: Id;
  records: number;
  lastSequence: number;
  /** Sequence numbers missing from the log */
  gaps: number[];
  /** Partial lines left by appends that never completed */
  torn: TornLine[];
};

export type ReplayFailure = {
  sequence: number;
  error: string;
};

export type ReplayReport = {
  sourceId: Id;
  sinkId: Id;
  replayed: number;
  failed: ReplayFailure[];
  gaps: number[];
};

type MirrorBinding = {
  type: MirrorType;
  location?: string;
  backend: MirrorRepository;
};

export class MirrorLog {
  private readonly repos: RepositoryContext;
  private readonly mirrorRoot: string;
  private readonly openFileMirror: (directory: string) => MirrorRepository;
  private readonly logger: EngineLogger;

  private bindings = new Map<Id, MirrorBinding>();
  /** Last binding of ids whose mirroring was turned off, moved or released */
  private retired = new Map<Id, MirrorBinding>();
  private sequences = new Map<Id, number>();
  private locks = new KeyedMutex();

  constructor(options: MirrorLogOptions) {
    this.repos = options.repos;
    this.mirrorRoot = options.mirrorRoot ?? './mirrors';
    this.openFileMirror = options.openFileMirror ?? createFileMirrorRepository;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Bind an engine to the backend its parameters name.
   * An absent `mirrorType` disables writes; nothing already written is touched.
   */
  configure(engineId: Id, settings: MirrorSettings): void {
    const previous = this.bindings.get(engineId);

    if (!settings.mirrorType) {
      if (previous) {
        this.retired.set(engineId, previous);
        this.bindings.delete(engineId);
        this.sequences.delete(engineId);
        this.logger.info('Mirroring disabled', { engineId, type: previous.type });
      }
      return;
    }

    const next = this.bind(settings.mirrorType, settings.mirrorLocation);
    if (previous && previous.type === next.type && previous.location === next.location) {
      return;
    }

    if (previous) {
      this.retired.set(engineId, previous);
    }
    this.bindings.set(engineId, next);
    this.sequences.delete(engineId);
    this.logger.info('Mirroring enabled', { engineId, type: next.type, location: next.location });
  }

  isEnabled(engineId: Id): boolean {
    return this.bindings.has(engineId);
  }

  describe(engineId: Id): MirrorInfo {
    const binding = this.bindings.get(engineId);
    if (!binding) {
      return { enabled: false };
    }
    return { enabled: true, type: binding.type, location: binding.location };
  }

  /**
   * Append an event to the engine's log. Resolves once the record is durable.
   *
   * @throws StorageFailureError if the backend write fails; the event must
   * then be treated as not accepted
   */
  async record(engineId: Id, event: Event): Promise<MirrorRecord> {
    return this.locks.run(engineId, async () => {
      const binding = this.bindings.get(engineId);
      if (!binding) {
        throw new EngineHostError('MIRROR_DISABLED', `Mirroring is not enabled for ${engineId}`);
      }

      try {
        const last = this.sequences.get(engineId) ?? (await binding.backend.lastSequence(engineId));
        const record: MirrorRecord = {
          engineId,
          sequence: last + 1,
          eventTime: event.eventTime,
          creationTime: event.creationTime,
          event,
        };

        await binding.backend.append(record);
        this.sequences.set(engineId, record.sequence);
        return record;
      } catch (error) {
        // The cached sequence may no longer match what reached the backend
        this.sequences.delete(engineId);
        throw new StorageFailureError('mirror.record', error, engineId);
      }
    });
  }

  /**
   * Report sequence gaps and torn writes left by appends that never became
   * durable. Never repairs the log.
   *
   * @throws MirrorNotFoundError if no log holds history for the id
   */
  async verify(engineId: Id): Promise<MirrorVerification> {
    const backend = await this.locate(engineId);
    const gaps: number[] = [];
    let torn: TornLine[] = [];
    let records = 0;
    let expected = 1;

    try {
      for await (const record of backend.stream(engineId)) {
        for (let missing = expected; missing < record.sequence; missing++) {
          gaps.push(missing);
        }
        expected = Math.max(expected, record.sequence + 1);
        records++;
      }
      torn = (await backend.tornWrites?.(engineId)) ?? [];
    } catch (error) {
      throw new StorageFailureError('mirror.verify', error, engineId);
    }

    if (gaps.length > 0) {
      this.logger.warn('Mirror log has sequence gaps', { engineId, gaps });
    }
    if (torn.length > 0) {
      this.logger.warn('Mirror log has torn writes', { engineId, lines: torn.map((t) => t.line) });
    }

    return { engineId, records, lastSequence: expected - 1, gaps, torn };
  }

  /**
   * Feed `sourceId`'s log, in sequence order, into `sink`.
   *
   * The log is read up to the last sequence present when replay starts, so
   * events the sink re-mirrors into the same log are not read back. A record
   * the sink rejects is reported and replay moves on.
   *
   * The source need not be live: a destroyed or reconfigured instance's
   * history is found through its last binding.
   *
   * @throws MirrorNotFoundError if no log holds history for `sourceId`
   */
  async replayInto(
    sourceId: Id,
    sinkId: Id,
    sink: (event: Event) => Promise<unknown>
  ): Promise<ReplayReport> {
    const backend = await this.locate(sourceId);
    const report: ReplayReport = { sourceId, sinkId, replayed: 0, failed: [], gaps: [] };

    let until: number;
    try {
      until = await this.locks.run(sourceId, () => backend.lastSequence(sourceId));
    } catch (error) {
      throw new StorageFailureError('mirror.replay', error, sourceId);
    }

    this.logger.info('Replay started', { sourceId, sinkId, until });

    let expected = 1;
    for await (const record of backend.stream(sourceId, until)) {
      for (let missing = expected; missing < record.sequence; missing++) {
        report.gaps.push(missing);
      }
      expected = Math.max(expected, record.sequence + 1);

      try {
        await sink(record.event);
        report.replayed++;
      } catch (error) {
        if (error instanceof EngineNotFoundError) {
          throw error;
        }
        report.failed.push({
          sequence: record.sequence,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    this.logger.info('Replay finished', {
      sourceId,
      sinkId,
      replayed: report.replayed,
      failed: report.failed.length,
      gaps: report.gaps.length,
    });

    return report;
  }

  /**
   * Stop writing for an engine. The log itself is kept and stays replayable.
   */
  release(engineId: Id): void {
    const binding = this.bindings.get(engineId);
    if (binding) {
      this.retired.set(engineId, binding);
    }
    this.bindings.delete(engineId);
    this.sequences.delete(engineId);
  }

  private bind(type: MirrorType, location?: string): MirrorBinding {
    if (type === 'db') {
      return { type, backend: this.repos.mirror };
    }

    const directory = path.resolve(this.mirrorRoot, location ?? '.');
    return { type, location: directory, backend: this.openFileMirror(directory) };
  }

  /**
   * Find the store holding an id's history: its current binding, then its
   * last binding, then the shared store, then the default file location.
   * An enabled binding with an empty log is returned as is.
   */
  private async locate(engineId: Id): Promise<MirrorRepository> {
    const current = this.bindings.get(engineId)?.backend;
    const candidates = [
      current,
      this.retired.get(engineId)?.backend,
      this.repos.mirror,
      this.openFileMirror(path.resolve(this.mirrorRoot)),
    ];

    try {
      for (const backend of candidates) {
        if (backend && (await backend.count(engineId)) > 0) {
          return backend;
        }
      }
    } catch (error) {
      throw new StorageFailureError('mirror.locate', error, engineId);
    }

    if (current) {
      return current;
    }
    throw new MirrorNotFoundError(engineId);
  }
}
