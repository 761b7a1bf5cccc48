// Engine host wiring
//
// Builds the administrator, router, orchestrator and mirror log over one
// repository context and rebuilds persisted instances.

import {
  createInMemoryRepositoryContext,
  type MirrorRepository,
  type TransactionalRepositoryContext,
} from '@enginehost/repositories';
import { EngineAdministrator, type RestoreReport } from './admin/index.js';
import {
  createEngineFactoryRegistry,
  registerReferenceEngines,
  type EngineFactoryRegistry,
} from './engines/index.js';
import { silentLogger, type EngineLogger } from './logger.js';
import { MirrorLog } from './mirror/index.js';
import { EngineRouter } from './router/index.js';
import { TrainingOrchestrator } from './training/index.js';

export type EngineHostOptions = {
  /** Defaults to in-memory repositories */
  repos?: TransactionalRepositoryContext;
  /** Defaults to a registry holding the reference engines */
  factories?: EngineFactoryRegistry;
  mirrorRoot?: string;
  openFileMirror?: (directory: string) => MirrorRepository;
  logger?: EngineLogger;
  /** Rebuild persisted instances before returning (default true) */
  restore?: boolean;
};

export type EngineHost = {
  repos: TransactionalRepositoryContext;
  factories: EngineFactoryRegistry;
  admin: EngineAdministrator;
  router: EngineRouter;
  orchestrator: TrainingOrchestrator;
  mirror: MirrorLog;
  logger: EngineLogger;
  /** Report from the restore at startup; empty when restore was skipped */
  restored: RestoreReport;
  shutdown(): Promise<void>;
};

/**
 * Create a fully wired engine host.
 *
 * @example
 * ```typescript
 * const host = await createEngineHost({ mirrorRoot: './mirrors' });
 * await host.admin.create({ engineId: 'reco-1', engineFactory: 'reference.counter' });
 * await host.router.input('reco-1', { entityType: 'user', entityId: 'u1', event: 'view' });
 * ```
 */
export async function createEngineHost(options: EngineHostOptions = {}): Promise<EngineHost> {
  const repos = options.repos ?? createInMemoryRepositoryContext();
  const factories = options.factories ?? registerReferenceEngines(createEngineFactoryRegistry());
  const logger = options.logger ?? silentLogger;

  const mirror = new MirrorLog({
    repos,
    mirrorRoot: options.mirrorRoot,
    openFileMirror: options.openFileMirror,
    logger,
  });
  const orchestrator = new TrainingOrchestrator({ repos, logger });
  const admin = new EngineAdministrator({ repos, factories, mirror, orchestrator, logger });
  const router = new EngineRouter({ admin, orchestrator, mirror, logger });

  const restored =
    options.restore === false ? { restored: [], failed: [] } : await admin.restoreAll();

  return {
    repos,
    factories,
    admin,
    router,
    orchestrator,
    mirror,
    logger,
    restored,
    shutdown: () => admin.shutdown(),
  };
}
