// Engines router - lifecycle, input, query and training for engine instances
//
// Inputs are only shape-checked here; parameter trees and events are
// validated by the runtime so errors name the offending field.

import { z } from 'zod';
import { router, engineProcedure } from '../trpc.js';

const engineIdInput = z.string().min(1);

const paramsInput = z.union([z.string(), z.record(z.unknown())]);

export const enginesRouter = router({
  /**
   * Create an engine instance from a parameter tree.
   */
  create: engineProcedure
    .input(z.object({ params: paramsInput }))
    .mutation(async ({ ctx, input }) => {
      const engineId = await ctx.host.admin.create(input.params);
      return { engineId };
    }),

  update: engineProcedure
    .input(z.object({ engineId: engineIdInput, params: paramsInput }))
    .mutation(async ({ ctx, input }) => {
      return ctx.host.admin.update(input.engineId, input.params);
    }),

  destroy: engineProcedure
    .input(z.object({ engineId: engineIdInput }))
    .mutation(async ({ ctx, input }) => {
      await ctx.host.admin.destroy(input.engineId);
      return { engineId: input.engineId, destroyed: true as const };
    }),

  /**
   * Submit one event. Resolves once the event is mirrored (if enabled) and applied.
   */
  input: engineProcedure
    .input(z.object({ engineId: engineIdInput, event: z.unknown() }))
    .mutation(async ({ ctx, input }) => {
      return ctx.host.router.input(input.engineId, input.event);
    }),

  /** A mutation so that queries travel as POST bodies like every other engine call. */
  query: engineProcedure
    .input(z.object({ engineId: engineIdInput, query: z.unknown() }))
    .mutation(async ({ ctx, input }) => {
      return ctx.host.router.query(input.engineId, input.query);
    }),

  /**
   * Start a batch training run. Returns before the run finishes.
   */
  train: engineProcedure
    .input(z.object({ engineId: engineIdInput }))
    .mutation(async ({ ctx, input }) => {
      return ctx.host.router.train(input.engineId);
    }),

  trainingStatus: engineProcedure
    .input(z.object({ engineId: engineIdInput }))
    .query(({ ctx, input }) => {
      return ctx.host.router.trainingStatus(input.engineId);
    }),

  jobs: engineProcedure
    .input(z.object({ engineId: engineIdInput }))
    .query(({ ctx, input }) => {
      ctx.host.admin.lookup(input.engineId);
      return ctx.host.orchestrator.jobs(input.engineId);
    }),

  get: engineProcedure
    .input(z.object({ engineId: engineIdInput }))
    .query(({ ctx, input }) => {
      return ctx.host.admin.get(input.engineId);
    }),

  list: engineProcedure.query(({ ctx }) => {
    return ctx.host.admin.list();
  }),

  status: engineProcedure
    .input(z.object({ engineId: engineIdInput }))
    .query(async ({ ctx, input }) => {
      return ctx.host.admin.status(input.engineId);
    }),

  /**
   * Rebuild `sinkId` from `sourceId`'s mirror log. Source and sink may be the same id.
   */
  replay: engineProcedure
    .input(z.object({ sourceId: engineIdInput, sinkId: engineIdInput }))
    .mutation(async ({ ctx, input }) => {
      return ctx.host.router.replay(input.sourceId, input.sinkId);
    }),

  verifyMirror: engineProcedure
    .input(z.object({ engineId: engineIdInput }))
    .query(async ({ ctx, input }) => {
      return ctx.host.mirror.verify(input.engineId);
    }),

  factories: engineProcedure.query(({ ctx }) => {
    return ctx.host.factories.types();
  }),
});
