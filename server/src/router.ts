import { initTRPC, TRPCError } from '@trpc/server';
import { z } from 'zod';
import { Catalog } from './catalog';
import { logger } from './logging';
import { SessionHub } from './hub';

export interface Context {
  hub: SessionHub;
  catalog: Catalog;
}

const t = initTRPC.context<Context>().create();
const router = t.router;
const publicProcedure = t.procedure;

export const appRouter = router({
  songs: publicProcedure.query(({ ctx }) => ctx.catalog.list()),

  createSession: publicProcedure
    .input(z.object({ hostName: z.string().trim().min(1).max(20).default('Host') }))
    .mutation(({ ctx, input }) => {
      const session = ctx.hub.manager.create();
      logger.info(`Session ${session.id} created over HTTP for ${input.hostName}`);
      return {
        sessionId: session.id,
        hostName: input.hostName,
        createdAt: new Date(session.lastActivity).toISOString()
      };
    }),

  sessionInfo: publicProcedure
    .input(z.object({ sessionId: z.string() }))
    .query(({ ctx, input }) => {
      const session = ctx.hub.manager.get(input.sessionId);
      if (!session) {
        throw new TRPCError({ code: 'NOT_FOUND', message: `Session ${input.sessionId} not found` });
      }
      const { playback, playlist, participants, hostId } = session.snapshot();
      return { sessionId: session.id, playback, playlist, participants, hostId };
    })
});

export const createCaller = t.createCallerFactory(appRouter);

export type AppRouter = typeof appRouter;
