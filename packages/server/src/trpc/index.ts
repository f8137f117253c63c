// tRPC initialization
//
// superjson keeps the wire format symmetric with clients built on the same
// transformer. Error shapes carry the runtime error code when there is one.

import { initTRPC, TRPCError } from '@trpc/server';
import superjson from 'superjson';
import type { Context } from './context.js';

const t = initTRPC.context<Context>().create({
  transformer: superjson,
  errorFormatter({ shape, error }) {
    return {
      ...shape,
      data: {
        ...shape.data,
        code: error.code,
        // Stack traces never leave the process
        stack: undefined,
      },
    };
  },
});

export const router = t.router;

export const publicProcedure = t.procedure;

export const middleware = t.middleware;

export const createCallerFactory = t.createCallerFactory;

export { TRPCError };
