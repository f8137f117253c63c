// tRPC middleware
//
// Tool procedures log each call with its duration. Failures are logged once
// here; the tools themselves already turn expected failures into text.

import { middleware, publicProcedure } from './index.js';

const logCalls = middleware(async ({ ctx, path, type, next }) => {
  const startedAt = Date.now();
  const result = await next();
  const durationMs = Date.now() - startedAt;

  if (result.ok) {
    ctx.logger.debug('Tool call', { path, type, durationMs });
  } else {
    ctx.logger.error('Tool call failed', { path, type, durationMs, error: result.error.message });
  }
  return result;
});

/**
 * Procedure for tool calls - logs path and duration.
 */
export const toolProcedure = publicProcedure.use(logCalls);
