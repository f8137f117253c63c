// Root router - combines the tool routers

import { z } from 'zod';
import { router, publicProcedure } from '../index.js';
import { gameRouter } from './game.js';
import { shopRouter } from './shop.js';

/**
 * The root router.
 *
 * Usage from a client:
 * ```ts
 * await client.game.start.mutate({ conversationId: 'room-1', playerName: 'Ava' });
 * await client.game.action.mutate({ conversationId: 'room-1', text: 'inspect the box' });
 * await client.shop.browse.mutate({ conversationId: 'room-2', category: 'mobile', maxPrice: 20000 });
 * ```
 */
export const appRouter = router({
  game: gameRouter,
  shop: shopRouter,

  conversations: router({
    /**
     * Forget a conversation when its front end disconnects.
     */
    end: publicProcedure
      .input(z.object({ conversationId: z.string().min(1) }))
      .mutation(({ ctx, input }) => {
        return { ended: ctx.conversations.end(input.conversationId) };
      }),
  }),

  health: publicProcedure.query(async ({ ctx }) => {
    const orders = await ctx.ledger.readAll();
    return { status: 'ok' as const, conversations: ctx.conversations.size(), orders: orders.length };
  }),
});

export type AppRouter = typeof appRouter;
