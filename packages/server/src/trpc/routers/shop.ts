// Shopping assistant router - one procedure per tool

import { z } from 'zod';
import { router } from '../index.js';
import { toolProcedure } from '../middleware.js';

const conversationInput = z.object({ conversationId: z.string().min(1) });

// Price bounds stay loose: spoken values such as "20,000" are parsed by the query
const priceBound = z.union([z.number(), z.string()]).optional();

export const shopRouter = router({
  start: toolProcedure
    .input(conversationInput.extend({ customerName: z.string().max(80).optional() }))
    .mutation(async ({ ctx, input }) => {
      const { shop } = ctx.conversations.get(input.conversationId);
      return { text: await shop.startShopping(input.customerName) };
    }),

  /**
   * Query the catalog. Lists at most eight products and remembers them for
   * ordinal references ("the second one").
   */
  browse: toolProcedure
    .input(
      conversationInput.extend({
        q: z.string().optional(),
        category: z.string().optional(),
        minPrice: priceBound,
        maxPrice: priceBound,
        color: z.string().optional(),
        size: z.string().optional(),
      })
    )
    .mutation(async ({ ctx, input }) => {
      const { conversationId, ...filters } = input;
      return { text: await ctx.conversations.get(conversationId).shop.browseCatalog(filters) };
    }),

  addToCart: toolProcedure
    .input(
      conversationInput.extend({
        reference: z.string().min(1).max(200),
        quantity: z.number().optional(),
        size: z.string().optional(),
      })
    )
    .mutation(async ({ ctx, input }) => {
      const { shop } = ctx.conversations.get(input.conversationId);
      return { text: await shop.addToCart(input.reference, input.quantity, input.size) };
    }),

  cart: toolProcedure.input(conversationInput).query(async ({ ctx, input }) => {
    return { text: await ctx.conversations.get(input.conversationId).shop.showCart() };
  }),

  clearCart: toolProcedure.input(conversationInput).mutation(async ({ ctx, input }) => {
    return { text: await ctx.conversations.get(input.conversationId).shop.clearCart() };
  }),

  placeOrder: toolProcedure.input(conversationInput).mutation(async ({ ctx, input }) => {
    return { text: await ctx.conversations.get(input.conversationId).shop.placeOrder() };
  }),

  lastOrder: toolProcedure.input(conversationInput).query(async ({ ctx, input }) => {
    return { text: await ctx.conversations.get(input.conversationId).shop.showLastOrder() };
  }),

  orderHistory: toolProcedure.input(conversationInput).query(async ({ ctx, input }) => {
    return { text: await ctx.conversations.get(input.conversationId).shop.showOrderHistory() };
  }),
});
