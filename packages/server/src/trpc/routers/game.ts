// Game master router - one procedure per tool

import { z } from 'zod';
import { router } from '../index.js';
import { toolProcedure } from '../middleware.js';

const conversationInput = z.object({ conversationId: z.string().min(1) });

export const gameRouter = router({
  /**
   * Start a fresh adventure and describe the opening scene.
   */
  start: toolProcedure
    .input(conversationInput.extend({ playerName: z.string().max(80).optional() }))
    .mutation(({ ctx, input }) => {
      const { game } = ctx.conversations.get(input.conversationId);
      return { text: game.startAdventure(input.playerName) };
    }),

  /**
   * Describe the current scene again. Does not change the session.
   */
  scene: toolProcedure.input(conversationInput).query(({ ctx, input }) => {
    return { text: ctx.conversations.get(input.conversationId).game.getScene() };
  }),

  action: toolProcedure
    .input(conversationInput.extend({ text: z.string().max(500) }))
    .mutation(({ ctx, input }) => {
      return { text: ctx.conversations.get(input.conversationId).game.playerAction(input.text) };
    }),

  journal: toolProcedure.input(conversationInput).query(({ ctx, input }) => {
    return { text: ctx.conversations.get(input.conversationId).game.showJournal() };
  }),

  restart: toolProcedure.input(conversationInput).mutation(({ ctx, input }) => {
    return { text: ctx.conversations.get(input.conversationId).game.restartAdventure() };
  }),
});
