// Tests for the action resolver

import { describe, it, expect } from 'vitest';
import type { LegalAction } from '@parley/protocol';
import { resolveAction } from './action-resolver.js';

// --- Test Fixtures ---

const INTRO_ACTIONS: LegalAction[] = [
  { id: 'inspect_box', description: 'Inspect the mysterious box.' },
  { id: 'walk_to_tower', description: 'Walk toward the distant tower.' },
];

// --- Tests ---

describe('resolveAction', () => {
  it('should match an exact action id', () => {
    expect(resolveAction('inspect_box', INTRO_ACTIONS)).toEqual({
      kind: 'matched',
      actionId: 'inspect_box',
      strategy: 'exact_id',
    });
  });

  it('should ignore case and surrounding whitespace', () => {
    expect(resolveAction('  Walk_To_Tower ', INTRO_ACTIONS)).toEqual({
      kind: 'matched',
      actionId: 'walk_to_tower',
      strategy: 'exact_id',
    });
  });

  it('should match an id embedded in a sentence', () => {
    expect(resolveAction('ok, walk_to_tower please', INTRO_ACTIONS)).toEqual({
      kind: 'matched',
      actionId: 'walk_to_tower',
      strategy: 'id_substring',
    });
  });

  it('should match on a leading description word', () => {
    expect(resolveAction('I want to inspect it', INTRO_ACTIONS)).toEqual({
      kind: 'matched',
      actionId: 'inspect_box',
      strategy: 'leading_words',
    });
  });

  it('should fall back to any description word', () => {
    const actions: LegalAction[] = [
      { id: 'leave', description: 'Slip quietly past guards toward gate.' },
    ];
    expect(resolveAction('to the gate.', actions)).toEqual({
      kind: 'matched',
      actionId: 'leave',
      strategy: 'any_word',
    });
  });

  it('should report not_found for text that matches nothing', () => {
    expect(resolveAction('xyz-nonsense', INTRO_ACTIONS)).toEqual({ kind: 'not_found' });
  });

  it('should report not_found for blank text', () => {
    expect(resolveAction('   ', INTRO_ACTIONS)).toEqual({ kind: 'not_found' });
  });

  it('should report no_actions when there is nothing to match against', () => {
    expect(resolveAction('inspect_box', [])).toEqual({ kind: 'no_actions' });
  });

  it('should be deterministic', () => {
    const first = resolveAction('inspect_box', INTRO_ACTIONS);
    const second = resolveAction('inspect_box', INTRO_ACTIONS);
    expect(second).toEqual(first);
  });
});
