/**
 * @fileoverview Tests for design rationale text
 */

import { describe, it, expect } from 'vitest';
import { resolve } from '../src/intent-resolver.js';
import { GENERIC_RATIONALE, explain } from '../src/rationale.js';
import type { DesignChoice } from '../src/types.js';

const CHOICE: DesignChoice = {
  headShape: 'elongated_teardrop',
  bodyProportion: 'body_focused_30_70',
  facialStyle: 'closed_happy_eyes',
  colorTriad: 'dusty_rose_sage_cream',
  sizeCategory: 'small_decorative',
};

describe('explain', () => {
  it('should return the generic sentence when no cue is present', () => {
    expect(explain(CHOICE, {})).toBe(GENERIC_RATIONALE);
    expect(explain(CHOICE, { mood: 'drooping, muted, small' })).toBe(
      'Design choices selected to match emotional intent'
    );
  });

  it('should explain the head shape for a drooping weight', () => {
    expect(explain(CHOICE, { weight_feeling: 'Drooping' })).toBe(
      'The elongated_teardrop head shape conveys drooping and introspection'
    );
  });

  it('should explain the body proportion for a weighted or heavy feeling', () => {
    expect(explain(CHOICE, { weight_feeling: 'weighted' })).toBe(
      "The body_focused_30_70 proportion grounds the character's weight"
    );
    expect(explain(CHOICE, { weight_feeling: 'heavy' })).toBe(
      "The body_focused_30_70 proportion grounds the character's weight"
    );
  });

  it('should explain the palette for a muted colour feeling', () => {
    expect(explain(CHOICE, { color_feeling: 'muted, dusty' })).toBe(
      'The dusty_rose_sage_cream palette reflects muted emotional tone'
    );
  });

  it('should explain the size for a small size implication', () => {
    expect(explain(CHOICE, { size_implication: 'SMALL' })).toBe(
      'The small_decorative reflects vulnerability and intimacy'
    );
  });

  it('should join clauses in dimension order', () => {
    const intent = {
      size_implication: 'small',
      color_feeling: 'muted',
      weight_feeling: 'drooping, weighted',
    };
    expect(explain(resolve(intent, 'melancholic_character_archetype'), intent)).toBe(
      'The elongated_teardrop head shape conveys drooping and introspection; ' +
        "The body_focused_30_70 proportion grounds the character's weight; " +
        'The dusty_rose_sage_cream palette reflects muted emotional tone; ' +
        'The small_decorative reflects vulnerability and intimacy'
    );
  });

  it('should treat malformed intents as empty', () => {
    expect(explain(CHOICE, 'drooping')).toBe(GENERIC_RATIONALE);
    expect(explain(CHOICE, { weight_feeling: ['drooping'] })).toBe(GENERIC_RATIONALE);
  });
});
