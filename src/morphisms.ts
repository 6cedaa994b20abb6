/**
 * @fileoverview Fixed rule tables mapping design intent onto taxonomy instances.
 *
 * Every table is an ordered list evaluated top to bottom; the first rule
 * whose predicate matches decides the instance. Reordering entries changes
 * resolution results.
 *
 * All instance ids here are literals. The repository checks each of them
 * against the loaded taxonomy, so a resolved choice can never fall outside
 * its dimension.
 *
 * @module morphisms
 */

import type { DimensionName, IntentField, NormalizedIntent } from './types.js';

/**
 * Substring test against one intent field: matches when the field
 * contains any of the cues.
 */
export type CueClause = readonly [field: IntentField, cues: readonly string[]];

/**
 * One entry of a first-match-wins chain.
 */
export interface MorphismRule {
  /** Instance selected when any clause matches */
  instance: string;
  /** Clauses are OR-ed, tested in order */
  when: readonly CueClause[];
}

/**
 * Ordered rule chain for one dimension driven by intent text.
 */
export interface RuleChain {
  morphism: string;
  dimension: DimensionName;
  rules: readonly MorphismRule[];
  fallback: string;
}

export const HEAD_SHAPE_RULES: RuleChain = {
  morphism: 'design_intent_to_head_shape',
  dimension: 'headShape',
  rules: [
    { instance: 'elongated_teardrop', when: [['weight_feeling', ['droop']], ['primary_shape', ['droop']]] },
    { instance: 'cat_like_curved', when: [['primary_shape', ['curved', 'flowing']]] },
    { instance: 'minimalist_blob', when: [['primary_shape', ['blob', 'amorphous']]] },
    { instance: 'simplified_geometric', when: [['primary_shape', ['geometric', 'sharp']]] },
    { instance: 'wide_and_flat', when: [['primary_shape', ['wide', 'flat']]] },
    { instance: 'ovoid_with_point', when: [['primary_shape', ['pointed', 'spike']]] },
    { instance: 'large_round_orb', when: [['weight_feeling', ['round', 'soft']]] },
  ],
  fallback: 'large_round_orb',
};

export const BODY_PROPORTION_RULES: RuleChain = {
  morphism: 'design_intent_to_body_proportion',
  dimension: 'bodyProportion',
  rules: [
    {
      instance: 'tiny_torso_large_head',
      when: [['size_implication', ['tiny', 'insignificant']], ['weight_feeling', ['miniature']]],
    },
    { instance: 'body_focused_30_70', when: [['weight_feeling', ['weighted', 'heavy', 'grounded']]] },
    { instance: 'extended_and_fluid', when: [['weight_feeling', ['fluid', 'flowing', 'extended']]] },
    { instance: 'limbless_blob', when: [['weight_feeling', ['limbless', 'blob']]] },
    { instance: 'head_dominant_80_20', when: [['size_implication', ['head-heavy']], ['weight_feeling', ['top-heavy']]] },
  ],
  fallback: 'balanced_cute_50_50',
};

export const SIZE_CATEGORY_RULES: RuleChain = {
  morphism: 'design_intent_to_size_category',
  dimension: 'sizeCategory',
  rules: [
    { instance: 'small_plush_toy', when: [['size_implication', ['tiny', 'pocket', 'miniature']]] },
    { instance: 'small_decorative', when: [['size_implication', ['small', 'delicate']]] },
    { instance: 'medium_standard', when: [['size_implication', ['medium', 'standard']]] },
    { instance: 'large_display', when: [['size_implication', ['large', 'prominent']]] },
  ],
  fallback: 'medium_standard',
};

/**
 * Colour feeling keyword → triad. Keys are matched exactly.
 */
export const COLOR_FEELING_TRIADS: ReadonlyMap<string, string> = new Map([
  ['muted', 'dusty_rose_sage_cream'],
  ['dusty', 'dusty_rose_sage_cream'],
  ['desaturated', 'dusty_rose_sage_cream'],
  ['warm', 'butter_yellow_peach_blue'],
  ['cozy', 'butter_yellow_peach_blue'],
  ['cool', 'lavender_mint_sky_blue'],
  ['ethereal', 'pale_lavender_pearl_white'],
  ['vivid', 'coral_mint_cream'],
  ['pastel', 'soft_pink_lavender_mint'],
]);

export const DEFAULT_COLOR_TRIAD = 'soft_pink_lavender_mint';

/**
 * Archetype name → facial style. Keys are matched exactly.
 */
export const ARCHETYPE_FACIAL_STYLES: ReadonlyMap<string, string> = new Map([
  ['joyful_character_archetype', 'dot_eyes_curved_smile'],
  ['melancholic_character_archetype', 'closed_happy_eyes'],
  ['anxious_character_archetype', 'worried_upturned_eyes'],
  ['sleepy_character_archetype', 'closed_curved_eyes'],
  ['mischievous_character_archetype', 'sparkle_mischievous_grin'],
  ['dreamy_character_archetype', 'wide_dreamy_eyes'],
  ['determined_character_archetype', 'focused_straight_gaze'],
]);

export const DEFAULT_FACIAL_STYLE = 'dot_eyes_curved_smile';

/**
 * Morphism names per dimension, for provenance.
 */
export const MORPHISM_NAMES: Record<DimensionName, string> = {
  headShape: HEAD_SHAPE_RULES.morphism,
  bodyProportion: BODY_PROPORTION_RULES.morphism,
  facialStyle: 'emotional_tone_to_facial_style',
  colorTriad: 'design_intent_to_color_triad',
  sizeCategory: SIZE_CATEGORY_RULES.morphism,
};

/**
 * Find the first rule in a chain that matches.
 * @returns The selected instance and the `field:cue` that fired, or null
 */
export function firstMatch(
  chain: RuleChain,
  intent: NormalizedIntent
): { instance: string; cue: string } | null {
  for (const rule of chain.rules) {
    for (const [field, cues] of rule.when) {
      const text = intent[field];
      const cue = cues.find((c) => text.includes(c));
      if (cue !== undefined) {
        return { instance: rule.instance, cue: `${field}:${cue}` };
      }
    }
  }
  return null;
}

/**
 * Every instance id the tables can produce, grouped by dimension.
 * Used at load time to enforce closure.
 */
export function referencedInstances(): Record<DimensionName, string[]> {
  const fromChain = (chain: RuleChain): string[] => [
    ...chain.rules.map((r) => r.instance),
    chain.fallback,
  ];
  return {
    headShape: fromChain(HEAD_SHAPE_RULES),
    bodyProportion: fromChain(BODY_PROPORTION_RULES),
    facialStyle: [...ARCHETYPE_FACIAL_STYLES.values(), DEFAULT_FACIAL_STYLE],
    colorTriad: [...COLOR_FEELING_TRIADS.values(), DEFAULT_COLOR_TRIAD],
    sizeCategory: fromChain(SIZE_CATEGORY_RULES),
  };
}
