/**
 * @fileoverview Maps a design intent and archetype onto one instance per dimension.
 *
 * Chains in {@link module:morphisms} drive head shape, body proportion and
 * size; colour and facial style are exact table lookups. Every dimension
 * has a fixed fallback, so resolution is total.
 *
 * @module intent-resolver
 */

import {
  ARCHETYPE_FACIAL_STYLES,
  BODY_PROPORTION_RULES,
  COLOR_FEELING_TRIADS,
  DEFAULT_COLOR_TRIAD,
  DEFAULT_FACIAL_STYLE,
  HEAD_SHAPE_RULES,
  SIZE_CATEGORY_RULES,
  firstMatch,
  type RuleChain,
} from './morphisms.js';
import { designIntentSchema } from './schemas.js';
import type { DesignChoice, DesignIntent, NormalizedIntent, ResolutionTrace } from './types.js';

// Splits "muted, dusty" into candidate table keys
const COLOR_TOKEN_SEPARATOR = /[\s,;/]+/;

/**
 * Lower-case every intent field, treating absent or non-string values as empty text.
 */
export function normalizeIntent(intent: unknown): NormalizedIntent {
  const parsed: DesignIntent = designIntentSchema.parse(intent ?? {});
  return {
    mood: (parsed.mood ?? '').toLowerCase(),
    weight_feeling: (parsed.weight_feeling ?? '').toLowerCase(),
    color_feeling: (parsed.color_feeling ?? '').toLowerCase(),
    size_implication: (parsed.size_implication ?? '').toLowerCase(),
    primary_shape: (parsed.primary_shape ?? '').toLowerCase(),
  };
}

function applyChain(chain: RuleChain, intent: NormalizedIntent): { instance: string; cue: string | null } {
  const hit = firstMatch(chain, intent);
  return hit ?? { instance: chain.fallback, cue: null };
}

/**
 * Colour lookup: the whole feeling first, then each token in order.
 */
function lookupColorTriad(colorFeeling: string): { instance: string; cue: string | null } {
  const feeling = colorFeeling.trim();
  const exact = COLOR_FEELING_TRIADS.get(feeling);
  if (exact !== undefined) {
    return { instance: exact, cue: `color_feeling:${feeling}` };
  }
  for (const token of feeling.split(COLOR_TOKEN_SEPARATOR)) {
    const triad = COLOR_FEELING_TRIADS.get(token);
    if (triad !== undefined) {
      return { instance: triad, cue: `color_feeling:${token}` };
    }
  }
  return { instance: DEFAULT_COLOR_TRIAD, cue: null };
}

function lookupFacialStyle(archetype: string): { instance: string; cue: string | null } {
  const style = ARCHETYPE_FACIAL_STYLES.get(archetype);
  return style !== undefined ? { instance: style, cue: `archetype:${archetype}` } : { instance: DEFAULT_FACIAL_STYLE, cue: null };
}

/**
 * Resolve every dimension and record which cue decided it.
 *
 * @param intent Raw intent; malformed fields count as empty
 * @param archetype Archetype inferred from the prompt
 */
export function resolveDetailed(intent: unknown, archetype: string): ResolutionTrace {
  const normalized = normalizeIntent(intent);

  const head = applyChain(HEAD_SHAPE_RULES, normalized);
  const body = applyChain(BODY_PROPORTION_RULES, normalized);
  const face = lookupFacialStyle(archetype);
  const color = lookupColorTriad(normalized.color_feeling);
  const size = applyChain(SIZE_CATEGORY_RULES, normalized);

  return {
    choice: {
      headShape: head.instance,
      bodyProportion: body.instance,
      facialStyle: face.instance,
      colorTriad: color.instance,
      sizeCategory: size.instance,
    },
    ruleHits: {
      headShape: head.cue,
      bodyProportion: body.cue,
      facialStyle: face.cue,
      colorTriad: color.cue,
      sizeCategory: size.cue,
    },
  };
}

/**
 * Resolve an intent to one instance per dimension.
 */
export function resolve(intent: unknown, archetype: string): DesignChoice {
  return resolveDetailed(intent, archetype).choice;
}
