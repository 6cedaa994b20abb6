/**
 * @fileoverview Short natural-language justification for a resolved design.
 *
 * @module rationale
 */

import { normalizeIntent } from './intent-resolver.js';
import type { DesignChoice, DimensionName, IntentField } from './types.js';

/** Joins clauses into one sentence */
export const RATIONALE_SEPARATOR = '; ';

/** Returned when no intent cue produced a clause */
export const GENERIC_RATIONALE = 'Design choices selected to match emotional intent';

interface RationaleClause {
  dimension: DimensionName;
  field: IntentField;
  cues: readonly string[];
  render: (instance: string) => string;
}

// Dimension declaration order
const CLAUSES: readonly RationaleClause[] = [
  {
    dimension: 'headShape',
    field: 'weight_feeling',
    cues: ['droop'],
    render: (id) => `The ${id} head shape conveys drooping and introspection`,
  },
  {
    dimension: 'bodyProportion',
    field: 'weight_feeling',
    cues: ['weighted', 'heavy'],
    render: (id) => `The ${id} proportion grounds the character's weight`,
  },
  {
    dimension: 'colorTriad',
    field: 'color_feeling',
    cues: ['muted'],
    render: (id) => `The ${id} palette reflects muted emotional tone`,
  },
  {
    dimension: 'sizeCategory',
    field: 'size_implication',
    cues: ['small'],
    render: (id) => `The ${id} reflects vulnerability and intimacy`,
  },
];

/**
 * Explain the choices that an intent cue accounts for.
 *
 * @example
 * explain(choice, { weight_feeling: 'drooping' })
 * // 'The elongated_teardrop head shape conveys drooping and introspection'
 */
export function explain(choices: DesignChoice, intent: unknown): string {
  const normalized = normalizeIntent(intent);
  const parts = CLAUSES.filter((clause) => clause.cues.some((cue) => normalized[clause.field].includes(cue))).map(
    (clause) => clause.render(choices[clause.dimension])
  );
  return parts.length > 0 ? parts.join(RATIONALE_SEPARATOR) : GENERIC_RATIONALE;
}
