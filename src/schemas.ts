/**
 * @fileoverview Zod schemas for the olog documents, design intent, and API requests.
 *
 * @module schemas
 */

import * as z from 'zod';
import type { ZodError } from 'zod';

export const ologTypeSchema = z.object({
  description: z.string().optional(),
  instances: z.array(z.string()).optional(),
  properties: z.record(z.unknown()).optional(),
});

/** Taxonomy document; `olog.types` is the required section */
export const aestheticOlogSchema = z.object({
  olog: z.object({
    name: z.string().optional(),
    version: z.string().optional(),
    types: z.record(ologTypeSchema),
    morphisms: z.record(z.unknown()).optional(),
    commutative_diagrams: z.record(z.unknown()).optional(),
  }),
});

export const archetypeSchema = z.object({
  core_intention: z.string(),
  composition_principle: z.string(),
  why_this_works: z.string(),
  sensory_principles: z.array(z.string()).default([]),
  proportion_rules: z.record(z.unknown()).default({}),
  design_intent_keywords: z.array(z.string()).default([]),
  forbidden_combinations: z.array(z.unknown()).default([]),
  examples: z.array(z.unknown()).default([]),
});

/** Archetype catalogue document; `olog.instances` is the required section */
export const intentionalityOlogSchema = z.object({
  olog: z.object({
    name: z.string().optional(),
    version: z.string().optional(),
    instances: z.record(archetypeSchema),
  }),
});

export type AestheticOlog = z.infer<typeof aestheticOlogSchema>;
export type IntentionalityOlog = z.infer<typeof intentionalityOlogSchema>;

// Non-string fields are dropped rather than rejected
const intentText = z.string().optional().catch(undefined);

/**
 * Lenient design intent parser. Anything that is not an object becomes `{}`.
 */
export const designIntentSchema = z
  .object({
    mood: intentText,
    weight_feeling: intentText,
    color_feeling: intentText,
    size_implication: intentText,
    primary_shape: intentText,
  })
  .catch({});

/**
 * Flatten zod issues into `path: message` lines.
 */
export function formatZodIssues(error: ZodError): string {
  return error.errors
    .map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`)
    .join('; ');
}

/** Body of `POST /api/designs` */
export const generateDesignRequestSchema = z.object({
  userPrompt: z.string({ required_error: 'userPrompt is required' }),
  designIntent: z.unknown().optional(),
});
