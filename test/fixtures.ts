/**
 * @fileoverview Shared olog fixtures for tests.
 *
 * Reads the bundled ologs once per call so each test can mutate its own copy.
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  aestheticOlogSchema,
  intentionalityOlogSchema,
  type AestheticOlog,
  type IntentionalityOlog,
} from '../src/schemas.js';
import { SpecificationRepository } from '../src/spec-repository.js';

export const OLOG_DIR = join(dirname(fileURLToPath(import.meta.url)), '..', 'data', 'ologs');

export function readAesthetic(): AestheticOlog {
  return aestheticOlogSchema.parse(JSON.parse(readFileSync(join(OLOG_DIR, 'aesthetic.olog.json'), 'utf-8')));
}

export function readIntentionality(): IntentionalityOlog {
  return intentionalityOlogSchema.parse(
    JSON.parse(readFileSync(join(OLOG_DIR, 'intentionality.olog.json'), 'utf-8'))
  );
}

/** Bundled ologs loaded without touching the singleton */
export function loadBundledRepository(): SpecificationRepository {
  return SpecificationRepository.load({ aesthetic: readAesthetic(), intentionality: readIntentionality() });
}

/** Minimal archetype entry for building custom catalogues */
export function archetypeEntry(keywords: string[]): IntentionalityOlog['olog']['instances'][string] {
  return {
    core_intention: 'test intention',
    composition_principle: 'test composition',
    why_this_works: 'test reason',
    sensory_principles: [],
    proportion_rules: {},
    design_intent_keywords: keywords,
    forbidden_combinations: [],
    examples: [],
  };
}
