/**
 * @fileoverview Facade assembling a full design specification from a prompt.
 *
 * Pipeline: classify the prompt, resolve the intent against the archetype,
 * explain the result, derive the seed, synthesize a name. Every step is
 * total, so {@link DesignService.generateDesign} has no error path once the
 * repository has loaded.
 *
 * @module design-service
 */

import { ArchetypeClassifier } from './archetype-classifier.js';
import { FALLBACK_NAME_PREFIX, NAME_STEM_LENGTH } from './config/defaults.js';
import { resolveDetailed } from './intent-resolver.js';
import { MORPHISM_NAMES } from './morphisms.js';
import { explain } from './rationale.js';
import { deriveSeed } from './seed.js';
import type { SpecificationRepository } from './spec-repository.js';
import {
  DIMENSIONS,
  type ArchetypeLookup,
  type ArchetypeRule,
  type ArchetypeSummary,
  type DesignChoice,
  type DesignGuidelines,
  type DesignSpecification,
} from './types.js';

/**
 * Archetype → character name prefix.
 */
export const NAME_PREFIXES: ReadonlyMap<string, string> = new Map([
  ['joyful_character_archetype', 'Joy'],
  ['melancholic_character_archetype', 'Melan'],
  ['anxious_character_archetype', 'Anx'],
  ['sleepy_character_archetype', 'Sleep'],
  ['mischievous_character_archetype', 'Misc'],
  ['dreamy_character_archetype', 'Dream'],
  ['determined_character_archetype', 'Det'],
]);

export const AESTHETIC_GUIDELINE = 'Kawaii style: cute, simplified shapes, minimal features, pastel-friendly';

export const UNIVERSAL_PRINCIPLES: readonly string[] = [
  'Proportion precision: maintain ratio relationships',
  'Feature economy: each feature must earn its existence',
  'Pastel restraint: stay within soft color spectrum',
  'Approachability priority: no sharp edges or judgment',
  'Emotional honesty: character must be authentic to its emotion',
];

/**
 * Archetype prefix followed by the first characters of the prompt's first word.
 *
 * @example
 * synthesizeName('The feeling of procrastination', 'melancholic_character_archetype') // 'MelanThe'
 */
export function synthesizeName(prompt: string, archetype: string): string {
  const prefix = NAME_PREFIXES.get(archetype) ?? FALLBACK_NAME_PREFIX;
  const firstWord = prompt.toLowerCase().split(/\s+/).find((w) => w.length > 0) ?? '';
  const stem = [...firstWord].slice(0, NAME_STEM_LENGTH).join('');
  return `${prefix}${stem.charAt(0).toUpperCase()}${stem.slice(1)}`;
}

function humanize(instance: string): string {
  return instance.replace(/_/g, ' ');
}

function buildGuidelines(choice: DesignChoice): DesignGuidelines {
  return {
    aesthetic: AESTHETIC_GUIDELINE,
    headDescription: `Use a ${humanize(choice.headShape)} shape for the head`,
    bodyDescription: `Body should be ${humanize(choice.bodyProportion)}`,
    facialDescription: `Face features: ${humanize(choice.facialStyle)}`,
    sizeNote: `Character size: ${humanize(choice.sizeCategory)}`,
    colorNote: `Use ${humanize(choice.colorTriad)} color palette`,
    universalPrinciples: [...UNIVERSAL_PRINCIPLES],
  };
}

/**
 * Entry point for both public operations. Holds no per-request state, so
 * one instance can serve any number of callers.
 */
export class DesignService {
  private readonly classifier: ArchetypeClassifier;

  constructor(private readonly repository: SpecificationRepository) {
    this.classifier = new ArchetypeClassifier(repository);
  }

  /**
   * Produce a complete design specification.
   *
   * @param userPrompt Creative concept, e.g. "the feeling of procrastination"
   * @param designIntent Optional structured analysis. When omitted the
   *   resolver runs on an empty intent and the rationale names the archetype.
   */
  generateDesign(userPrompt: string, designIntent?: unknown): DesignSpecification {
    const archetype = this.classifier.classify(userPrompt);
    const rule: ArchetypeRule = this.repository.archetype(archetype) ?? this.repository.defaultArchetype();
    const { choice, ruleHits } = resolveDetailed(designIntent ?? {}, archetype);

    const designRationale =
      designIntent === undefined || designIntent === null
        ? `Archetype-based selection: ${archetype}`
        : explain(choice, designIntent);

    return {
      characterName: synthesizeName(userPrompt, archetype),
      archetype,
      designSeed: deriveSeed(userPrompt),
      userPrompt,
      choices: { ...choice },
      coreIntention: rule.coreIntention,
      compositionPrinciple: rule.compositionPrinciple,
      whyThisWorks: rule.whyThisWorks,
      designRationale,
      designGuidelines: buildGuidelines(choice),
      provenance: {
        aestheticOlog: this.repository.sources.aesthetic,
        intentionalityOlog: this.repository.sources.intentionality,
        morphismsApplied: DIMENSIONS.map((d) => MORPHISM_NAMES[d]),
        commutativeDiagramsChecked: [...this.repository.commutativeDiagrams()],
        ruleHits: { ...ruleHits },
      },
    };
  }

  /**
   * Look up an archetype's rules. An unknown name is a result, not a throw.
   */
  getArchetypeRules(name: string): ArchetypeLookup {
    const rule = this.repository.archetype(name);
    if (!rule) {
      return {
        found: false,
        error: {
          code: 'UNKNOWN_ARCHETYPE',
          archetype: name,
          message: `Unknown archetype: ${name}`,
          available: this.repository.archetypeNames(),
        },
      };
    }
    return {
      found: true,
      rules: {
        archetype: rule.name,
        coreIntention: rule.coreIntention,
        compositionPrinciple: rule.compositionPrinciple,
        whyThisWorks: rule.whyThisWorks,
        sensoryPrinciples: [...rule.sensoryPrinciples],
        proportionRules: { ...rule.proportionRules },
        designKeywords: [...rule.designIntentKeywords],
        forbiddenCombinations: [...rule.forbiddenCombinations],
        examples: [...rule.examples],
      },
    };
  }

  /** Archetypes in catalogue order */
  listArchetypes(): ArchetypeSummary[] {
    return this.repository.allArchetypes().map((a) => ({ name: a.name, coreIntention: a.coreIntention }));
  }
}
