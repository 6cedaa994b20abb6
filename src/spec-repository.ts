/**
 * @fileoverview Loads and validates the two olog documents.
 *
 * The aesthetic olog supplies the taxonomy (design dimensions and their
 * closed instance sets); the intentionality olog supplies the archetype
 * catalogue. Loading is eager and total: any invariant violation throws a
 * {@link SpecificationError} and no repository is built. After construction
 * everything is frozen and shared read-only for the life of the process.
 *
 * @module spec-repository
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import type * as z from 'zod';
import {
  AESTHETIC_OLOG_FILE,
  DEFAULT_ARCHETYPE,
  INTENTIONALITY_OLOG_FILE,
  resolveOlogDir,
} from './config/defaults.js';
import { referencedInstances } from './morphisms.js';
import { aestheticOlogSchema, formatZodIssues, intentionalityOlogSchema } from './schemas.js';
import type { AestheticOlog, IntentionalityOlog } from './schemas.js';
import {
  DIMENSIONS,
  DIMENSION_TYPES,
  InvalidTaxonomyEntryError,
  MalformedSpecificationError,
  getErrorMessage,
  type ArchetypeRule,
  type Dimension,
  type DimensionName,
  type Taxonomy,
} from './types.js';

/**
 * Already-parsed olog documents plus the names they are reported under.
 */
export interface OlogSources {
  aesthetic: unknown;
  intentionality: unknown;
  aestheticName?: string;
  intentionalityName?: string;
}

/** Document names reported in provenance */
export interface SourceNames {
  aesthetic: string;
  intentionality: string;
}

/**
 * Immutable, validated view of the taxonomy and archetype catalogue.
 *
 * @example
 * ```typescript
 * const repo = SpecificationRepository.loadFromDirectory('./data/ologs');
 * repo.dimension('headShape').instances; // ['large_round_orb', ...]
 * repo.archetype('sleepy_character_archetype')?.coreIntention;
 * ```
 */
export class SpecificationRepository {
  readonly sources: Readonly<SourceNames>;
  private readonly taxonomy: Taxonomy;
  private readonly archetypes: ReadonlyMap<string, ArchetypeRule>;
  private readonly archetypeList: readonly ArchetypeRule[];
  private readonly diagrams: readonly string[];

  private constructor(
    sources: SourceNames,
    taxonomy: Taxonomy,
    archetypes: readonly ArchetypeRule[],
    diagrams: readonly string[]
  ) {
    this.sources = Object.freeze({ ...sources });
    this.taxonomy = taxonomy;
    this.archetypeList = Object.freeze([...archetypes]);
    this.archetypes = new Map(archetypes.map((a) => [a.name, a]));
    this.diagrams = Object.freeze([...diagrams]);
    Object.freeze(this);
  }

  /**
   * Validate parsed documents and build the repository.
   * @throws MalformedSpecificationError when a document is absent, fails its schema,
   *   or lacks a required dimension or the default archetype
   * @throws InvalidTaxonomyEntryError when a structural invariant is broken
   */
  static load(sources: OlogSources): SpecificationRepository {
    const names: SourceNames = {
      aesthetic: sources.aestheticName ?? AESTHETIC_OLOG_FILE,
      intentionality: sources.intentionalityName ?? INTENTIONALITY_OLOG_FILE,
    };

    const aesthetic: AestheticOlog = parseDocument(sources.aesthetic, names.aesthetic, aestheticOlogSchema);
    const intentionality: IntentionalityOlog = parseDocument(
      sources.intentionality,
      names.intentionality,
      intentionalityOlogSchema
    );

    const taxonomy = buildTaxonomy(aesthetic, names.aesthetic);
    checkRuleClosure(taxonomy, names.aesthetic);
    const archetypes = buildArchetypes(intentionality, names.intentionality);
    const diagrams = Object.keys(aesthetic.olog.commutative_diagrams ?? {});

    return new SpecificationRepository(names, taxonomy, archetypes, diagrams);
  }

  /**
   * Read both ologs from a directory and load them.
   * @param dir Directory holding the olog files; defaults to the configured location
   */
  static loadFromDirectory(dir?: string): SpecificationRepository {
    const ologDir = resolveOlogDir(dir);
    const aesthetic = readDocument(join(ologDir, AESTHETIC_OLOG_FILE), AESTHETIC_OLOG_FILE);
    console.log(`[spec-repository] Loaded aesthetic olog from ${join(ologDir, AESTHETIC_OLOG_FILE)}`);
    const intentionality = readDocument(join(ologDir, INTENTIONALITY_OLOG_FILE), INTENTIONALITY_OLOG_FILE);
    console.log(`[spec-repository] Loaded intentionality olog from ${join(ologDir, INTENTIONALITY_OLOG_FILE)}`);

    return SpecificationRepository.load({
      aesthetic,
      intentionality,
      aestheticName: AESTHETIC_OLOG_FILE,
      intentionalityName: INTENTIONALITY_OLOG_FILE,
    });
  }

  getTaxonomy(): Taxonomy {
    return this.taxonomy;
  }

  dimension(name: DimensionName): Dimension {
    return this.taxonomy[name];
  }

  /** Dimension names in declaration order */
  dimensions(): DimensionName[] {
    return [...DIMENSIONS];
  }

  archetype(name: string): ArchetypeRule | undefined {
    return this.archetypes.get(name);
  }

  /** Archetypes in catalogue order */
  allArchetypes(): readonly ArchetypeRule[] {
    return this.archetypeList;
  }

  archetypeNames(): string[] {
    return this.archetypeList.map((a) => a.name);
  }

  /** Archetype used when classification finds no keyword; guaranteed present */
  defaultArchetype(): ArchetypeRule {
    const rule = this.archetypes.get(DEFAULT_ARCHETYPE);
    if (!rule) {
      // load() refuses catalogues without it
      throw new MalformedSpecificationError(`default archetype "${DEFAULT_ARCHETYPE}" is missing`);
    }
    return rule;
  }

  /** Names of the coherence diagrams declared in the aesthetic olog */
  commutativeDiagrams(): readonly string[] {
    return this.diagrams;
  }
}

function parseDocument<S extends z.ZodTypeAny>(document: unknown, source: string, schema: S): z.infer<S> {
  if (document === undefined || document === null) {
    throw new MalformedSpecificationError('document is missing', source);
  }
  const result = schema.safeParse(document);
  if (!result.success) {
    throw new MalformedSpecificationError(formatZodIssues(result.error), source);
  }
  return result.data;
}

function readDocument(path: string, source: string): unknown {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new MalformedSpecificationError(`cannot read ${path}: ${getErrorMessage(err)}`, source);
  }
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new MalformedSpecificationError(`unparsable JSON: ${getErrorMessage(err)}`, source);
  }
}

function buildTaxonomy(doc: AestheticOlog, source: string): Taxonomy {
  const types = doc.olog.types;

  // Every type that declares instances is a dimension, required or not
  for (const [typeName, def] of Object.entries(types)) {
    if (def.instances === undefined) continue;
    if (def.instances.length === 0) {
      throw new InvalidTaxonomyEntryError(`type "${typeName}" declares no instances`, source);
    }
    const seen = new Set<string>();
    for (const id of def.instances) {
      if (seen.has(id)) {
        throw new InvalidTaxonomyEntryError(`type "${typeName}" declares instance "${id}" more than once`, source);
      }
      seen.add(id);
    }
  }

  const dimensionOf = (name: DimensionName): Dimension => {
    const typeName = DIMENSION_TYPES[name];
    const def = types[typeName];
    if (!def || def.instances === undefined) {
      throw new MalformedSpecificationError(`required dimension type "${typeName}" is missing`, source);
    }
    return Object.freeze({
      name,
      typeName,
      description: def.description ?? '',
      instances: Object.freeze([...def.instances]),
      properties: Object.freeze({ ...(def.properties ?? {}) }),
    });
  };

  return Object.freeze({
    headShape: dimensionOf('headShape'),
    bodyProportion: dimensionOf('bodyProportion'),
    facialStyle: dimensionOf('facialStyle'),
    colorTriad: dimensionOf('colorTriad'),
    sizeCategory: dimensionOf('sizeCategory'),
  });
}

function checkRuleClosure(taxonomy: Taxonomy, source: string): void {
  const referenced = referencedInstances();
  for (const name of DIMENSIONS) {
    const declared = new Set(taxonomy[name].instances);
    for (const id of referenced[name]) {
      if (!declared.has(id)) {
        throw new InvalidTaxonomyEntryError(
          `resolver rule target "${id}" is not an instance of "${taxonomy[name].typeName}"`,
          source
        );
      }
    }
  }
}

function buildArchetypes(doc: IntentionalityOlog, source: string): ArchetypeRule[] {
  const rules = Object.entries(doc.olog.instances).map(([name, def]): ArchetypeRule => {
    const keywords = [
      ...new Set(def.design_intent_keywords.map((k) => k.trim().toLowerCase()).filter((k) => k.length > 0)),
    ];
    if (keywords.length === 0 && name !== DEFAULT_ARCHETYPE) {
      throw new InvalidTaxonomyEntryError(`archetype "${name}" has no design intent keywords`, source);
    }
    return Object.freeze({
      name,
      coreIntention: def.core_intention,
      compositionPrinciple: def.composition_principle,
      whyThisWorks: def.why_this_works,
      sensoryPrinciples: Object.freeze([...def.sensory_principles]),
      proportionRules: Object.freeze({ ...def.proportion_rules }),
      designIntentKeywords: Object.freeze(keywords),
      forbiddenCombinations: Object.freeze([...def.forbidden_combinations]),
      examples: Object.freeze([...def.examples]),
    });
  });

  if (!rules.some((r) => r.name === DEFAULT_ARCHETYPE)) {
    throw new MalformedSpecificationError(`default archetype "${DEFAULT_ARCHETYPE}" is missing`, source);
  }
  return rules;
}

// Singleton instance
let repositoryInstance: SpecificationRepository | null = null;

/**
 * Gets or loads the process-wide repository.
 * The directory argument only applies on first load.
 */
export function getRepository(dir?: string): SpecificationRepository {
  if (!repositoryInstance) {
    repositoryInstance = SpecificationRepository.loadFromDirectory(dir);
  }
  return repositoryInstance;
}

/**
 * Drops the process-wide repository.
 * Primarily used for testing to ensure test isolation.
 */
export function resetRepository(): void {
  repositoryInstance = null;
}
