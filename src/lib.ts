/**
 * @fileoverview Public library exports.
 *
 * @module lib
 */

export { SpecificationRepository, getRepository, resetRepository, type OlogSources } from './spec-repository.js';
export { ArchetypeClassifier } from './archetype-classifier.js';
export { normalizeIntent, resolve, resolveDetailed } from './intent-resolver.js';
export { explain } from './rationale.js';
export { deriveSeed } from './seed.js';
export { DesignService, synthesizeName } from './design-service.js';
export { WebServer, startWebServer, type WebServerOptions } from './web/server.js';
export {
  DIMENSIONS,
  MalformedSpecificationError,
  InvalidTaxonomyEntryError,
  SpecificationError,
  type ArchetypeLookup,
  type ArchetypeRule,
  type DesignChoice,
  type DesignIntent,
  type DesignSpecification,
  type Dimension,
  type DimensionName,
  type Taxonomy,
  type UnknownArchetype,
} from './types.js';
