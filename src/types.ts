/**
 * @fileoverview Type definitions for kawaii-olog
 *
 * This module contains the TypeScript interfaces, types, and enums shared
 * across the resolver pipeline. It covers:
 * - Taxonomy dimensions and archetype rules loaded from the ologs
 * - Design intent input and design choice output
 * - The assembled design specification
 * - API request/response envelopes
 * - Specification load errors and error handling utilities
 */

// ========== Taxonomy Types ==========

/**
 * Design dimensions, in declaration order.
 * Rationale clauses and guideline strings follow this order.
 */
export const DIMENSIONS = [
  'headShape',
  'bodyProportion',
  'facialStyle',
  'colorTriad',
  'sizeCategory',
] as const;

/** Name of a design dimension */
export type DimensionName = (typeof DIMENSIONS)[number];

/**
 * Olog type name each dimension is read from.
 */
export const DIMENSION_TYPES: Record<DimensionName, string> = {
  headShape: 'HeadShape',
  bodyProportion: 'BodyProportion',
  facialStyle: 'FacialStyle',
  colorTriad: 'ColorTriad',
  sizeCategory: 'SizeCategory',
};

/**
 * A design axis with its closed set of valid instances.
 */
export interface Dimension {
  /** Dimension key */
  name: DimensionName;
  /** Olog type the dimension was loaded from */
  typeName: string;
  /** Human description from the olog */
  description: string;
  /** Ordered, non-empty, unique instance ids */
  instances: readonly string[];
  /** Free-form properties documented on the type */
  properties: Readonly<Record<string, unknown>>;
}

/** All loaded dimensions keyed by name */
export type Taxonomy = Readonly<Record<DimensionName, Dimension>>;

// ========== Archetype Types ==========

/**
 * Rules, keywords, and rationale for one emotional archetype.
 */
export interface ArchetypeRule {
  /** Unique archetype name, e.g. `sleepy_character_archetype` */
  name: string;
  coreIntention: string;
  compositionPrinciple: string;
  whyThisWorks: string;
  sensoryPrinciples: readonly string[];
  proportionRules: Readonly<Record<string, unknown>>;
  /** Lower-cased keywords matched as substrings of the prompt */
  designIntentKeywords: readonly string[];
  forbiddenCombinations: readonly unknown[];
  examples: readonly unknown[];
}

// ========== Intent and Choice Types ==========

/**
 * Structured design analysis supplied alongside a prompt.
 * Absent fields are treated as empty text.
 */
export interface DesignIntent {
  mood?: string;
  weight_feeling?: string;
  color_feeling?: string;
  size_implication?: string;
  primary_shape?: string;
}

/** Field names recognised on a design intent */
export type IntentField = keyof DesignIntent;

/**
 * Intent with every field present, lower-cased.
 */
export type NormalizedIntent = Readonly<Record<IntentField, string>>;

/**
 * One concrete instance id per dimension.
 * Every value is a member of its dimension's declared instance list.
 */
export type DesignChoice = Readonly<Record<DimensionName, string>>;

/**
 * Resolver output with the cue that fired for each dimension.
 * A `null` hit means the dimension fell back to its default instance.
 */
export interface ResolutionTrace {
  choice: DesignChoice;
  ruleHits: Readonly<Record<DimensionName, string | null>>;
}

// ========== Design Specification Types ==========

/**
 * Human-readable guidance for an external image generator.
 */
export interface DesignGuidelines {
  aesthetic: string;
  headDescription: string;
  bodyDescription: string;
  facialDescription: string;
  sizeNote: string;
  colorNote: string;
  universalPrinciples: string[];
}

/**
 * Where a design came from: documents, morphisms, and coherence diagrams.
 */
export interface DesignProvenance {
  aestheticOlog: string;
  intentionalityOlog: string;
  morphismsApplied: string[];
  commutativeDiagramsChecked: string[];
  ruleHits: Record<DimensionName, string | null>;
}

/**
 * Final design record returned to callers. JSON-serializable.
 */
export interface DesignSpecification {
  characterName: string;
  archetype: string;
  /** Reproducibility fingerprint in [0, 100) */
  designSeed: number;
  userPrompt: string;
  choices: Record<DimensionName, string>;
  coreIntention: string;
  compositionPrinciple: string;
  whyThisWorks: string;
  designRationale: string;
  designGuidelines: DesignGuidelines;
  provenance: DesignProvenance;
}

// ========== Archetype Lookup Types ==========

/**
 * Public view of an archetype's rules.
 */
export interface ArchetypeRulesView {
  archetype: string;
  coreIntention: string;
  compositionPrinciple: string;
  whyThisWorks: string;
  sensoryPrinciples: string[];
  proportionRules: Record<string, unknown>;
  designKeywords: string[];
  forbiddenCombinations: unknown[];
  examples: unknown[];
}

/**
 * Recoverable result for a lookup of an archetype that is not in the catalogue.
 */
export interface UnknownArchetype {
  code: 'UNKNOWN_ARCHETYPE';
  archetype: string;
  message: string;
  /** Known archetype names, in catalogue order */
  available: string[];
}

/** Result of an archetype rules lookup */
export type ArchetypeLookup =
  | { found: true; rules: ArchetypeRulesView }
  | { found: false; error: UnknownArchetype };

/** Archetype name with its one-line intention */
export interface ArchetypeSummary {
  name: string;
  coreIntention: string;
}

// ========== API Error Codes ==========

/**
 * Error codes for API responses
 */
export enum ApiErrorCode {
  /** Resource not found */
  NOT_FOUND = 'NOT_FOUND',
  /** Invalid input provided */
  INVALID_INPUT = 'INVALID_INPUT',
  /** Internal server error */
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * User-friendly error messages for each error code
 */
export const ErrorMessages: Record<ApiErrorCode, string> = {
  [ApiErrorCode.NOT_FOUND]: 'The requested resource was not found',
  [ApiErrorCode.INVALID_INPUT]: 'Invalid input provided',
  [ApiErrorCode.INTERNAL_ERROR]: 'An internal error occurred',
};

// ========== API Request/Response Types ==========

/**
 * Request to generate a design
 */
export interface GenerateDesignRequest {
  /** Free-text creative concept */
  userPrompt: string;
  /** Optional structured analysis; malformed fields count as empty */
  designIntent?: unknown;
}

/**
 * Standard API response wrapper
 * @template T Type of the data payload
 */
export interface ApiResponse<T = unknown> {
  /** Whether the operation succeeded */
  success: boolean;
  /** Error message if operation failed */
  error?: string;
  /** Error code for programmatic handling */
  errorCode?: ApiErrorCode;
  /** Response data payload */
  data?: T;
}

/**
 * Creates a standardized error response
 * @template T Data type of the response this error stands in for
 * @param code Error code
 * @param details Optional detailed error message
 * @returns Formatted error response
 */
export function createErrorResponse<T = unknown>(code: ApiErrorCode, details?: string): ApiResponse<T> {
  return {
    success: false,
    error: details || ErrorMessages[code],
    errorCode: code,
  };
}

/**
 * Creates a standardized success response
 * @template T Type of the data payload
 * @param data Optional response data
 * @returns Formatted success response
 */
export function createSuccessResponse<T>(data?: T): ApiResponse<T> {
  return {
    success: true,
    data,
  };
}

// ========== Specification Errors ==========

/** Codes for fatal specification load failures */
export type SpecificationErrorCode = 'MALFORMED_SPECIFICATION' | 'INVALID_TAXONOMY_ENTRY';

/**
 * Base class for failures while loading the ologs.
 * Any of these aborts startup; no partial repository is built.
 */
export class SpecificationError extends Error {
  readonly code: SpecificationErrorCode;
  /** Document the failure was found in, when known */
  readonly source: string | undefined;

  constructor(code: SpecificationErrorCode, message: string, source?: string) {
    super(source ? `${source}: ${message}` : message);
    this.name = 'SpecificationError';
    this.code = code;
    this.source = source;
  }
}

/**
 * A document is missing, unparsable, or lacks a required section.
 */
export class MalformedSpecificationError extends SpecificationError {
  constructor(message: string, source?: string) {
    super('MALFORMED_SPECIFICATION', message, source);
    this.name = 'MalformedSpecificationError';
  }
}

/**
 * A document parsed but breaks a structural invariant
 * (empty or duplicate instances, unknown rule target, keyword-less archetype).
 */
export class InvalidTaxonomyEntryError extends SpecificationError {
  constructor(message: string, source?: string) {
    super('INVALID_TAXONOMY_ENTRY', message, source);
    this.name = 'InvalidTaxonomyEntryError';
  }
}

// ========== Error Handling Utilities ==========

/**
 * Type guard to check if a value is an Error instance
 * @param value The value to check
 * @returns True if the value is an Error instance
 */
export function isError(value: unknown): value is Error {
  return value instanceof Error;
}

/**
 * Safely extracts an error message from an unknown caught value.
 *
 * @param error The caught error (type unknown in strict mode)
 * @returns A string error message
 *
 * @example
 * ```typescript
 * try {
 *   loadRepository(dir);
 * } catch (err) {
 *   console.error('Failed:', getErrorMessage(err));
 * }
 * ```
 */
export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'An unknown error occurred';
}
