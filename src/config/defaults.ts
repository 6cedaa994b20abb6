/**
 * @fileoverview Centralized defaults for kawaii-olog.
 *
 * Olog locations, server settings, and the fixed names the resolver
 * relies on.
 *
 * @module config/defaults
 */

import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

// ============================================================================
// Olog Documents
// ============================================================================

/** File name of the aesthetic (taxonomy) olog */
export const AESTHETIC_OLOG_FILE = 'aesthetic.olog.json';

/** File name of the intentionality (archetype catalogue) olog */
export const INTENTIONALITY_OLOG_FILE = 'intentionality.olog.json';

/** Environment variable that overrides the olog directory */
export const OLOG_DIR_ENV = 'KAWAII_OLOG_DIR';

/**
 * Bundled olog directory. Resolves the same from `src/config` and
 * `dist/config`.
 */
export const BUNDLED_OLOG_DIR = join(dirname(fileURLToPath(import.meta.url)), '..', '..', 'data', 'ologs');

/**
 * Olog directory to load from: explicit argument, then environment, then bundled.
 */
export function resolveOlogDir(explicit?: string): string {
  return explicit || process.env[OLOG_DIR_ENV] || BUNDLED_OLOG_DIR;
}

// ============================================================================
// Archetypes
// ============================================================================

/**
 * Archetype used when no keyword matches the prompt.
 * The catalogue must contain it; it is the only one allowed no keywords.
 */
export const DEFAULT_ARCHETYPE = 'joyful_character_archetype';

/** Name prefix for archetypes without an entry in the prefix table */
export const FALLBACK_NAME_PREFIX = 'Kawaii';

/** Characters of the prompt's first token appended to the name prefix */
export const NAME_STEM_LENGTH = 3;

// ============================================================================
// Web Server
// ============================================================================

/** Default HTTP port */
export const DEFAULT_PORT = 3000;

/** Default bind address */
export const DEFAULT_HOST = '0.0.0.0';
