/**
 * @fileoverview Infers the emotional archetype of a free-text prompt.
 *
 * @module archetype-classifier
 */

import type { SpecificationRepository } from './spec-repository.js';

/**
 * Keyword matcher over the archetype catalogue.
 *
 * Archetypes are tested in catalogue order and the first one with any
 * keyword occurring in the lower-cased prompt wins. This is deliberately
 * first-match, not best-match: a prompt mentioning both "nervous" and
 * "dream" resolves to whichever archetype the catalogue lists first, no
 * matter how many keywords each one hits.
 */
export class ArchetypeClassifier {
  constructor(private readonly repository: SpecificationRepository) {}

  /**
   * @returns Name of the first matching archetype, or the default archetype
   */
  classify(promptText: string): string {
    return this.match(promptText)?.archetype ?? this.repository.defaultArchetype().name;
  }

  /**
   * Like {@link classify}, but reports which keyword matched.
   * @returns null when no archetype matches
   */
  match(promptText: string): { archetype: string; keyword: string } | null {
    const prompt = promptText.toLowerCase();
    for (const rule of this.repository.allArchetypes()) {
      const keyword = rule.designIntentKeywords.find((kw) => prompt.includes(kw));
      if (keyword !== undefined) {
        return { archetype: rule.name, keyword };
      }
    }
    return null;
  }
}
