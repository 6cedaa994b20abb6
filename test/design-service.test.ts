/**
 * @fileoverview Tests for the design facade
 *
 * End-to-end resolution through the bundled ologs: determinism, closure,
 * naming, provenance, and archetype rule lookups.
 */

import { describe, it, expect } from 'vitest';
import { DesignService, UNIVERSAL_PRINCIPLES, synthesizeName } from '../src/design-service.js';
import { GENERIC_RATIONALE } from '../src/rationale.js';
import { DIMENSIONS } from '../src/types.js';
import { loadBundledRepository } from './fixtures.js';

describe('DesignService', () => {
  const repo = loadBundledRepository();
  const service = new DesignService(repo);

  describe('generateDesign without intent', () => {
    it('should resolve a prompt from the archetype alone', () => {
      const design = service.generateDesign('procrastination');

      expect(design.characterName).toBe('MelanPro');
      expect(design.archetype).toBe('melancholic_character_archetype');
      expect(design.designSeed).toBe(23);
      expect(design.userPrompt).toBe('procrastination');
      expect(design.choices).toEqual({
        headShape: 'large_round_orb',
        bodyProportion: 'balanced_cute_50_50',
        facialStyle: 'closed_happy_eyes',
        colorTriad: 'soft_pink_lavender_mint',
        sizeCategory: 'medium_standard',
      });
      expect(design.designRationale).toBe('Archetype-based selection: melancholic_character_archetype');
    });

    it('should be deterministic across calls and service instances', () => {
      const first = service.generateDesign('procrastination');
      const second = new DesignService(loadBundledRepository()).generateDesign('procrastination');

      expect(second.characterName).toBe(first.characterName);
      expect(second.choices).toEqual(first.choices);
      expect(second.designSeed).toBe(first.designSeed);
      expect(second).toEqual(first);
    });

    it('should treat a null intent as absent', () => {
      expect(service.generateDesign('a sleepy cloud', null).designRationale).toBe(
        'Archetype-based selection: sleepy_character_archetype'
      );
    });

    it('should use the default archetype when nothing matches', () => {
      const design = service.generateDesign('test character');
      expect(design.archetype).toBe('joyful_character_archetype');
      expect(design.characterName).toBe('JoyTes');
      expect(design.coreIntention).toBe('Radiate uncomplicated happiness the viewer can borrow.');
    });

    it('should handle an empty prompt', () => {
      const design = service.generateDesign('');
      expect(design.characterName).toBe('Joy');
      expect(design.archetype).toBe('joyful_character_archetype');
      expect(design.designSeed).toBe(10);
    });
  });

  describe('generateDesign with intent', () => {
    const intent = {
      mood: 'sluggish, heavy',
      weight_feeling: 'drooping, weighted',
      color_feeling: 'muted, dusty',
      size_implication: 'small, insignificant',
      primary_shape: 'drooping or curved',
    };

    it('should map the intent onto every dimension', () => {
      const design = service.generateDesign('the feeling of procrastination', intent);

      expect(design.characterName).toBe('MelanThe');
      expect(design.designSeed).toBe(45);
      expect(design.choices).toEqual({
        headShape: 'elongated_teardrop',
        bodyProportion: 'tiny_torso_large_head',
        facialStyle: 'closed_happy_eyes',
        colorTriad: 'dusty_rose_sage_cream',
        sizeCategory: 'small_decorative',
      });
    });

    it('should explain the choices the intent accounts for', () => {
      const design = service.generateDesign('the feeling of procrastination', intent);

      expect(design.designRationale).toBe(
        'The elongated_teardrop head shape conveys drooping and introspection; ' +
          "The tiny_torso_large_head proportion grounds the character's weight; " +
          'The dusty_rose_sage_cream palette reflects muted emotional tone; ' +
          'The small_decorative reflects vulnerability and intimacy'
      );
    });

    it('should render guidelines from the chosen instances', () => {
      const { designGuidelines } = service.generateDesign('the feeling of procrastination', intent);

      expect(designGuidelines).toEqual({
        aesthetic: 'Kawaii style: cute, simplified shapes, minimal features, pastel-friendly',
        headDescription: 'Use a elongated teardrop shape for the head',
        bodyDescription: 'Body should be tiny torso large head',
        facialDescription: 'Face features: closed happy eyes',
        sizeNote: 'Character size: small decorative',
        colorNote: 'Use dusty rose sage cream color palette',
        universalPrinciples: [...UNIVERSAL_PRINCIPLES],
      });
    });

    it('should record provenance', () => {
      const { provenance } = service.generateDesign('the feeling of procrastination', intent);

      expect(provenance).toEqual({
        aestheticOlog: 'aesthetic.olog.json',
        intentionalityOlog: 'intentionality.olog.json',
        morphismsApplied: [
          'design_intent_to_head_shape',
          'design_intent_to_body_proportion',
          'emotional_tone_to_facial_style',
          'design_intent_to_color_triad',
          'design_intent_to_size_category',
        ],
        commutativeDiagramsChecked: ['proportional_coherence', 'emotional_coherence', 'expressiveness_balance'],
        ruleHits: {
          headShape: 'weight_feeling:droop',
          bodyProportion: 'size_implication:insignificant',
          facialStyle: 'archetype:melancholic_character_archetype',
          colorTriad: 'color_feeling:muted',
          sizeCategory: 'size_implication:small',
        },
      });
    });

    it('should map "muted" to the dusty palette', () => {
      const design = service.generateDesign('muted', { color_feeling: 'muted', weight_feeling: 'heavy', primary_shape: 'round' });
      expect(design.choices.colorTriad).toBe('dusty_rose_sage_cream');
    });

    it('should map "tiny" to the small plush toy', () => {
      const design = service.generateDesign('tiny', { size_implication: 'tiny', weight_feeling: 'light', primary_shape: 'round' });
      expect(design.choices.sizeCategory).toBe('small_plush_toy');
    });

    it('should give the generic rationale for an empty intent', () => {
      expect(service.generateDesign('a brave heart', {}).designRationale).toBe(GENERIC_RATIONALE);
    });

    it('should ignore malformed intent fields', () => {
      const design = service.generateDesign('a brave heart', { weight_feeling: 12, color_feeling: 'vivid' });
      expect(design.choices.headShape).toBe('large_round_orb');
      expect(design.choices.colorTriad).toBe('coral_mint_cream');
      expect(design.choices.facialStyle).toBe('focused_straight_gaze');
    });
  });

  describe('closure', () => {
    it('should only produce declared instances', () => {
      const prompts = ['happy', 'nervous', 'sleepy', 'sneaky', 'dream', 'brave', 'nothing', ''];
      for (const prompt of prompts) {
        const design = service.generateDesign(prompt, { color_feeling: 'cool', primary_shape: 'spike' });
        for (const dimension of DIMENSIONS) {
          expect(repo.dimension(dimension).instances).toContain(design.choices[dimension]);
        }
      }
    });
  });

  describe('getArchetypeRules', () => {
    it('should return the rules for a known archetype', () => {
      const lookup = service.getArchetypeRules('melancholic_character_archetype');

      expect(lookup.found).toBe(true);
      if (!lookup.found) return;
      expect(lookup.rules.archetype).toBe('melancholic_character_archetype');
      expect(lookup.rules.compositionPrinciple).toBe('Drooping lines balanced by a grounded, weighted base.');
      expect(lookup.rules.designKeywords).toEqual([
        'sad',
        'melanchol',
        'lonely',
        'gloomy',
        'procrastinat',
        'wistful',
        'sluggish',
      ]);
      expect(lookup.rules.proportionRules).toEqual({ head_to_body: '30:70', eye_spacing: 'close' });
      expect(lookup.rules.sensoryPrinciples).toHaveLength(3);
    });

    it('should return a typed result for an unknown archetype', () => {
      const lookup = service.getArchetypeRules('nonexistent');

      expect(lookup.found).toBe(false);
      if (lookup.found) return;
      expect(lookup.error.code).toBe('UNKNOWN_ARCHETYPE');
      expect(lookup.error.archetype).toBe('nonexistent');
      expect(lookup.error.message).toBe('Unknown archetype: nonexistent');
      expect(lookup.error.available).toHaveLength(7);
    });

    it('should return copies the caller can modify', () => {
      const lookup = service.getArchetypeRules('joyful_character_archetype');
      if (!lookup.found) throw new Error('joyful archetype missing');
      lookup.rules.designKeywords.push('extra');

      expect(repo.archetype('joyful_character_archetype')?.designIntentKeywords).not.toContain('extra');
    });
  });

  describe('listArchetypes', () => {
    it('should list archetypes in catalogue order', () => {
      const list = service.listArchetypes();
      expect(list).toHaveLength(7);
      expect(list[0]).toEqual({
        name: 'joyful_character_archetype',
        coreIntention: 'Radiate uncomplicated happiness the viewer can borrow.',
      });
    });
  });
});

describe('synthesizeName', () => {
  it.each([
    ['the feeling of procrastination', 'melancholic_character_archetype', 'MelanThe'],
    ['   Sunny day', 'joyful_character_archetype', 'JoySun'],
    ['ok', 'anxious_character_archetype', 'AnxOk'],
    ['ÉCLAIR dream', 'dreamy_character_archetype', 'DreamÉcl'],
    ['x', 'unknown_archetype', 'KawaiiX'],
    ['', 'sleepy_character_archetype', 'Sleep'],
  ])('should name "%s" (%s) as %s', (prompt, archetype, expected) => {
    expect(synthesizeName(prompt, archetype)).toBe(expected);
  });
});
