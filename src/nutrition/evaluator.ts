// Per-image evaluation: for every language seen in a NAME mention, count
// NAME / VALUE mentions and energy values, then apply the threshold gate.
//
// Qualification (per language L):
//   nameCount(L) >= minNameMentions
//   valueCount(L) >= minValueMentions
//   at least one VALUE mention for L is an energy value (kJ/kcal)
// Priority: 1 if the image has a NutrientPair tagged L, else 2.
//
// A mention tagged with several languages counts toward each of them.
// Counts are per occurrence, duplicates included.

import { cfg, SelectionThresholds } from './config.js';
import type {
  CandidateEvaluation,
  ImageRecord,
  LanguagePriority,
  NutrientMention,
  NutrientPair,
} from './types.js';

export type CountThresholds = Pick<SelectionThresholds, 'minNameMentions' | 'minValueMentions'>;

interface LanguageCounters {
  nameCount: number;
  valueCount: number;
  hasEnergy: boolean;
}

// Distinct, non-empty language codes of a record; empty means "no evidence"
function languagesOf(record: NutrientMention | NutrientPair): string[] {
  if (!Array.isArray(record.languages)) return [];
  return [...new Set(record.languages.filter((l) => typeof l === 'string' && l !== ''))];
}

function countByLanguage(mentions: NutrientMention[]): Map<string, LanguageCounters> {
  const counters = new Map<string, LanguageCounters>();
  const get = (lang: string) => {
    let c = counters.get(lang);
    if (!c) {
      c = { nameCount: 0, valueCount: 0, hasEnergy: false };
      counters.set(lang, c);
    }
    return c;
  };

  for (const mention of mentions) {
    for (const lang of languagesOf(mention)) {
      const c = get(lang);
      if (mention.kind === 'NAME') {
        c.nameCount++;
      } else if (mention.kind === 'VALUE') {
        c.valueCount++;
        if (mention.isEnergy === true) c.hasEnergy = true;
      }
    }
  }
  return counters;
}

function countPairsByLanguage(pairs: NutrientPair[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const pair of pairs) {
    for (const lang of languagesOf(pair)) {
      counts.set(lang, (counts.get(lang) || 0) + 1);
    }
  }
  return counts;
}

/**
 * Evaluate one image for every language that appears in at least one NAME
 * mention. Returns qualified and non-qualified evaluations alike, in order
 * of first appearance; `priority` is only set on qualified ones.
 */
export function evaluateImage(
  image: ImageRecord,
  thresholds: CountThresholds = cfg
): CandidateEvaluation[] {
  const counters = countByLanguage(image.mentions);
  const pairCounts = countPairsByLanguage(image.pairs);

  // Only languages backed by a NAME mention are candidates
  const nameLanguages: string[] = [];
  for (const mention of image.mentions) {
    if (mention.kind !== 'NAME') continue;
    for (const lang of languagesOf(mention)) {
      if (!nameLanguages.includes(lang)) nameLanguages.push(lang);
    }
  }

  return nameLanguages.map((language) => {
    const c = counters.get(language) ?? { nameCount: 0, valueCount: 0, hasEnergy: false };
    const pairCount = pairCounts.get(language) || 0;
    const qualified =
      c.nameCount >= thresholds.minNameMentions &&
      c.valueCount >= thresholds.minValueMentions &&
      c.hasEnergy;

    const evaluation: CandidateEvaluation = {
      imageId: image.imageId,
      language,
      nameCount: c.nameCount,
      valueCount: c.valueCount,
      hasEnergy: c.hasEnergy,
      pairCount,
      qualified,
    };
    if (qualified) evaluation.priority = pairCount > 0 ? 1 : 2;
    return evaluation;
  });
}

// (language, priority) tuples for the languages this image qualifies in
export function qualifyingLanguages(
  image: ImageRecord,
  thresholds: CountThresholds = cfg
): LanguagePriority[] {
  const result: LanguagePriority[] = [];
  for (const e of evaluateImage(image, thresholds)) {
    if (e.qualified && e.priority !== undefined) {
      result.push({ language: e.language, priority: e.priority });
    }
  }
  return result;
}
