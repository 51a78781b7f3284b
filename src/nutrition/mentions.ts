// Nutrient mention and nutrient pair extraction from OCR text.
//
// NAME mentions: one regex per nutrient alternating all its multilingual
//   forms; the form that matched gives the mention's languages.
// VALUE mentions: "<number> g|kJ|kcal" tokens. Numbers have no language of
//   their own, so each one is tagged with every language seen among the
//   image's NAME mentions.
// Pairs: "<name> [:-] <number> <unit>" with the nutrient's own units.

import { z } from "zod";
import table from "./data/nutrient-mentions.json";
import type { ImageRecord, NameMention, NutrientMention, NutrientPair, ObjectDetection, ValueMention } from "./types.js";

const MentionTableSchema = z.object({
  mentions: z.record(z.array(z.tuple([z.string().min(1), z.array(z.string().min(1)).min(1)]))),
  units: z.record(z.array(z.string().min(1)).min(1))
});

const NUTRIENT_TABLE = MentionTableSchema.parse(table);

// \w is ASCII-only in JS; OCR text is not
const BEFORE = "(?<![\\p{L}\\p{N}_])";
const AFTER = "(?![\\p{L}\\p{N}_])";
const NUMBER = "[0-9]+[,.]?[0-9]*";

const ENERGY_UNITS = new Set(["kj", "kcal"]);

interface NutrientRegex {
  nutrient: string;
  regex: RegExp;
  languages: string[][];   // index i ↔ named group p<i>
}

function alternation(forms: Array<[string, string[]]>): string {
  return forms.map(([pattern], i) => `(?<p${i}>${pattern})`).join("|");
}

function matchedLanguages(groups: Record<string, string | undefined> | undefined, languages: string[][]): string[] {
  if (!groups) return [];
  for (let i = 0; i < languages.length; i++) {
    if (groups[`p${i}`] !== undefined) return languages[i];
  }
  return [];
}

const NAME_REGEXES: NutrientRegex[] = Object.entries(NUTRIENT_TABLE.mentions).map(([nutrient, forms]) => ({
  nutrient,
  regex: new RegExp(`${BEFORE}(?:${alternation(forms)})${AFTER}`, "giu"),
  languages: forms.map(([, langs]) => langs)
}));

const PAIR_REGEXES: NutrientRegex[] = Object.entries(NUTRIENT_TABLE.units).flatMap(([nutrient, units]) => {
  const forms = NUTRIENT_TABLE.mentions[nutrient];
  if (!forms) return [];
  return [{
    nutrient,
    regex: new RegExp(
      `${BEFORE}(?:${alternation(forms)}) ?(?:[:-] ?)?(?<value>${NUMBER}) ?(?<unit>${units.join("|")})${AFTER}`,
      "giu"
    ),
    languages: forms.map(([, langs]) => langs)
  }];
});

const VALUE_REGEX = new RegExp(`${BEFORE}(?<value>${NUMBER}) ?(?<unit>g|kj|kcal)${AFTER}`, "giu");

export function findNameMentions(text: string): NameMention[] {
  const mentions: NameMention[] = [];
  for (const { nutrient, regex, languages } of NAME_REGEXES) {
    for (const match of text.matchAll(regex)) {
      const langs = matchedLanguages(match.groups, languages);
      if (langs.length === 0 || match.index === undefined) continue;
      mentions.push({
        kind: "NAME",
        nutrient,
        languages: [...langs],
        raw: match[0],
        span: [match.index, match.index + match[0].length]
      });
    }
  }
  return mentions.sort((a, b) => (a.span?.[0] ?? 0) - (b.span?.[0] ?? 0));
}

export function findValueMentions(text: string, languages: string[]): ValueMention[] {
  if (languages.length === 0) return [];
  const mentions: ValueMention[] = [];
  for (const match of text.matchAll(VALUE_REGEX)) {
    const unit = (match.groups?.unit ?? "").toLowerCase();
    if (match.index === undefined) continue;
    mentions.push({
      kind: "VALUE",
      languages: [...languages],
      isEnergy: ENERGY_UNITS.has(unit),
      raw: match[0],
      span: [match.index, match.index + match[0].length]
    });
  }
  return mentions;
}

// NAME mentions first, then VALUE mentions tagged with the NAME languages
export function findNutrientMentions(text: string): NutrientMention[] {
  const names = findNameMentions(text);
  const languages: string[] = [];
  for (const m of names) {
    for (const lang of m.languages) {
      if (!languages.includes(lang)) languages.push(lang);
    }
  }
  return [...names, ...findValueMentions(text, languages)];
}

export function findNutrientPairs(text: string): NutrientPair[] {
  const pairs: NutrientPair[] = [];
  for (const { nutrient, regex, languages } of PAIR_REGEXES) {
    for (const match of text.matchAll(regex)) {
      const langs = matchedLanguages(match.groups, languages);
      if (langs.length === 0) continue;
      pairs.push({
        languages: [...langs],
        nutrient,
        value: (match.groups?.value ?? "").replace(",", "."),
        unit: (match.groups?.unit ?? "").toLowerCase(),
        raw: match[0]
      });
    }
  }
  return pairs;
}

export function buildImageRecord(input: {
  imageId: number;
  text: string;
  detections?: ObjectDetection[];
}): ImageRecord {
  return {
    imageId: input.imageId,
    mentions: findNutrientMentions(input.text),
    pairs: findNutrientPairs(input.text),
    detections: input.detections ?? []
  };
}
