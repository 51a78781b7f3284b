// Data model for nutrition image selection.
// Everything here is computed fresh per product per run.

interface MentionBase {
  languages: string[];   // plausible languages, ambiguous forms carry several
  nutrient?: string;     // e.g. 'energy', 'salt'
  raw?: string;          // matched OCR text
  span?: [number, number];
}

export interface NameMention extends MentionBase {
  kind: 'NAME';
}

export interface ValueMention extends MentionBase {
  kind: 'VALUE';
  isEnergy: boolean;     // unit was kJ or kcal
}

export type NutrientMention = NameMention | ValueMention;

// Adjacent name + value, only used to raise priority
export interface NutrientPair {
  languages: string[];
  nutrient?: string;
  value?: string;
  unit?: string;
  raw?: string;
}

// Normalized [yMin, xMin, yMax, xMax]
export type BoundingBox = [number, number, number, number];

export interface ObjectDetection {
  label: string;
  confidence: number;    // 0..1
  boundingBox: BoundingBox;
}

export interface ImageRecord {
  imageId: number;       // upload order, higher = newer
  mentions: NutrientMention[];
  pairs: NutrientPair[];
  detections: ObjectDetection[];
}

export interface ProductContext {
  barcode?: string;
  mainLanguage: string;
  images: ImageRecord[];
}

export type Priority = 1 | 2;

export interface CandidateEvaluation {
  imageId: number;
  language: string;
  nameCount: number;
  valueCount: number;
  hasEnergy: boolean;
  pairCount: number;
  qualified: boolean;
  priority?: Priority;   // set on qualified evaluations only
}

export interface LanguagePriority {
  language: string;
  priority: Priority;
}

export interface SelectedCandidate extends LanguagePriority {
  imageId: number;
}

export interface NutritionInsight {
  type: 'nutrition_image';
  barcode?: string;
  imageId: number;
  language: string;
  priority: Priority;
  boundingBox?: BoundingBox;
  predictorVersion: string;
}
