// Centralized thresholds for nutrition image selection
// Can be overridden via environment variables

export const PREDICTOR_VERSION = '1';

function envFloat(name: string, fallback: number): number {
  const n = parseFloat(process.env[name] || '');
  return Number.isFinite(n) ? n : fallback;
}

function envInt(name: string, fallback: number): number {
  const n = parseInt(process.env[name] || '', 10);
  return Number.isFinite(n) ? n : fallback;
}

export interface SelectionThresholds {
  minNameMentions: number;
  minValueMentions: number;
  crop: {
    minConfidence: number;
    label: string;
  };
}

export const cfg: SelectionThresholds = {
  // Qualification gate: NAME mentions for the language (per occurrence)
  minNameMentions: envInt('NUTRITION_MIN_NAME_MENTIONS', 4),

  // Qualification gate: VALUE mentions for the language (one must be energy)
  minValueMentions: envInt('NUTRITION_MIN_VALUE_MENTIONS', 3),

  // Crop is attached only for exactly one detection at or above this confidence
  crop: {
    minConfidence: envFloat('NUTRITION_CROP_MIN_CONFIDENCE', 0.9),
    label: process.env.NUTRITION_TABLE_LABEL || 'nutrition-table',
  },
};

export function getThresholdsSnapshot() {
  return {
    predictorVersion: PREDICTOR_VERSION,
    minNameMentions: cfg.minNameMentions,
    minValueMentions: cfg.minValueMentions,
    cropMinConfidence: cfg.crop.minConfidence,
    cropLabel: cfg.crop.label,
  };
}
