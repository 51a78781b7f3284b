// Candidate selection: at most one nutrition image per product.
//
//  1. Scan images newest first (imageId descending).
//  2. Evaluate each image; keep only tuples for the product's main language.
//  3. First image with a surviving tuple wins (best = lowest priority value).
//     Older images are not evaluated once a winner is found.
//  4. Attach a crop from the winner's detections when unambiguous.

import { cfg, PREDICTOR_VERSION, SelectionThresholds } from './config.js';
import { evaluateImage } from './evaluator.js';
import { resolveCrop } from './crop.js';
import type {
  ImageRecord,
  NutritionInsight,
  Priority,
  ProductContext,
  SelectedCandidate,
} from './types.js';

export interface SelectOptions {
  thresholds?: SelectionThresholds;
  log?: (line: string) => void;
}

const noop = () => {};

// Stable copy, newest first
export function sortByRecency(images: ImageRecord[]): ImageRecord[] {
  return [...images].sort((a, b) => b.imageId - a.imageId);
}

export function selectCandidate(
  product: ProductContext,
  options: SelectOptions = {}
): SelectedCandidate | null {
  const thresholds = options.thresholds ?? cfg;
  const log = options.log ?? noop;
  const tag = product.barcode ?? '-';

  for (const image of sortByRecency(product.images)) {
    const evaluations = evaluateImage(image, thresholds);
    let best: Priority | undefined;

    for (const e of evaluations) {
      log(
        `[NUTRITION-SELECT] product=${tag} image=${image.imageId} lang=${e.language} ` +
          `names=${e.nameCount} values=${e.valueCount} energy=${e.hasEnergy} pairs=${e.pairCount} ` +
          `qualified=${e.qualified}`
      );
      if (e.language !== product.mainLanguage || e.priority === undefined) continue;
      if (best === undefined || e.priority < best) best = e.priority;
    }

    if (best !== undefined) {
      log(`[NUTRITION-SELECT] product=${tag} winner image=${image.imageId} lang=${product.mainLanguage} priority=${best}`);
      return { imageId: image.imageId, language: product.mainLanguage, priority: best };
    }
  }

  log(`[NUTRITION-SELECT] product=${tag} no candidate for lang=${product.mainLanguage}`);
  return null;
}

/**
 * Full per-product evaluation: selection, crop resolution and insight
 * assembly. Returns null when no image qualifies, which is the common case.
 */
export function evaluate(
  product: ProductContext,
  options: SelectOptions = {}
): NutritionInsight | null {
  const thresholds = options.thresholds ?? cfg;
  const selected = selectCandidate(product, { ...options, thresholds });
  if (!selected) return null;

  const insight: NutritionInsight = {
    type: 'nutrition_image',
    imageId: selected.imageId,
    language: selected.language,
    priority: selected.priority,
    predictorVersion: PREDICTOR_VERSION,
  };
  if (product.barcode !== undefined) insight.barcode = product.barcode;

  const winner = product.images.find((img) => img.imageId === selected.imageId);
  const boundingBox = winner ? resolveCrop(winner.detections, thresholds.crop) : undefined;
  if (boundingBox) insight.boundingBox = boundingBox;

  return insight;
}

// Products are independent; result[i] belongs to products[i]
export function evaluateMany(
  products: ProductContext[],
  options: SelectOptions = {}
): Array<NutritionInsight | null> {
  return products.map((product) => evaluate(product, options));
}
