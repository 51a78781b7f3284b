// Crop policy for the winning image: attach the detector's box only when
// exactly one nutrition-table detection clears the confidence bar.
// Zero or several → no crop; the insight is emitted either way.

import { cfg, SelectionThresholds } from './config.js';
import type { BoundingBox, ObjectDetection } from './types.js';

export type CropOptions = SelectionThresholds['crop'];

function isUnit(n: unknown): n is number {
  return typeof n === 'number' && Number.isFinite(n) && n >= 0 && n <= 1;
}

export function isValidBoundingBox(box: unknown): box is BoundingBox {
  if (!Array.isArray(box) || box.length !== 4 || !box.every(isUnit)) return false;
  const [yMin, xMin, yMax, xMax] = box;
  return yMin <= yMax && xMin <= xMax;
}

// Malformed detections (confidence outside [0,1], bad box) never count
export function confidentTableDetections(
  detections: ObjectDetection[],
  options: CropOptions = cfg.crop
): ObjectDetection[] {
  return detections.filter(
    (d) =>
      d.label === options.label &&
      isUnit(d.confidence) &&
      d.confidence >= options.minConfidence &&
      isValidBoundingBox(d.boundingBox)
  );
}

export function resolveCrop(
  detections: ObjectDetection[],
  options: CropOptions = cfg.crop
): BoundingBox | undefined {
  const confident = confidentTableDetections(detections, options);
  if (confident.length !== 1) return undefined;
  const [yMin, xMin, yMax, xMax] = confident[0].boundingBox;
  return [yMin, xMin, yMax, xMax];
}
