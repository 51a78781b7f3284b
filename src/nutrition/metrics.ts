// Metrics for a batch of nutrition image evaluations

import { getThresholdsSnapshot } from './config.js';
import type { SkippedRecord } from './schema.js';
import type { NutritionInsight, ProductContext } from './types.js';

export interface SelectionMetrics {
  totals: {
    products: number;
    images: number;
    insights: number;
    withCrop: number;
    skippedRecords: number;
  };
  byLanguage: Record<string, number>;
  byPriority: Record<'1' | '2', number>;
  skippedByKind: Record<string, number>;
  thresholds: ReturnType<typeof getThresholdsSnapshot>;
  timestamp: string;
  durationMs: number;
}

export function buildMetrics(opts: {
  products: ProductContext[];
  insights: Array<NutritionInsight | null>;
  skipped: SkippedRecord[];
  durationMs: number;
}): SelectionMetrics {
  const { products, insights, skipped, durationMs } = opts;

  const byLanguage: Record<string, number> = {};
  const byPriority: Record<'1' | '2', number> = { '1': 0, '2': 0 };
  let withCrop = 0;
  let emitted = 0;

  for (const insight of insights) {
    if (!insight) continue;
    emitted++;
    byLanguage[insight.language] = (byLanguage[insight.language] || 0) + 1;
    byPriority[insight.priority === 1 ? '1' : '2']++;
    if (insight.boundingBox) withCrop++;
  }

  const skippedByKind: Record<string, number> = {};
  for (const s of skipped) {
    skippedByKind[s.kind] = (skippedByKind[s.kind] || 0) + 1;
  }

  return {
    totals: {
      products: products.length,
      images: products.reduce((sum, p) => sum + p.images.length, 0),
      insights: emitted,
      withCrop,
      skippedRecords: skipped.length,
    },
    byLanguage,
    byPriority,
    skippedByKind,
    thresholds: getThresholdsSnapshot(),
    timestamp: new Date().toISOString(),
    durationMs,
  };
}

export function formatMetricsLog(m: SelectionMetrics): string {
  return `METRICS products=${m.totals.products} images=${m.totals.images} insights=${m.totals.insights} withCrop=${m.totals.withCrop} p1=${m.byPriority['1']} p2=${m.byPriority['2']} skipped=${m.totals.skippedRecords} durationMs=${m.durationMs}`;
}
