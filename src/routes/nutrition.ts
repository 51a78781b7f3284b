import express from 'express';
import { z, ZodError } from 'zod';
import { cfg } from '../config.js';
import { createLogger } from '../lib/logger.js';
import { parseProductContext, ParsedProduct, SkippedRecord } from '../nutrition/schema.js';
import { evaluate } from '../nutrition/selector.js';
import { buildMetrics, formatMetricsLog } from '../nutrition/metrics.js';
import type { NutritionInsight, ProductContext } from '../nutrition/types.js';

export const nutritionRouter = express.Router();

const log = createLogger('nutrition-route');

const BatchBody = z.object({ products: z.array(z.unknown()) });

type BatchResult =
  | { index: number; barcode?: string; insight: NutritionInsight | null; skipped: SkippedRecord[] }
  | { index: number; error: string };

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

// Envelope errors fail one product of a batch, not the whole batch
function tryParse(raw: unknown): ParsedProduct | ZodError {
  try {
    return parseProductContext(raw);
  } catch (e) {
    if (e instanceof ZodError) return e;
    throw e;
  }
}

function sendError(res: express.Response, e: unknown) {
  if (e instanceof ZodError) {
    return res.status(400).json({ ok: false, error: 'invalid request body', issues: e.issues });
  }
  log.error('Evaluation failed', { error: errorMessage(e) });
  return res.status(500).json({ ok: false, error: errorMessage(e) });
}

nutritionRouter.post('/nutrition-image/evaluate', (req, res) => {
  try {
    const { product, skipped } = parseProductContext(req.body);
    if (skipped.length) log.warn('Skipped malformed records', { barcode: product.barcode, skipped });

    const insight = evaluate(product, { log: (line) => log.debug(line) });
    log.info(insight ? 'Nutrition image selected' : 'No nutrition image', {
      barcode: product.barcode,
      imageId: insight?.imageId,
      priority: insight?.priority,
    });
    res.json({ ok: true, insight, skipped });
  } catch (e) {
    sendError(res, e);
  }
});

nutritionRouter.post('/nutrition-image/evaluate-batch', (req, res) => {
  try {
    const { products: rawProducts } = BatchBody.parse(req.body);
    if (rawProducts.length > cfg.maxBatchSize) {
      return res.status(400).json({
        ok: false,
        error: `batch too large: ${rawProducts.length} > ${cfg.maxBatchSize}`,
      });
    }

    const started = Date.now();
    const products: ProductContext[] = [];
    const insights: Array<NutritionInsight | null> = [];
    const allSkipped: SkippedRecord[] = [];

    const results: BatchResult[] = rawProducts.map((raw, index) => {
      const parsed = tryParse(raw);
      if (parsed instanceof ZodError) {
        return { index, error: parsed.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ') };
      }
      const insight = evaluate(parsed.product, { log: (line) => log.debug(line) });
      products.push(parsed.product);
      insights.push(insight);
      allSkipped.push(...parsed.skipped);
      return { index, barcode: parsed.product.barcode, insight, skipped: parsed.skipped };
    });

    const metrics = buildMetrics({ products, insights, skipped: allSkipped, durationMs: Date.now() - started });
    log.info(formatMetricsLog(metrics));
    res.json({ ok: true, results, metrics });
  } catch (e) {
    sendError(res, e);
  }
});

export default nutritionRouter;
