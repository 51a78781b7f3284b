#!/usr/bin/env node
import { readFile } from 'fs/promises';
import { request } from 'undici';
import { z } from 'zod';
import { cfg } from './config.js';
import { parseNutritionInsight } from './nutrition/schema.js';

const EvaluateResponse = z.object({
  ok: z.literal(true),
  insight: z.unknown(),
  skipped: z.array(z.unknown()).default([]),
});

const USAGE = 'usage: nutrition-image <product.json>';

/**
 * Post one product file to the running service and print the selected
 * nutrition image. Returns the process exit code.
 */
export async function runCli(args: string[], baseUrl: string = cfg.appUrl): Promise<number> {
  const file = args[0];
  if (!file) {
    console.error(USAGE);
    return 2;
  }

  try {
    const product: unknown = JSON.parse(await readFile(file, 'utf8'));
    const r = await request(`${baseUrl}/nutrition-image/evaluate`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(product),
    });
    const j: unknown = await r.body.json();

    if (r.statusCode >= 400) {
      console.error(`request failed (${r.statusCode}): ${JSON.stringify(j)}`);
      return 1;
    }

    const { insight, skipped } = EvaluateResponse.parse(j);
    if (skipped.length) console.error(`skipped ${skipped.length} malformed record(s)`);
    if (insight === null) {
      console.log('no nutrition image');
      return 0;
    }
    console.log(JSON.stringify(parseNutritionInsight(insight), null, 2));
    return 0;
  } catch (e) {
    console.error(e instanceof Error ? e.message : e);
    return 1;
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((e) => {
      console.error(e);
      process.exit(1);
    });
}
