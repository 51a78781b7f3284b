/**
 * Express app for the nutrition image service.
 * Kept separate from src/index.ts so tests can mount it without listening.
 */

import express from 'express';
import { nutritionRouter } from '../routes/nutrition.js';

export function createApp(): express.Express {
  const app = express();
  app.use(express.json({ limit: '10mb' }));

  // health
  app.get('/health', (_req, res) => res.json({ ok: true }));

  app.use(nutritionRouter);
  return app;
}
