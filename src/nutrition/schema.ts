// Zod schemas for product input and emitted insights.
// parseProductContext(json) throws only when the envelope is unusable;
// malformed mentions/pairs/detections/images are dropped and reported.

import { z } from "zod";
import { buildImageRecord } from "./mentions.js";
import type { ImageRecord, NutrientMention, NutrientPair, ObjectDetection, ProductContext } from "./types.js";

// Blank language tags are dropped; a mention left with none is malformed
const Languages = z
  .array(z.string())
  .transform((langs) => langs.filter((lang) => lang !== ""))
  .pipe(z.array(z.string()).min(1));
const Unit = z.number().min(0).max(1);

const NameMention = z.object({
  kind: z.literal("NAME"),
  languages: Languages,
  nutrient: z.string().optional(),
  raw: z.string().optional(),
  span: z.tuple([z.number(), z.number()]).optional()
});

const ValueMention = z.object({
  kind: z.literal("VALUE"),
  languages: Languages,
  isEnergy: z.boolean().default(false),
  nutrient: z.string().optional(),
  raw: z.string().optional(),
  span: z.tuple([z.number(), z.number()]).optional()
});

export const NutrientMentionSchema = z.discriminatedUnion("kind", [NameMention, ValueMention]);

export const NutrientPairSchema = z.object({
  languages: Languages,
  nutrient: z.string().optional(),
  value: z.string().optional(),
  unit: z.string().optional(),
  raw: z.string().optional()
});

export const BoundingBoxSchema = z
  .tuple([Unit, Unit, Unit, Unit])
  .refine(([yMin, xMin, yMax, xMax]) => yMin <= yMax && xMin <= xMax, {
    message: "bounding box min must not exceed max"
  });

export const ObjectDetectionSchema = z.object({
  label: z.string().min(1),
  confidence: Unit,
  boundingBox: BoundingBoxSchema
});

// Numeric ids may arrive as strings ("12")
const ImageId = z.union([
  z.number().int().nonnegative(),
  z.string().regex(/^\d+$/).transform(Number)
]);

const RecordList = z.array(z.unknown()).nullish().transform((v) => v ?? []);

const ImageEnvelope = z.object({
  imageId: ImageId,
  text: z.string().optional(),
  mentions: RecordList,
  pairs: RecordList,
  detections: RecordList
});

const ProductEnvelope = z.object({
  barcode: z
    .string()
    .optional()
    .transform((b) => (b === "" ? undefined : b)),
  mainLanguage: z.string().min(1),
  images: z.array(z.unknown())
});

export const NutritionInsightSchema = z.object({
  type: z.literal("nutrition_image"),
  barcode: z.string().optional(),
  imageId: z.number().int(),
  language: z.string().min(1),
  priority: z.union([z.literal(1), z.literal(2)]),
  boundingBox: BoundingBoxSchema.optional(),
  predictorVersion: z.string()
});

export type SkippedKind = "image" | "mention" | "pair" | "detection";

export interface SkippedRecord {
  kind: SkippedKind;
  imageId?: number;
  index: number;
  reason: string;
}

export interface ParsedProduct {
  product: ProductContext;
  skipped: SkippedRecord[];
}

function describe(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

function keepValid<S extends z.ZodTypeAny>(
  schema: S,
  records: unknown[],
  kind: SkippedKind,
  imageId: number,
  skipped: SkippedRecord[]
): Array<z.output<S>> {
  const kept: Array<z.output<S>> = [];
  records.forEach((record, index) => {
    const result = schema.safeParse(record);
    if (result.success) kept.push(result.data);
    else skipped.push({ kind, imageId, index, reason: describe(result.error) });
  });
  return kept;
}

function parseImage(raw: unknown, index: number, skipped: SkippedRecord[]): ImageRecord | null {
  const envelope = ImageEnvelope.safeParse(raw);
  if (!envelope.success) {
    skipped.push({ kind: "image", index, reason: describe(envelope.error) });
    return null;
  }
  const { imageId, text } = envelope.data;

  const mentions: NutrientMention[] = keepValid(NutrientMentionSchema, envelope.data.mentions, "mention", imageId, skipped);
  const pairs: NutrientPair[] = keepValid(NutrientPairSchema, envelope.data.pairs, "pair", imageId, skipped);
  const detections: ObjectDetection[] = keepValid(ObjectDetectionSchema, envelope.data.detections, "detection", imageId, skipped);

  // Raw OCR text stands in for upstream extraction when no mentions were supplied
  if (text !== undefined && envelope.data.mentions.length === 0 && envelope.data.pairs.length === 0) {
    return buildImageRecord({ imageId, text, detections });
  }
  return { imageId, mentions, pairs, detections };
}

export function parseProductContext(input: unknown): ParsedProduct {
  const envelope = ProductEnvelope.parse(input);
  const skipped: SkippedRecord[] = [];
  const images: ImageRecord[] = [];

  envelope.images.forEach((raw, index) => {
    const image = parseImage(raw, index, skipped);
    if (image) images.push(image);
  });

  const product: ProductContext = { mainLanguage: envelope.mainLanguage, images };
  if (envelope.barcode !== undefined) product.barcode = envelope.barcode;
  return { product, skipped };
}

export type ParsedInsight = z.infer<typeof NutritionInsightSchema>;

export function parseNutritionInsight(input: unknown): ParsedInsight {
  return NutritionInsightSchema.parse(input);
}
