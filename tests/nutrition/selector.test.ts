import { evaluate, evaluateMany, selectCandidate, sortByRecency } from '../../src/nutrition/index.js';
import type {
  ImageRecord,
  NutrientMention,
  NutrientPair,
  ObjectDetection,
  ProductContext,
} from '../../src/nutrition/index.js';

const thresholds = {
  minNameMentions: 4,
  minValueMentions: 3,
  crop: { minConfidence: 0.9, label: 'nutrition-table' },
};

const names = (n: number, lang: string): NutrientMention[] =>
  Array.from({ length: n }, () => ({ kind: 'NAME' as const, languages: [lang] }));

const values = (n: number, lang: string): NutrientMention[] =>
  Array.from({ length: n }, (_, i) => ({ kind: 'VALUE' as const, languages: [lang], isEnergy: i === 0 }));

const qualifying = (imageId: number, lang: string, extra: Partial<ImageRecord> = {}): ImageRecord => ({
  imageId,
  mentions: [...names(5, lang), ...values(4, lang)],
  pairs: [],
  detections: [],
  ...extra,
});

const table = (confidence: number): ObjectDetection => ({
  label: 'nutrition-table',
  confidence,
  boundingBox: [0.1, 0.2, 0.6, 0.8],
});

describe('sortByRecency', () => {
  it('orders by imageId descending without mutating the input', () => {
    const images = [qualifying(3, 'fr'), qualifying(10, 'fr'), qualifying(7, 'fr')];
    expect(sortByRecency(images).map((i) => i.imageId)).toEqual([10, 7, 3]);
    expect(images.map((i) => i.imageId)).toEqual([3, 10, 7]);
  });
});

describe('selectCandidate', () => {
  it('never returns a language other than the main language', () => {
    const product: ProductContext = {
      mainLanguage: 'fr',
      images: [
        { imageId: 5, mentions: [...names(9, 'de'), ...values(9, 'de')], pairs: [{ languages: ['de'] }], detections: [] },
        qualifying(2, 'fr'),
      ],
    };
    expect(selectCandidate(product, { thresholds })).toEqual({ imageId: 2, language: 'fr', priority: 2 });
  });

  it('prefers the newest qualifying image', () => {
    const product: ProductContext = {
      mainLanguage: 'en',
      images: [qualifying(4, 'en'), qualifying(12, 'en'), qualifying(8, 'en')],
    };
    expect(selectCandidate(product, { thresholds })?.imageId).toBe(12);
  });

  it('keeps a newer priority-2 image over an older priority-1 image', () => {
    const pairs: NutrientPair[] = [{ languages: ['en'] }];
    const product: ProductContext = {
      mainLanguage: 'en',
      images: [qualifying(1, 'en', { pairs }), qualifying(2, 'en')],
    };
    expect(selectCandidate(product, { thresholds })).toEqual({ imageId: 2, language: 'en', priority: 2 });
  });

  it('stops scanning at the first qualifying image', () => {
    const lines: string[] = [];
    const product: ProductContext = {
      barcode: '123',
      mainLanguage: 'en',
      images: [qualifying(1, 'en'), qualifying(2, 'en')],
    };
    selectCandidate(product, { thresholds, log: (line) => lines.push(line) });
    expect(lines).toEqual([
      '[NUTRITION-SELECT] product=123 image=2 lang=en names=5 values=4 energy=true pairs=0 qualified=true',
      '[NUTRITION-SELECT] product=123 winner image=2 lang=en priority=2',
    ]);
  });

  it('returns null when nothing qualifies', () => {
    const product: ProductContext = {
      mainLanguage: 'fr',
      images: [{ imageId: 1, mentions: names(2, 'fr'), pairs: [], detections: [] }],
    };
    expect(selectCandidate(product, { thresholds })).toBeNull();
  });

  it('returns null for a product without images', () => {
    expect(selectCandidate({ mainLanguage: 'fr', images: [] }, { thresholds })).toBeNull();
  });
});

describe('evaluate scenarios', () => {
  const scenarioA = (): ProductContext => ({
    mainLanguage: 'fr',
    images: [
      { imageId: 101, mentions: [...names(5, 'fr'), ...values(4, 'fr')], pairs: [], detections: [] },
      { imageId: 202, mentions: names(2, 'fr'), pairs: [], detections: [] },
    ],
  });

  it('A: older qualifying image wins over a newer non-qualifying one', () => {
    expect(evaluate(scenarioA(), { thresholds })).toEqual({
      type: 'nutrition_image',
      imageId: 101,
      language: 'fr',
      priority: 2,
      predictorVersion: '1',
    });
  });

  it('B: a French pair on the winner raises priority to 1', () => {
    const product = scenarioA();
    product.images[0].pairs = [{ languages: ['fr'], nutrient: 'fat', value: '3.1', unit: 'g' }];
    const insight = evaluate(product, { thresholds });
    expect(insight?.imageId).toBe(101);
    expect(insight?.priority).toBe(1);
  });

  it('C: German evidence with main language en yields nothing', () => {
    const product: ProductContext = { mainLanguage: 'en', images: [qualifying(7, 'de')] };
    expect(evaluate(product, { thresholds })).toBeNull();
  });

  it('D: two confident detections give no crop', () => {
    const product: ProductContext = {
      mainLanguage: 'fr',
      images: [qualifying(3, 'fr', { detections: [table(0.95), table(0.92)] })],
    };
    const insight = evaluate(product, { thresholds });
    expect(insight).not.toBeNull();
    expect(insight?.boundingBox).toBeUndefined();
  });

  it('attaches the crop of a single confident detection and keeps the barcode', () => {
    const product: ProductContext = {
      barcode: '3000000000001',
      mainLanguage: 'fr',
      images: [qualifying(3, 'fr', { detections: [table(0.97), table(0.4)] })],
    };
    expect(evaluate(product, { thresholds })).toEqual({
      type: 'nutrition_image',
      barcode: '3000000000001',
      imageId: 3,
      language: 'fr',
      priority: 2,
      boundingBox: [0.1, 0.2, 0.6, 0.8],
      predictorVersion: '1',
    });
  });

  it('takes the crop from the winning image only', () => {
    const product: ProductContext = {
      mainLanguage: 'fr',
      images: [qualifying(1, 'fr', { detections: [table(0.99)] }), qualifying(2, 'fr')],
    };
    const insight = evaluate(product, { thresholds });
    expect(insight?.imageId).toBe(2);
    expect(insight?.boundingBox).toBeUndefined();
  });

  it('uses the first image in input order when image ids repeat', () => {
    const other: ObjectDetection = { label: 'nutrition-table', confidence: 0.98, boundingBox: [0.3, 0.3, 0.4, 0.4] };
    const product: ProductContext = {
      mainLanguage: 'fr',
      images: [
        qualifying(5, 'fr', { detections: [table(0.97)] }),
        qualifying(5, 'fr', { pairs: [{ languages: ['fr'] }], detections: [other] }),
      ],
    };
    expect(selectCandidate(product, { thresholds })).toEqual({ imageId: 5, language: 'fr', priority: 2 });
    expect(evaluate(product, { thresholds })).toEqual({
      type: 'nutrition_image',
      imageId: 5,
      language: 'fr',
      priority: 2,
      boundingBox: [0.1, 0.2, 0.6, 0.8],
      predictorVersion: '1',
    });
  });
});

describe('evaluateMany', () => {
  it('evaluates each product independently and keeps input order', () => {
    const results = evaluateMany(
      [
        { mainLanguage: 'en', images: [qualifying(1, 'en'), qualifying(2, 'en')] },
        { mainLanguage: 'en', images: [qualifying(9, 'de')] },
        { mainLanguage: 'de', images: [qualifying(9, 'de')] },
      ],
      { thresholds }
    );
    expect(results.map((r) => r && [r.imageId, r.language])).toEqual([[2, 'en'], null, [9, 'de']]);
  });
});
