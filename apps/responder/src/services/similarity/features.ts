import { readFileSync } from 'node:fs';
import { z } from 'zod';

/**
 * Turns text into a fixed-length vector. The engine only ever sees this
 * interface, so a real embedding model can replace the feature extractor
 * without touching scoring or thresholds.
 */
export interface Embedder {
  readonly model: string;
  readonly dimensions: number;
  embed(text: string): Promise<number[]>;
}

const vocabularySchema = z.object({
  stopWords: z.array(z.string()),
  intents: z.object({
    ability: z.array(z.string()),
    preference: z.array(z.string()),
    comparison: z.array(z.string()),
    temporal: z.array(z.string()),
    locational: z.array(z.string()),
    causal: z.array(z.string())
  }),
  yesNoOpeners: z.array(z.string()),
  negations: z.array(z.string()),
  criticalPhrases: z.array(z.string()).length(8),
  domains: z.record(z.array(z.string())),
  emotional: z.array(z.string()),
  certainty: z.array(z.string()),
  intensity: z.array(z.string()),
  formality: z.array(z.string()),
  informality: z.array(z.string())
});

export type Vocabulary = z.infer<typeof vocabularySchema>;

const VOCABULARY_PATH = new URL('../../../data/features.json', import.meta.url);

let defaultVocabulary: Vocabulary | null = null;

export function loadVocabulary(path: URL | string = VOCABULARY_PATH): Vocabulary {
  return vocabularySchema.parse(JSON.parse(readFileSync(path, 'utf8')));
}

/**
 * Multipliers for the intent, negation and phrase indicators. These start
 * as heuristics and are meant to be tuned against labelled pairs.
 */
export type FeatureWeights = {
  ability: number;
  preference: number;
  quantity: number;
  comparison: number;
  temporal: number;
  locational: number;
  causal: number;
  method: number;
  yesNo: number;
  negation: number;
  phrase: number;
};

export const DEFAULT_FEATURE_WEIGHTS: FeatureWeights = {
  ability: 2,
  preference: 2,
  quantity: 2,
  comparison: 1.5,
  temporal: 1.5,
  locational: 1.5,
  causal: 1.5,
  method: 1.5,
  yesNo: 1.5,
  negation: 2,
  phrase: 2
};

export const FEATURE_DIMENSIONS = 50;

/** Offsets of the named slots, for callers that inspect vectors. */
export const FEATURE_INDEX = {
  length: 0,
  wordCount: 1,
  contentWords: 2,
  ability: 3,
  preference: 4,
  quantity: 5,
  comparison: 6,
  temporal: 7,
  locational: 8,
  causal: 9,
  method: 10,
  yesNo: 11,
  negation: 12,
  phrases: 13,
  domains: 21,
  questionMark: 26,
  mention: 27,
  longText: 28,
  shortText: 29,
  emotional: 30,
  certainty: 31,
  intensity: 32,
  formality: 33,
  informality: 34
} as const;

const MAX_DOMAINS = FEATURE_INDEX.questionMark - FEATURE_INDEX.domains;

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}][\p{L}\p{N}'’]*/gu) ?? [];
}

export class FeatureEmbedder implements Embedder {
  readonly model = 'text-features-v1';
  readonly dimensions = FEATURE_DIMENSIONS;
  private readonly vocab: Vocabulary;
  private readonly stopWords: Set<string>;
  private readonly weights: FeatureWeights;

  constructor(opts: { vocabulary?: Vocabulary; weights?: Partial<FeatureWeights> } = {}) {
    this.vocab = opts.vocabulary ?? (defaultVocabulary ??= loadVocabulary());
    this.stopWords = new Set(this.vocab.stopWords);
    this.weights = { ...DEFAULT_FEATURE_WEIGHTS, ...opts.weights };
  }

  async embed(text: string): Promise<number[]> {
    return this.extract(text);
  }

  extract(text: string): number[] {
    const clean = text.toLowerCase().trim();
    const words = tokenize(clean);
    const contentWords = words.filter((w) => !this.stopWords.has(w) && w.length > 2);
    const w = this.weights;
    const count = (list: string[]) => words.filter((word) => list.includes(word)).length;
    const phraseCount = (list: string[]) => list.filter((p) => clean.includes(p)).length;

    const hasHow = words.includes('how');
    const quantity = hasHow && (words.includes('many') || words.includes('much'));
    const method = hasHow && !quantity;
    const yesNo = words.length > 0 && this.vocab.yesNoOpeners.includes(words[0] ?? '');
    const negated = words.some((word) => this.vocab.negations.includes(word) || /n['’]t$/.test(word));

    const features: number[] = [
      Math.min(clean.length / 100, 1),
      Math.min(words.length / 50, 1),
      Math.min(contentWords.length / 20, 1),
      count(this.vocab.intents.ability) * w.ability,
      count(this.vocab.intents.preference) * w.preference,
      quantity ? w.quantity : 0,
      count(this.vocab.intents.comparison) * w.comparison,
      count(this.vocab.intents.temporal) * w.temporal,
      count(this.vocab.intents.locational) * w.locational,
      count(this.vocab.intents.causal) * w.causal,
      method ? w.method : 0,
      yesNo ? w.yesNo : 0,
      negated ? w.negation : 0
    ];

    for (const phrase of this.vocab.criticalPhrases) {
      features.push(clean.includes(phrase) ? w.phrase : 0);
    }

    const domains = Object.values(this.vocab.domains).slice(0, MAX_DOMAINS);
    for (let i = 0; i < MAX_DOMAINS; i++) {
      const stems = domains[i] ?? [];
      features.push(words.filter((word) => stems.some((stem) => word.includes(stem))).length);
    }

    features.push(
      clean.includes('?') ? 1 : 0,
      clean.startsWith('@') || clean.includes('<@') ? 1 : 0,
      words.length > 10 ? 1 : 0,
      words.length < 5 ? 1 : 0,
      count(this.vocab.emotional),
      count(this.vocab.certainty),
      count(this.vocab.intensity),
      phraseCount(this.vocab.formality),
      count(this.vocab.informality)
    );

    while (features.length < FEATURE_DIMENSIONS) features.push(0);
    return features.slice(0, FEATURE_DIMENSIONS);
  }
}
