import type { Logger } from 'pino';
import { silentLogger } from '../../lib/logger.js';
import type { Message } from '../lifecycle.js';
import { replyText } from '../lifecycle.js';
import type { MessageStore } from '../messages.js';
import type { Embedder } from './features.js';

export type ConfidenceTier = 'low' | 'medium' | 'high' | 'veryHigh';

export type TierCutPoints = { veryHigh: number; high: number; medium: number };

export const DEFAULT_TIER_CUT_POINTS: TierCutPoints = { veryHigh: 90, high: 75, medium: 50 };

export type SimilarityResult = {
  targetId: string;
  template: Message;
  /** Cosine similarity scaled to [0, 100] */
  confidence: number;
  tier: ConfidenceTier;
};

export type Thresholds = {
  /** Results must be strictly above this to be shown */
  displayThreshold: number;
  /** Results at or above this may be sent automatically */
  autoResponseThreshold: number;
};

/** Cosine similarity; 0 for mismatched lengths or a zero-magnitude side. */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  let magA = 0;
  let magB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    magA += x * x;
    magB += y * y;
  }
  if (magA === 0 || magB === 0) return 0;
  return dot / (Math.sqrt(magA) * Math.sqrt(magB));
}

export function confidenceOf(a: readonly number[], b: readonly number[]): number {
  return Math.min(100, Math.max(0, cosineSimilarity(a, b) * 100));
}

export function tierFor(confidence: number, cuts: TierCutPoints = DEFAULT_TIER_CUT_POINTS): ConfidenceTier {
  if (confidence >= cuts.veryHigh) return 'veryHigh';
  if (confidence >= cuts.high) return 'high';
  if (confidence >= cuts.medium) return 'medium';
  return 'low';
}

export function formatConfidence(confidence: number): string {
  return `${confidence.toFixed(1)}%`;
}

/**
 * Keeps results strictly above the display threshold, highest first. Ties
 * keep the input order.
 */
export function rankResults(results: SimilarityResult[], displayThreshold: number): SimilarityResult[] {
  return results.filter((r) => r.confidence > displayThreshold).sort((a, b) => b.confidence - a.confidence);
}

/**
 * Ranked results that may answer the target without a human: templates at
 * or above the threshold that actually carry a reply.
 */
export function autoResponseCandidates(ranked: SimilarityResult[], autoResponseThreshold: number): SimilarityResult[] {
  return ranked.filter(
    (r) => r.confidence >= autoResponseThreshold && r.template.isTemplate && replyText(r.template).trim() !== ''
  );
}

/** The single highest-confidence candidate, if any clears the threshold. */
export function bestAutoResponse(ranked: SimilarityResult[], autoResponseThreshold: number): SimilarityResult | null {
  const [best] = autoResponseCandidates(ranked, autoResponseThreshold);
  return best ?? null;
}

export type SimilarityMatch = {
  similar: SimilarityResult[];
  /** The single candidate to act on, if any */
  autoResponse: SimilarityResult | null;
};

export class SimilarityEngine {
  private readonly log: Logger;
  private readonly cuts: TierCutPoints;

  constructor(
    private readonly store: MessageStore,
    private readonly embedder: Embedder,
    opts: { logger?: Logger; tiers?: TierCutPoints } = {}
  ) {
    this.log = (opts.logger ?? silentLogger).child({ component: 'similarity' });
    this.cuts = opts.tiers ?? DEFAULT_TIER_CUT_POINTS;
  }

  get model(): string {
    return this.embedder.model;
  }

  /** Cached vector when present, otherwise computed without persisting. */
  async vectorFor(message: Message): Promise<number[]> {
    if (message.featureVector && message.featureModel === this.embedder.model) return message.featureVector;
    return this.embedder.embed(message.text);
  }

  /**
   * Computes and caches the vector for a template. The store keeps the first
   * value written, so repeated calls are harmless.
   */
  async ensureVector(message: Message): Promise<Message> {
    if (message.featureVector) return message;
    const vector = await this.embedder.embed(message.text);
    return this.store.update(message.id, {
      featureVector: vector,
      featureModel: this.embedder.model,
      featureComputedAt: new Date()
    });
  }

  /** Marks or unmarks a message as a reusable template. */
  async setTemplate(id: string, isTemplate: boolean): Promise<Message> {
    const message = await this.store.setTemplate(id, isTemplate);
    return isTemplate ? this.ensureVector(message) : message;
  }

  async score(target: Message, candidates: Message[], displayThreshold: number): Promise<SimilarityResult[]> {
    const targetVector = await this.vectorFor(target);
    const results: SimilarityResult[] = [];
    for (const candidate of candidates) {
      if (candidate.id === target.id || !candidate.isTemplate) continue;
      const confidence = confidenceOf(targetVector, await this.vectorFor(candidate));
      results.push({ targetId: target.id, template: candidate, confidence, tier: tierFor(confidence, this.cuts) });
    }
    return rankResults(results, displayThreshold);
  }

  /** Scores the target against every stored template. */
  async match(target: Message, thresholds: Thresholds): Promise<SimilarityMatch> {
    const templates = await this.store.listTemplates();
    if (templates.length === 0) return { similar: [], autoResponse: null };

    const similar = await this.score(target, templates, thresholds.displayThreshold);
    const autoResponse = bestAutoResponse(similar, thresholds.autoResponseThreshold);
    this.log.debug(
      {
        messageId: target.id,
        templates: templates.length,
        shown: similar.length,
        best: similar[0] ? formatConfidence(similar[0].confidence) : null
      },
      'similarity scored'
    );
    return { similar, autoResponse };
  }
}
