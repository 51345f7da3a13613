import Sentiment from 'sentiment';
import type { SentimentLabel } from '../types.js';
import { clamp, round3 } from '../utils/normalize.js';

export interface SentimentResult {
  label: SentimentLabel;
  confidence: number;
}

export interface SentimentClassifier {
  classify(text: string): SentimentResult;
}

const NEUTRAL_BAND = 0.05;

/**
 * AFINN lexicon fallback for articles that arrive without a sentiment label.
 * Only covers English vocabulary; other text comes back neutral.
 */
export class LexiconSentimentClassifier implements SentimentClassifier {
  private readonly analyzer = new Sentiment();

  classify(text: string): SentimentResult {
    const { comparative } = this.analyzer.analyze(text);
    const label: SentimentLabel =
      comparative > NEUTRAL_BAND ? 'positive' : comparative < -NEUTRAL_BAND ? 'negative' : 'neutral';
    return { label, confidence: round3(clamp(Math.abs(comparative), 0, 1)) };
  }
}
