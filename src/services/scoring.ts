import Sentiment from 'sentiment';
import type { ScoredArticle, SentimentDigest, SentimentScorer } from '../types.js';
import { clamp, mean, round2, sampleStd } from '../utils/normalize.js';

/**
 * Headline polarity from the AFINN lexicon in "sentiment".
 * The comparative score (per token) is clamped to -1..1.
 * Construct once at process start; the analyzer holds the lexicon in memory.
 */
export class LexiconSentimentScorer implements SentimentScorer {
  private readonly analyzer = new Sentiment();

  score(title: string): number {
    if (!title || !title.trim()) return 0;
    const comparative = this.analyzer.analyze(title).comparative || 0;
    return round2(clamp(comparative, -1, 1));
  }
}

/**
 * Attach a score to an article; missing snippet/link get placeholders.
 */
export function scoreArticle(
  scorer: SentimentScorer,
  article: { title: string; snippet: string; link: string },
): ScoredArticle {
  return {
    title: article.title,
    snippet: article.snippet || 'No snippet',
    link: article.link || 'No link',
    sentimentScore: scorer.score(article.title),
  };
}

/**
 * Mean/standard deviation and extremes of a non-empty, ascending list of scored articles.
 */
export function digestScores(sorted: readonly ScoredArticle[]): Omit<SentimentDigest, 'summary' | 'articles'> {
  const scores = sorted.map((a) => a.sentimentScore);
  return {
    meanScore: mean(scores),
    stdDev: sampleStd(scores),
    articleCount: sorted.length,
    mostNegative: sorted[0],
    mostPositive: sorted[sorted.length - 1],
  };
}
