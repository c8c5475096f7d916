import OpenAI from 'openai';
import { getConfig } from '../config.js';
import { SummarizationError, errorMessage } from '../errors.js';
import type { ArticleSummarizer, ScoredArticle } from '../types.js';
import { mean } from '../utils/normalize.js';

const SYSTEM_PROMPT = 'You are a helpful assistant that summarizes news articles objectively and accurately.';

function narrativeFor(score: number): string {
  return score >= 0.5
    ? 'Coverage is strongly positive, led by favourable developments.'
    : score >= 0.1
      ? 'Coverage leans positive, with constructive developments outweighing concerns.'
      : score > -0.1
        ? 'Coverage is mixed without a strong directional tone.'
        : score > -0.5
          ? 'Coverage leans negative, with concerns outweighing positive developments.'
          : 'Coverage is strongly negative, dominated by reports of conflict or crisis.';
}

/**
 * Deterministic rendering of scored articles, used when no model summary is available.
 */
export function renderFallbackSummary(articles: readonly ScoredArticle[]): string {
  if (!articles.length) {
    return 'No articles to summarize.';
  }
  const avg = mean(articles.map((a) => a.sentimentScore));
  const lines = articles.map(
    (a, i) => `${i + 1}. ${a.title} (sentiment score: ${a.sentimentScore.toFixed(2)})\n   ${a.snippet}\n   Link: ${a.link}`,
  );
  return `${narrativeFor(avg)}\n\nArticles:\n${lines.join('\n')}`;
}

/**
 * Chat prompt grouping articles into negative (score < 0) and positive sections.
 */
export function buildSummaryPrompt(articles: readonly ScoredArticle[]): string {
  const negative = articles.filter((a) => a.sentimentScore < 0);
  const positive = articles.filter((a) => a.sentimentScore >= 0);
  const render = (kind: string, list: readonly ScoredArticle[]) =>
    list.map((a, i) => `${kind} Article ${i + 1}:\nTitle: ${a.title}\nSummary: ${a.snippet}\n`).join('\n');

  const parts = ['Here are news articles about a specific country or region.'];
  if (negative.length) parts.push(`NEGATIVE NEWS ARTICLES:\n${render('Negative', negative)}`);
  if (positive.length) parts.push(`POSITIVE NEWS ARTICLES:\n${render('Positive', positive)}`);
  parts.push(
    [
      'Please provide a concise summary with TWO sections:',
      '## Negative news summary: the main negative events and common themes.',
      '## Positive news summary: the main positive developments and common themes.',
      'Use markdown headers and "- " bullets, no asterisks. Keep it factual, balanced, and under 1000 words.',
    ].join('\n'),
  );
  return parts.join('\n\n');
}

/**
 * Summarizer backed by OpenAI chat completions.
 */
export class OpenAiSummarizer implements ArticleSummarizer {
  private readonly client: OpenAI;

  constructor(
    apiKey = getConfig().openai.apiKey,
    private readonly model = getConfig().openai.model,
  ) {
    if (!apiKey) {
      throw new Error('OPENAI_API_KEY is required to initialize OpenAiSummarizer');
    }
    this.client = new OpenAI({ apiKey });
  }

  async summarize(articles: readonly ScoredArticle[]): Promise<string> {
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: buildSummaryPrompt(articles) },
        ],
        temperature: 0,
        max_tokens: 1000,
      });
      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new SummarizationError(`Empty completion from ${this.model}`);
      }
      return content;
    } catch (err: unknown) {
      if (err instanceof SummarizationError) throw err;
      throw new SummarizationError(`Summarization failed: ${errorMessage(err)}`, { model: this.model });
    }
  }
}

/**
 * Summarizer used when no model is configured.
 */
export class FallbackSummarizer implements ArticleSummarizer {
  async summarize(articles: readonly ScoredArticle[]): Promise<string> {
    return renderFallbackSummary(articles);
  }
}

export function createSummarizer(
  apiKey = getConfig().openai.apiKey,
  model = getConfig().openai.model,
): ArticleSummarizer {
  return apiKey ? new OpenAiSummarizer(apiKey, model) : new FallbackSummarizer();
}
