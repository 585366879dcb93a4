/**
 * News Sentiment Service
 * Scrapes forex headlines and scores them against a finance lexicon
 */

import axios from 'axios';
import * as cheerio from 'cheerio';
import lexicon from '../data/sentimentLexicon.json';
import { SENTIMENT, RISK } from '../utils/constants';
import { loggers } from '../utils/logger';
import { SentimentAnalysis, SentimentLabel } from '../utils/types';

const log = loggers.sentiment;

const POSITIVE_WORDS: Record<string, number> = lexicon.positive;
const NEGATIVE_WORDS: Record<string, number> = lexicon.negative;
const VOLATILITY_KEYWORDS: string[] = lexicon.volatilityKeywords;
const NEGATORS = new Set(['not', 'no', 'never', "isn't", "wasn't", "don't", "doesn't", 'without']);

// Normalisation constant for raw lexicon sums
const NORMALIZATION_ALPHA = 15;

export interface NewsArticle {
  title: string;
  content: string;
  source: string;
}

export interface SentimentSource {
  analyzeNewsSentiment(): Promise<SentimentAnalysis>;
  getCached(): SentimentAnalysis | null;
}

export type PageFetcher = (url: string) => Promise<string>;

export const NEUTRAL_SENTIMENT: SentimentAnalysis = {
  sentiment: 'neutral',
  score: 0,
  confidence: 0,
  volatilityScore: 0,
  articlesAnalyzed: 0,
};

/**
 * Trading is avoided on high volatility or strongly negative news
 */
export function shouldAvoidTrading(analysis: SentimentAnalysis | null): boolean {
  if (!analysis) return false;
  if (analysis.volatilityScore > RISK.AVOID_VOLATILITY_SCORE) return true;
  return analysis.sentiment === 'negative' && analysis.score < RISK.AVOID_NEGATIVE_SCORE;
}

const SENTIMENT_EMOJI: Record<SentimentLabel, string> = {
  positive: '📈',
  negative: '📉',
  neutral: '➡️',
};

export function formatSentimentSummary(analysis: SentimentAnalysis | null): string {
  if (!analysis) return '➡️ News Sentiment: not yet analysed';
  return [
    `${SENTIMENT_EMOJI[analysis.sentiment]} News Sentiment: ${analysis.sentiment.toUpperCase()}`,
    `Score: ${analysis.score.toFixed(3)}`,
    `Confidence: ${(analysis.confidence * 100).toFixed(1)}%`,
    `Volatility: ${(analysis.volatilityScore * 100).toFixed(1)}%`,
    `Articles Analyzed: ${analysis.articlesAnalyzed}`,
  ].join('\n');
}

export function labelFor(score: number): SentimentLabel {
  if (score > SENTIMENT.POSITIVE_BOUND) return 'positive';
  if (score < SENTIMENT.NEGATIVE_BOUND) return 'negative';
  return 'neutral';
}

export function sanitizeText(text: string): string {
  return text
    .replace(/<[^>]+>/g, '')
    .replace(/[^\w\s.,!?'-]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Lexicon score of a text in [-1, 1]
 */
export function scoreText(text: string): number {
  const tokens = text.toLowerCase().match(/[a-z']+/g) ?? [];
  let sum = 0;

  tokens.forEach((token, i) => {
    const weight = (POSITIVE_WORDS[token] ?? 0) - (NEGATIVE_WORDS[token] ?? 0);
    if (weight === 0) return;
    const negated = i > 0 && NEGATORS.has(tokens[i - 1]);
    sum += negated ? -weight : weight;
  });

  if (sum === 0) return 0;
  return sum / Math.sqrt(sum * sum + NORMALIZATION_ALPHA);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const KEYWORD_PATTERNS = VOLATILITY_KEYWORDS.map((keyword) => ({
  keyword,
  pattern: new RegExp(`\\b${escapeRegExp(keyword)}\\b`, 'i'),
}));

/**
 * Volatility keywords found in a text and the resulting score in [0, 1]
 */
export function detectVolatility(text: string): { keywords: string[]; score: number } {
  const keywords = KEYWORD_PATTERNS.filter(({ pattern }) => pattern.test(text)).map(({ keyword }) => keyword);
  return {
    keywords,
    score: Math.min(keywords.length * SENTIMENT.VOLATILITY_PER_KEYWORD, 1),
  };
}

/**
 * Extract headline blocks from a news page
 */
export function parseHeadlines(html: string, source: string): NewsArticle[] {
  const $ = cheerio.load(html);
  const articles: NewsArticle[] = [];

  for (const element of $('article, div, li').toArray()) {
    if (articles.length >= SENTIMENT.MAX_ARTICLES_PER_SOURCE) break;

    const $el = $(element);
    const className = $el.attr('class') ?? '';
    if (!/article|news|post|item/i.test(className)) continue;

    const title = sanitizeText($el.find('h1, h2, h3, h4, a').first().text());
    if (title.length <= SENTIMENT.MIN_TITLE_LENGTH) continue;

    const content = sanitizeText($el.find('p').first().text());
    articles.push({ title, content, source });
  }

  return articles;
}

/**
 * Aggregate per-article scores into one analysis
 */
export function aggregateArticles(articles: NewsArticle[], analyzedAt: Date): SentimentAnalysis {
  if (articles.length === 0) {
    return { ...NEUTRAL_SENTIMENT, analyzedAt: analyzedAt.toISOString() };
  }

  let scoreSum = 0;
  let volatilitySum = 0;
  for (const article of articles) {
    const text = `${article.title} ${article.content}`;
    scoreSum += scoreText(text);
    volatilitySum += detectVolatility(text).score;
  }

  const score = scoreSum / articles.length;
  return {
    sentiment: labelFor(score),
    score,
    confidence: Math.min(articles.length / SENTIMENT.FULL_CONFIDENCE_ARTICLES, 1),
    volatilityScore: volatilitySum / articles.length,
    articlesAnalyzed: articles.length,
    analyzedAt: analyzedAt.toISOString(),
  };
}

function dedupe(articles: NewsArticle[]): NewsArticle[] {
  const seen = new Set<string>();
  return articles.filter((article) => {
    const key = article.title.toLowerCase().slice(0, 50);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

const defaultFetcher: PageFetcher = async (url) => {
  const response = await axios.get<string>(url, {
    timeout: SENTIMENT.REQUEST_TIMEOUT_MS,
    responseType: 'text',
    headers: { 'User-Agent': 'Mozilla/5.0 (compatible; fx-decision-engine)' },
  });
  return response.data;
};

export class SentimentService implements SentimentSource {
  private cache: { data: SentimentAnalysis; timestamp: number } | null = null;

  constructor(
    private readonly sources: string[],
    private readonly fetchPage: PageFetcher = defaultFetcher,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Scrape every source and score the headlines. Sources that fail are skipped;
   * no headlines at all yields a neutral result.
   */
  async analyzeNewsSentiment(): Promise<SentimentAnalysis> {
    const now = this.clock();
    if (this.cache && now.getTime() - this.cache.timestamp < SENTIMENT.CACHE_TTL_MS) {
      return this.cache.data;
    }

    const collected: NewsArticle[] = [];
    for (const source of this.sources) {
      try {
        const html = await this.fetchPage(source);
        collected.push(...parseHeadlines(html, source));
      } catch (error) {
        log.warn('Failed to scrape news source', {
          source,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    const analysis = aggregateArticles(dedupe(collected), now);
    this.cache = { data: analysis, timestamp: now.getTime() };

    log.info('News sentiment analysed', {
      sentiment: analysis.sentiment,
      score: Number(analysis.score.toFixed(3)),
      volatility: Number(analysis.volatilityScore.toFixed(3)),
      articles: analysis.articlesAnalyzed,
    });
    return analysis;
  }

  getCached(): SentimentAnalysis | null {
    return this.cache?.data ?? null;
  }
}
