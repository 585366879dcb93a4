import { describe, expect, it, vi } from 'vitest';
import {
  SentimentService,
  aggregateArticles,
  detectVolatility,
  formatSentimentSummary,
  labelFor,
  parseHeadlines,
  sanitizeText,
  scoreText,
  shouldAvoidTrading,
} from '../services/sentimentService';
import { FakeClock, sentiment } from './helpers/fakes';

const PAGE = `
  <html><body>
    <div class="news-item"><h3>EUR/USD rallies on strong growth data</h3><p>Markets cheer the <b>numbers</b>.</p></div>
    <li class="post"><a href="#">Short</a></li>
    <div class="sidebar"><h3>Subscribe to our newsletter today</h3></div>
    <article class="article"><h2>Yen plunge deepens as BOJ holds</h2></article>
  </body></html>
`;

describe('scoreText', () => {
  it('normalises the lexicon sum into [-1, 1]', () => {
    expect(scoreText('Dollar rally')).toBeCloseTo(2 / Math.sqrt(19), 10);
    expect(scoreText('Yen plunge')).toBeCloseTo(-2.5 / Math.sqrt(21.25), 10);
  });

  it('flips a word that follows a negator', () => {
    expect(scoreText('Outlook not strong')).toBeCloseTo(-1.5 / Math.sqrt(17.25), 10);
  });

  it('is zero for text without lexicon words', () => {
    expect(scoreText('Central bank meets on Thursday')).toBe(0);
  });
});

describe('labelFor', () => {
  it('labels around the +-0.1 bounds', () => {
    expect(labelFor(0.1)).toBe('neutral');
    expect(labelFor(0.11)).toBe('positive');
    expect(labelFor(-0.1)).toBe('neutral');
    expect(labelFor(-0.11)).toBe('negative');
  });
});

describe('detectVolatility', () => {
  it('adds 0.1 per matched keyword', () => {
    const result = detectVolatility('Fed hints at interest rate cut as inflation cools');

    expect(result.keywords).toEqual(['fed', 'interest rate', 'inflation']);
    expect(result.score).toBeCloseTo(0.3, 10);
  });

  it('matches whole words only', () => {
    expect(detectVolatility('Federal holiday thins liquidity').keywords).toEqual([]);
  });

  it('caps the score at 1', () => {
    const text = 'Fed ECB BOE BOJ RBA BOC NZD inflation GDP employment brexit election';
    expect(detectVolatility(text).score).toBe(1);
  });
});

describe('sanitizeText', () => {
  it('drops markup and stray symbols', () => {
    expect(sanitizeText('  <b>EUR/USD</b>   up 0.5%!  ')).toBe('EURUSD up 0.5!');
  });
});

describe('parseHeadlines', () => {
  it('keeps titled blocks whose class looks like news', () => {
    expect(parseHeadlines(PAGE, 'http://news.test/latest')).toEqual([
      {
        title: 'EURUSD rallies on strong growth data',
        content: 'Markets cheer the numbers.',
        source: 'http://news.test/latest',
      },
      {
        title: 'Yen plunge deepens as BOJ holds',
        content: '',
        source: 'http://news.test/latest',
      },
    ]);
  });

  it('stops after ten headlines per page', () => {
    const items = Array.from({ length: 12 }, (_, i) => `<li class="item"><a>Headline number ${i} here</a></li>`);

    expect(parseHeadlines(`<ul>${items.join('')}</ul>`, 'src')).toHaveLength(10);
  });
});

describe('aggregateArticles', () => {
  const at = new Date('2024-03-05T10:00:00.000Z');

  it('averages article scores and volatility', () => {
    const result = aggregateArticles(
      [
        { title: 'Dollar rally', content: '', source: 'a' },
        { title: 'Fed and ECB meet', content: '', source: 'a' },
      ],
      at
    );

    expect(result.score).toBeCloseTo(2 / Math.sqrt(19) / 2, 10);
    expect(result.sentiment).toBe('positive');
    expect(result.volatilityScore).toBeCloseTo(0.1, 10);
    expect(result.confidence).toBe(0.2);
    expect(result.articlesAnalyzed).toBe(2);
    expect(result.analyzedAt).toBe('2024-03-05T10:00:00.000Z');
  });

  it('is neutral without articles', () => {
    expect(aggregateArticles([], at)).toEqual({
      sentiment: 'neutral',
      score: 0,
      confidence: 0,
      volatilityScore: 0,
      articlesAnalyzed: 0,
      analyzedAt: '2024-03-05T10:00:00.000Z',
    });
  });
});

describe('shouldAvoidTrading', () => {
  it('allows trading before any news is analysed', () => {
    expect(shouldAvoidTrading(null)).toBe(false);
  });

  it('avoids a volatile backdrop', () => {
    expect(shouldAvoidTrading(sentiment(0.5, 0.75))).toBe(true);
  });
});

describe('formatSentimentSummary', () => {
  it('lists the analysis', () => {
    expect(formatSentimentSummary(sentiment(0.25, 0.4))).toBe(
      '📈 News Sentiment: POSITIVE\nScore: 0.250\nConfidence: 100.0%\nVolatility: 40.0%\nArticles Analyzed: 12'
    );
  });

  it('says when nothing has been analysed', () => {
    expect(formatSentimentSummary(null)).toBe('➡️ News Sentiment: not yet analysed');
  });
});

describe('SentimentService', () => {
  it('reuses the analysis for ten minutes', async () => {
    const clock = new FakeClock(new Date('2024-03-05T10:00:00.000Z'));
    const fetchPage = vi.fn(async () => PAGE);
    const service = new SentimentService(['http://news.test/a'], fetchPage, clock.now);

    const first = await service.analyzeNewsSentiment();
    clock.advance(9 * 60 * 1000);
    const second = await service.analyzeNewsSentiment();
    clock.advance(2 * 60 * 1000);
    await service.analyzeNewsSentiment();

    expect(second).toBe(first);
    expect(fetchPage).toHaveBeenCalledTimes(2);
    expect(service.getCached()?.analyzedAt).toBe('2024-03-05T10:11:00.000Z');
  });

  it('skips sources that fail', async () => {
    const fetchPage = vi.fn(async (url: string) => {
      if (url.endsWith('/down')) throw new Error('ECONNREFUSED');
      return PAGE;
    });
    const service = new SentimentService(['http://news.test/down', 'http://news.test/up'], fetchPage);

    const result = await service.analyzeNewsSentiment();

    expect(result.articlesAnalyzed).toBe(2);
  });

  it('counts a headline carried by two sources once', async () => {
    const service = new SentimentService(['http://news.test/a', 'http://news.test/b'], async () => PAGE);

    const result = await service.analyzeNewsSentiment();

    expect(result.articlesAnalyzed).toBe(2);
  });

  it('is neutral when no source answers', async () => {
    const service = new SentimentService(['http://news.test/down'], async () => {
      throw new Error('ETIMEDOUT');
    });

    const result = await service.analyzeNewsSentiment();

    expect(result.sentiment).toBe('neutral');
    expect(result.articlesAnalyzed).toBe(0);
    expect(service.getCached()).toBe(result);
  });
});
