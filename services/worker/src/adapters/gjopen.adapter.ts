import { z } from 'zod';
import {
  AdapterAuthError,
  ConfigurationError,
  DEFAULT_MARKET_FILTER,
  ParseError,
  TransientFetchError,
  createPooledMarket,
  errorMessage,
  mergeFilter,
  parseFlexibleTimestamp,
  type Credentials,
  type MarketFilter,
  type Platform,
  type PooledMarket,
} from '@question-pool/core';
import { BaseAdapter } from './base.adapter.js';
import { extractCsrfToken, extractLinks, findTags, readAttribute } from './html.js';
import type { AdapterConfig } from './types.js';

const GJOPEN_BASE = 'https://www.gjopen.com';
const OPINION_POOL_CLASS = 'FOF.Forecast.PredictionInterfaces.OpinionPoolInterface';
const QUESTION_LINK_RE = /\/questions\/\d+/;

const gjopenQuestionSchema = z.object({
  id: z.union([z.number(), z.string()]),
  name: z.string(),
  published_at: z.string().nullish(),
  predictors_count: z.number().nullish(),
  comments_count: z.number().nullish(),
  type: z.string().nullish(),
  answers: z
    .array(
      z.object({
        name: z.string(),
        probability: z.number().nullish(),
      })
    )
    .default([]),
});

const opinionPoolPropsSchema = z.object({ question: gjopenQuestionSchema });

export type GJOpenQuestionProps = z.infer<typeof gjopenQuestionSchema>;

/**
 * Question props scraped from a question page
 */
export interface GJOpenQuestion {
  props: GJOpenQuestionProps;
  url: string;
}

/**
 * Pull the question props out of the opinion-pool React mount point
 */
export function parseQuestionPage(html: string): GJOpenQuestionProps {
  const [tag] = findTags(html, 'div', 'data-react-class', OPINION_POOL_CLASS);
  const rawProps = tag ? readAttribute(tag, 'data-react-props') : null;
  if (!rawProps) {
    throw new ParseError('[gjopen] Question page has no opinion pool props');
  }

  let json: unknown;
  try {
    json = JSON.parse(rawProps);
  } catch (err) {
    throw new ParseError(`[gjopen] Invalid opinion pool props: ${errorMessage(err)}`, { cause: err });
  }

  const parsed = opinionPoolPropsSchema.safeParse(json);
  if (!parsed.success) {
    throw new ParseError(`[gjopen] Unexpected question props: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }
  return parsed.data.question;
}

/**
 * Good Judgment Open adapter: scrapes question pages behind a login.
 * Listing is sorted by forecaster count, descending.
 */
export class GJOpenAdapter extends BaseAdapter<GJOpenQuestion> {
  readonly platform: Platform = 'gjopen';
  readonly defaultFilter: MarketFilter = mergeFilter(DEFAULT_MARKET_FILTER, { minForecasters: 40 });

  constructor(
    private readonly credentials: Credentials | undefined,
    config: AdapterConfig = {}
  ) {
    super(config, { baseUrl: GJOPEN_BASE, maxPages: 20, pageDelayMs: 600, itemDelayMs: 700 });
  }

  private get loginUrl(): string {
    return `${this.config.baseUrl}/users/sign_in`;
  }

  async open(): Promise<void> {
    if (!this.credentials) {
      throw new ConfigurationError('[gjopen] GJOPEN_EMAIL and GJOPEN_PASSWORD must be set');
    }
    await super.open();
    await this.login(this.credentials);
  }

  /**
   * Two-step login: read the CSRF token from the sign-in page, then post
   * the credentials with it
   */
  private async login(credentials: Credentials): Promise<void> {
    const page = await this.fetchText(this.loginUrl);
    const token = extractCsrfToken(page.text);
    if (!token) {
      throw new AdapterAuthError('[gjopen] Could not find CSRF token on login page');
    }

    const form = new URLSearchParams({
      'user[email]': credentials.email,
      'user[password]': credentials.password,
      authenticity_token: token,
    });
    const result = await this.fetchText(this.loginUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: form.toString(),
    });

    if (result.text.includes('Invalid Email or password') || result.url.includes('sign_in')) {
      throw new AdapterAuthError('[gjopen] Login failed, check credentials');
    }
    console.log('[gjopen] Logged in');
  }

  private async fetchQuestionLinks(page: number): Promise<string[]> {
    const url = new URL('/questions', this.config.baseUrl);
    url.searchParams.set('sort', 'predictors_count');
    url.searchParams.set('sort_dir', 'desc');
    url.searchParams.set('page', String(page));

    try {
      const { text } = await this.fetchText(url.toString());
      return extractLinks(text, this.config.baseUrl, QUESTION_LINK_RE);
    } catch (err) {
      if (page === 1) {
        throw new TransientFetchError(`[gjopen] Could not load question list: ${errorMessage(err)}`, { cause: err });
      }
      console.warn(`[gjopen] Page ${page} unavailable, stopping: ${errorMessage(err)}`);
      return [];
    }
  }

  private async fetchQuestion(url: string): Promise<GJOpenQuestion | null> {
    try {
      const { text } = await this.fetchText(url);
      return { props: parseQuestionPage(text), url };
    } catch (err) {
      console.warn(`[gjopen] Skipping ${url}: ${errorMessage(err)}`);
      return null;
    }
  }

  async fetchMarkets(filter: MarketFilter): Promise<GJOpenQuestion[]> {
    const collected: GJOpenQuestion[] = [];
    const seenQuestions = new Set<string>();

    for (let page = 1; page <= this.config.maxPages; page++) {
      const links = await this.fetchQuestionLinks(page);
      if (links.length === 0) break;

      const pageQuestions: GJOpenQuestion[] = [];
      for (let i = 0; i < links.length; i++) {
        const question = await this.fetchQuestion(links[i]);
        if (question && !seenQuestions.has(question.props.name)) {
          seenQuestions.add(question.props.name);
          pageQuestions.push(question);
        }
        if (i < links.length - 1) {
          await this.delay(this.config.itemDelayMs);
        }
      }

      console.log(`[gjopen] Page ${page}: ${pageQuestions.length} new questions (total: ${collected.length + pageQuestions.length})`);
      if (pageQuestions.length === 0) break;

      collected.push(...pageQuestions.filter((q) => passesFilter(q.props, filter)));

      // Sorted by forecasters: once a whole page is below the floor, later pages are too
      if (pageQuestions.every((q) => (q.props.predictors_count ?? 0) < filter.minForecasters)) {
        break;
      }

      await this.delay(this.config.pageDelayMs);
    }

    return collected;
  }

  toPooledMarket(raw: GJOpenQuestion): PooledMarket {
    const { props, url } = raw;
    return createPooledMarket({
      platform: this.platform,
      nativeId: props.id,
      question: props.name,
      outcomes: props.answers.map((a) => a.name),
      outcomeProbabilities: props.answers.map((a) => a.probability ?? null),
      url,
      publishedAt: parseFlexibleTimestamp(props.published_at),
      volume: null,
      nForecasters: props.predictors_count ?? null,
      commentsCount: props.comments_count ?? null,
      originalMarketType: props.type ?? null,
      isResolved: null,
      raw,
    });
  }
}

function passesFilter(props: GJOpenQuestionProps, filter: MarketFilter): boolean {
  return (props.predictors_count ?? 0) >= filter.minForecasters && (props.comments_count ?? 0) >= filter.minComments;
}
