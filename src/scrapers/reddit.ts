import { z } from 'zod';
import type { RedditCredentials } from '../config.js';
import { FetchError, errorMessage } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../log.js';
import type { DocumentSource, RawDocument } from './types.js';

const RedditListingSchema = z.object({
  data: z.object({
    children: z.array(
      z.object({
        data: z.object({
          title: z.string().nullish(),
          selftext: z.string().nullish(),
        }),
      }),
    ),
  }),
});

const TokenResponseSchema = z.object({
  access_token: z.string(),
  expires_in: z.number(),
});

export interface RedditSourceOptions {
  userAgent?: string;
  credentials?: RedditCredentials | null;
  /** posts per listing */
  limit?: number;
  timeoutMs?: number;
  logger?: Logger;
}

export class RedditSource implements DocumentSource {
  readonly name = 'reddit';

  private readonly userAgent: string;
  private readonly credentials: RedditCredentials | null;
  private readonly limit: number;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private cachedToken: { token: string; expiresAt: number } | null = null;

  constructor(options: RedditSourceOptions = {}) {
    this.userAgent = options.userAgent ?? 'wordpulse/0.1.0';
    this.credentials = options.credentials ?? null;
    this.limit = options.limit ?? 25;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.logger = options.logger ?? defaultLogger;
  }

  async fetch(subreddit: string): Promise<RawDocument[]> {
    const token = await this.getOAuthToken();
    const host = token ? 'https://oauth.reddit.com' : 'https://www.reddit.com';
    const url = `${host}/r/${encodeURIComponent(subreddit)}/hot.json?limit=${this.limit}`;

    const headers: Record<string, string> = { 'User-Agent': this.userAgent };
    if (token) {
      headers['Authorization'] = `Bearer ${token}`;
    }

    let res: Response;
    try {
      res = await fetch(url, { headers, signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (err) {
      throw new FetchError(`Reddit r/${subreddit} request failed: ${errorMessage(err)}`, subreddit, { cause: err });
    }

    if (!res.ok) {
      throw new FetchError(`Reddit r/${subreddit} returned ${res.status}`, subreddit, { status: res.status });
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new FetchError(`Reddit r/${subreddit} sent malformed JSON`, subreddit, { cause: err });
    }

    const listing = RedditListingSchema.safeParse(body);
    if (!listing.success) {
      throw new FetchError(`Reddit r/${subreddit} sent a malformed listing`, subreddit, { cause: listing.error });
    }

    return listing.data.data.children.map((post) => ({
      title: post.data.title ?? '',
      body: post.data.selftext ?? '',
    }));
  }

  /**
   * Password-grant token, cached until 60s before it expires. Any failure
   * falls back to unauthenticated requests.
   */
  private async getOAuthToken(): Promise<string | null> {
    const creds = this.credentials;
    if (!creds) return null;

    if (this.cachedToken && Date.now() < this.cachedToken.expiresAt - 60_000) {
      return this.cachedToken.token;
    }

    try {
      const basic = Buffer.from(`${creds.clientId}:${creds.clientSecret}`).toString('base64');
      const res = await fetch('https://www.reddit.com/api/v1/access_token', {
        method: 'POST',
        headers: {
          'Authorization': `Basic ${basic}`,
          'Content-Type': 'application/x-www-form-urlencoded',
          'User-Agent': this.userAgent,
        },
        body: new URLSearchParams({
          grant_type: 'password',
          username: creds.username,
          password: creds.password,
        }).toString(),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!res.ok) {
        this.logger.warn(`Reddit OAuth failed: ${res.status}`);
        return null;
      }

      const data = TokenResponseSchema.parse(await res.json());
      this.cachedToken = {
        token: data.access_token,
        expiresAt: Date.now() + data.expires_in * 1000,
      };
      return this.cachedToken.token;
    } catch (err) {
      this.logger.warn(`Reddit OAuth error: ${errorMessage(err)}`);
      return null;
    }
  }
}
