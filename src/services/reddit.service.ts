import axios, { AxiosInstance } from 'axios';
import { RedditConfig } from '../../config/bot.config';
import { InboxMessage } from '../models/types';
import { MessageSource, WikiPublisher } from '../models/services';
import { ConfigError, TransientUpstreamError, UpstreamError, toUpstreamError } from './errors';

type Json = Record<string, unknown>;

interface RequestOptions {
  params?: Record<string, string | number>;
  form?: Record<string, string>;
}

export interface RedditEndpoints {
  apiBaseUrl: string;
  authBaseUrl: string;
}

const DEFAULT_ENDPOINTS: RedditEndpoints = {
  apiBaseUrl: 'https://oauth.reddit.com',
  authBaseUrl: 'https://www.reddit.com'
};

// Refresh the token this long before Reddit expires it
const TOKEN_MARGIN_MS = 60_000;

/**
 * Reddit inbox, replies, private messages and wiki pages over the OAuth API
 * (script-app password grant).
 */
export class RedditService implements MessageSource, WikiPublisher {
  private client: AxiosInstance;
  private authClient: AxiosInstance;
  private config: RedditConfig;
  private token: { value: string; expiresAt: number } | null = null;

  constructor(config: RedditConfig, endpoints: RedditEndpoints = DEFAULT_ENDPOINTS) {
    if (!config.clientId || !config.clientSecret) {
      throw new ConfigError('REDDIT_CLIENT_ID and REDDIT_CLIENT_SECRET environment variables not set');
    }
    if (!config.password) {
      throw new ConfigError('REDDIT_PASSWORD environment variable not set');
    }

    this.config = config;

    this.client = axios.create({
      baseURL: endpoints.apiBaseUrl,
      headers: { 'User-Agent': config.userAgent },
      timeout: 15000
    });

    this.authClient = axios.create({
      baseURL: endpoints.authBaseUrl,
      headers: { 'User-Agent': config.userAgent },
      auth: { username: config.clientId, password: config.clientSecret },
      timeout: 15000
    });
  }

  /**
   * Unread inbox items (comment replies, username mentions, private messages)
   * @param limit - Maximum number of items to fetch
   * @returns Items oldest first
   */
  async fetchUnread(limit: number): Promise<InboxMessage[]> {
    const data = await this.request('GET', '/message/unread', {
      params: { limit, mark: 'false', raw_json: 1 }
    }, 'fetch unread');

    const messages = listingChildren(data)
      .map(toInboxMessage)
      .filter((message): message is InboxMessage & { parentId?: string } => message !== null);

    const parentIds = messages
      .map(message => message.parentId)
      .filter((id): id is string => typeof id === 'string');
    const parentAuthors = await this.fetchAuthors(parentIds);

    // Reddit lists newest first
    return messages.reverse().map(({ parentId, ...message }) => ({
      ...message,
      parentAuthor: parentId ? parentAuthors.get(parentId) : undefined
    }));
  }

  async markRead(message: InboxMessage): Promise<void> {
    await this.request('POST', '/api/read_message', { form: { id: message.fullname } }, 'mark read');
  }

  /**
   * Reply in place: a comment reply for comments, a message reply for PMs.
   */
  async reply(message: InboxMessage, body: string): Promise<void> {
    const data = await this.request('POST', '/api/comment', {
      form: { api_type: 'json', thing_id: message.fullname, text: body }
    }, 'reply');
    checkJsonErrors(data, 'reply');
  }

  async sendMessage(username: string, subject: string, body: string): Promise<void> {
    const data = await this.request('POST', '/api/compose', {
      form: { api_type: 'json', to: username, subject, text: body }
    }, 'send message');
    checkJsonErrors(data, 'send message');
  }

  async editWikiPage(subreddit: string, page: string, content: string, reason: string): Promise<void> {
    await this.request('POST', `/r/${encodeURIComponent(subreddit)}/api/wiki/edit`, {
      form: { page, content, reason }
    }, 'wiki edit');
    console.log(`📝 Updated wiki page /r/${subreddit}/wiki/${page}`);
  }

  private async fetchAuthors(fullnames: string[]): Promise<Map<string, string>> {
    const authors = new Map<string, string>();
    if (fullnames.length === 0) return authors;

    const data = await this.request('GET', '/api/info', {
      params: { id: [...new Set(fullnames)].join(','), raw_json: 1 }
    }, 'fetch parents');

    for (const child of listingChildren(data)) {
      const fields = asRecord(child.data);
      if (!fields) continue;
      const name = stringField(fields, 'name');
      const author = stringField(fields, 'author');
      if (name && author && author !== '[deleted]') {
        authors.set(name, author);
      }
    }
    return authors;
  }

  private async request(
    method: 'GET' | 'POST',
    url: string,
    options: RequestOptions,
    context: string,
    retried = false
  ): Promise<unknown> {
    const token = await this.accessToken();

    try {
      const response = await this.client.request({
        method,
        url,
        params: options.params,
        data: options.form ? new URLSearchParams(options.form) : undefined,
        headers: { Authorization: `Bearer ${token}` }
      });
      return response.data;

    } catch (error) {
      if (!retried && axios.isAxiosError(error) && error.response?.status === 401) {
        this.token = null;
        return this.request(method, url, options, context, true);
      }
      throw toUpstreamError(error, `Reddit ${context}`);
    }
  }

  private async accessToken(): Promise<string> {
    if (this.token && this.token.expiresAt - TOKEN_MARGIN_MS > Date.now()) {
      return this.token.value;
    }

    try {
      const response = await this.authClient.post('/api/v1/access_token', new URLSearchParams({
        grant_type: 'password',
        username: this.config.username,
        password: this.config.password
      }));

      const data = asRecord(response.data);
      const value = data ? stringField(data, 'access_token') : undefined;
      const expiresIn = data && typeof data.expires_in === 'number' ? data.expires_in : 3600;
      if (!value) {
        throw new UpstreamError(`Reddit login failed: ${data ? stringField(data, 'error') ?? 'no token' : 'no token'}`);
      }

      this.token = { value, expiresAt: Date.now() + expiresIn * 1000 };
      console.log(`🔑 Logged in to Reddit as /u/${this.config.username}`);
      return value;

    } catch (error) {
      throw toUpstreamError(error, 'Reddit login');
    }
  }
}

function toInboxMessage(item: Json): (InboxMessage & { parentId?: string }) | null {
  const kind = stringField(item, 'kind');
  const data = asRecord(item.data);
  if (!data || (kind !== 't1' && kind !== 't4')) {
    return null;
  }

  const id = stringField(data, 'id');
  const fullname = stringField(data, 'name');
  if (!id || !fullname) return null;

  const author = stringField(data, 'author');
  const wasComment = data.was_comment === true || kind === 't1';
  const context = stringField(data, 'context');

  return {
    id,
    fullname,
    kind: wasComment ? 'comment' : 'message',
    author: author && author !== '[deleted]' ? author : null,
    subject: stringField(data, 'subject') ?? '',
    body: stringField(data, 'body') ?? '',
    subreddit: stringField(data, 'subreddit'),
    permalink: context ? `https://www.reddit.com${context}` : undefined,
    parentId: wasComment ? stringField(data, 'parent_id') : undefined,
    createdUtc: typeof data.created_utc === 'number' ? data.created_utc : 0
  };
}

function listingChildren(payload: unknown): Json[] {
  const listing = asRecord(payload);
  const data = listing ? asRecord(listing.data) : null;
  if (!data || !Array.isArray(data.children)) return [];

  return data.children
    .map(asRecord)
    .filter((child): child is Json => child !== null);
}

function checkJsonErrors(payload: unknown, context: string): void {
  const root = asRecord(payload);
  const json = root ? asRecord(root.json) : null;
  if (!json || !Array.isArray(json.errors) || json.errors.length === 0) return;

  const errors: unknown[] = json.errors;
  const codes = errors.map(entry => (Array.isArray(entry) && typeof entry[0] === 'string' ? entry[0] : 'UNKNOWN'));
  if (codes.includes('RATELIMIT')) {
    throw new TransientUpstreamError(`Reddit ${context}: RATELIMIT`, 429);
  }
  throw new UpstreamError(`Reddit ${context}: ${codes.join(', ')}`);
}

function asRecord(value: unknown): Json | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return null;
  return Object.fromEntries(Object.entries(value));
}

function stringField(record: Json, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}
