import { Server } from 'http';
import express from 'express';
import { RedditService } from '../src/services/reddit.service';
import { RedditConfig } from '../config/bot.config';
import { ConfigError, TransientUpstreamError, UpstreamError } from '../src/services/errors';

// In-process stand-in for the Reddit OAuth API
interface Canned {
  status: number;
  body: unknown;
}

const unreadListing = {
  kind: 'Listing',
  data: {
    children: [
      {
        kind: 't1',
        data: {
          id: 'c2',
          name: 't1_c2',
          author: 'alice',
          subject: 'username mention',
          body: '+/u/tipbot 1 eth',
          subreddit: 'tipping',
          context: '/r/tipping/comments/abc/_/c2/?context=3',
          parent_id: 't1_p1',
          was_comment: true,
          created_utc: 1700000100
        }
      },
      {
        kind: 't4',
        data: { id: 'm1', name: 't4_m1', author: 'bob', subject: 'hi', body: 'register', was_comment: false, created_utc: 1700000000 }
      },
      { kind: 't3', data: { id: 'x', name: 't3_x' } }
    ]
  }
};

describe('RedditService', () => {
  let server: Server;
  let baseUrl = '';
  let tokenRequests = 0;
  let unreadQueue: Canned[] = [];
  let commentResponse: Canned = { status: 200, body: { json: { errors: [] } } };
  const forms: Array<{ path: string; body: Record<string, string> }> = [];

  const config: RedditConfig = {
    clientId: 'test-id',
    clientSecret: 'test-secret',
    username: 'tipbot',
    password: 'test-password',
    userAgent: 'tipbot-test',
    batchLimit: 25,
    bannedUsers: [],
    sendSorry: true
  };

  beforeAll(async () => {
    const app = express();
    app.use(express.urlencoded({ extended: false }));

    app.post('/api/v1/access_token', (req, res) => {
      tokenRequests += 1;
      res.json({ access_token: `test-token-${tokenRequests}`, expires_in: 3600 });
    });

    app.get('/message/unread', (req, res) => {
      const next = unreadQueue.shift() ?? { status: 200, body: unreadListing };
      res.status(next.status).json(next.body);
    });

    app.get('/api/info', (req, res) => {
      res.json({
        kind: 'Listing',
        data: { children: [{ kind: 't1', data: { name: 't1_p1', author: 'carol' } }] }
      });
    });

    app.post(['/api/read_message', '/api/compose', '/r/:subreddit/api/wiki/edit'], (req, res) => {
      forms.push({ path: req.path, body: req.body });
      res.json({ json: { errors: [] } });
    });

    app.post('/api/comment', (req, res) => {
      forms.push({ path: req.path, body: req.body });
      res.status(commentResponse.status).json(commentResponse.body);
    });

    await new Promise<void>(resolve => {
      server = app.listen(0, '127.0.0.1', () => resolve());
    });
    const address = server.address();
    baseUrl = `http://127.0.0.1:${address !== null && typeof address === 'object' ? address.port : 0}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>(resolve => server.close(() => resolve()));
  });

  beforeEach(() => {
    tokenRequests = 0;
    unreadQueue = [];
    commentResponse = { status: 200, body: { json: { errors: [] } } };
    forms.length = 0;
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  const service = () => new RedditService(config, { apiBaseUrl: baseUrl, authBaseUrl: baseUrl });

  it('should require credentials', () => {
    expect(() => new RedditService({ ...config, clientSecret: '' })).toThrow(ConfigError);
  });

  it('should fetch unread items oldest first with parent authors', async () => {
    const items = await service().fetchUnread(25);

    expect(items).toEqual([
      {
        id: 'm1',
        fullname: 't4_m1',
        kind: 'message',
        author: 'bob',
        subject: 'hi',
        body: 'register',
        subreddit: undefined,
        permalink: undefined,
        parentAuthor: undefined,
        createdUtc: 1700000000
      },
      {
        id: 'c2',
        fullname: 't1_c2',
        kind: 'comment',
        author: 'alice',
        subject: 'username mention',
        body: '+/u/tipbot 1 eth',
        subreddit: 'tipping',
        permalink: 'https://www.reddit.com/r/tipping/comments/abc/_/c2/?context=3',
        parentAuthor: 'carol',
        createdUtc: 1700000100
      }
    ]);
    expect(tokenRequests).toBe(1);
  });

  it('should reuse the token until it expires', async () => {
    const reddit = service();
    await reddit.fetchUnread(25);
    await reddit.fetchUnread(25);

    expect(tokenRequests).toBe(1);
  });

  it('should log in again once after a 401', async () => {
    unreadQueue = [{ status: 401, body: { message: 'Unauthorized' } }];

    const items = await service().fetchUnread(25);

    expect(items).toHaveLength(2);
    expect(tokenRequests).toBe(2);
  });

  it('should surface rate limits and outages as transient', async () => {
    unreadQueue = [{ status: 429, body: {} }];
    await expect(service().fetchUnread(25)).rejects.toBeInstanceOf(TransientUpstreamError);

    unreadQueue = [{ status: 503, body: {} }];
    await expect(service().fetchUnread(25)).rejects.toBeInstanceOf(TransientUpstreamError);
  });

  it('should keep client errors permanent', async () => {
    unreadQueue = [{ status: 403, body: {} }];

    const error = await service().fetchUnread(25).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(UpstreamError);
    expect(error).not.toBeInstanceOf(TransientUpstreamError);
  });

  it('should post replies and mark items read', async () => {
    const reddit = service();
    const [item] = await reddit.fetchUnread(25);

    await reddit.reply(item, '✅ Registered!');
    await reddit.markRead(item);

    expect(forms).toEqual([
      { path: '/api/comment', body: { api_type: 'json', thing_id: 't4_m1', text: '✅ Registered!' } },
      { path: '/api/read_message', body: { id: 't4_m1' } }
    ]);
  });

  it('should treat a RATELIMIT reply error as transient', async () => {
    commentResponse = { status: 200, body: { json: { errors: [['RATELIMIT', 'you are doing that too much', 'ratelimit']] } } };
    const reddit = service();
    const [item] = await reddit.fetchUnread(25);

    await expect(reddit.reply(item, 'hi')).rejects.toThrow('Reddit reply: RATELIMIT');
    await expect(reddit.reply(item, 'hi')).rejects.toBeInstanceOf(TransientUpstreamError);
  });

  it('should edit wiki pages', async () => {
    await service().editWikiPage('tipping', 'stats', '# Stats', 'Stats update');

    expect(forms).toEqual([
      { path: '/r/tipping/api/wiki/edit', body: { page: 'stats', content: '# Stats', reason: 'Stats update' } }
    ]);
  });
});
