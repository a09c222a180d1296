import { BotConfig } from '../../config/bot.config';
import { Action } from '../models/action';
import { LedgerSession } from '../models/ledger';
import { WikiPublisher } from '../models/services';
import { sameUser } from '../models/user';
import { formatAmount, sumAmounts } from '../utils/amount';
import { ConfigError } from './errors';

export type StatsCell = string | number | bigint | Date | null | undefined;
export type StatsRow = Record<string, StatsCell>;

export interface StatsFormat {
  symbol: string;
  decimals: number;
  explorerAddressUrl: string;
  statsSubreddit?: string;
  statsPage: string;
}

const HISTORY_COLUMNS = ['created_utc', 'type', 'state', 'from_user', 'to_user', 'amount_coin', 'to_addr', 'subreddit', 'link'];
const TIP_COLUMNS = ['created_utc', 'from_user', 'to_user', 'amount_coin', 'subreddit', 'link'];

/**
 * Render one table cell. The column name picks the format: coin, user, addr,
 * state, subreddit, link and utc columns have their own, everything else is
 * printed as is.
 * @param owner - Username whose page this is; their name is bolded
 */
export function formatValue(column: string, value: StatsCell, format: StatsFormat, owner = ''): string {
  if (value === null || value === undefined || value === '') {
    return '-';
  }

  if (column.includes('coin') && typeof value === 'bigint') {
    return `${format.symbol}&nbsp;${formatAmount(value, format.decimals)}`;
  }

  if (column.includes('user') && typeof value === 'string') {
    const isOwner = sameUser(value, owner);
    let cell = `[${isOwner ? `**${value}**` : value}](/u/${value})`;
    if (!isOwner && format.statsSubreddit) {
      cell += `^[[stats]](/r/${format.statsSubreddit}/wiki/${format.statsPage}_${value})`;
    }
    return cell;
  }

  if (column.includes('addr') && typeof value === 'string') {
    return `[${value.slice(0, 6)}...${value.slice(-5)}](${format.explorerAddressUrl}${value})`;
  }

  if (column.includes('state')) {
    return value === 'completed' ? '✓' : String(value);
  }

  if (column.includes('subreddit')) {
    return `/r/${String(value)}`;
  }

  if (column.includes('link')) {
    return `[link](${String(value)})`;
  }

  if (column.includes('utc')) {
    const date = value instanceof Date ? value : new Date(Number(value) * 1000);
    return date.toISOString().slice(0, 10);
  }

  return value instanceof Date ? value.toISOString() : String(value);
}

export function formatTable(columns: string[], rows: StatsRow[], format: StatsFormat, owner = ''): string {
  const lines = [
    columns.join('|'),
    columns.map(() => ':---').join('|'),
    ...rows.map(row => columns.map(column => formatValue(column, row[column], format, owner)).join('|'))
  ];
  return `${lines.join('\n')}\n`;
}

/**
 * Markdown projections of the ledger: a global page, a completed-tips page
 * and one history page per user.
 */
export class StatsService {
  private format: StatsFormat;

  constructor(
    private store: LedgerSession,
    private config: BotConfig
  ) {
    this.format = {
      symbol: config.coin.symbol,
      decimals: config.coin.decimals,
      explorerAddressUrl: config.coin.explorer.address,
      statsSubreddit: config.stats.subreddit,
      statsPage: config.stats.page
    };
  }

  async globalPage(): Promise<string> {
    const users = await this.store.listUsers();
    const tips = await this.store.listActions({ type: 'tip', state: 'completed' });
    const volume = sumAmounts(tips.map(tip => tip.amount ?? 0n));

    let page = '### Registered Users\n\n';
    page += `users = **${users.length}**\n\n`;
    page += '### Completed Tips\n\n';
    page += `tips = **${tips.length}**\n\n`;
    page += '### Tip Volume\n\n';
    page += `total_coin = **${formatValue('total_coin', volume, this.format)}**\n\n`;
    page += '### Top Tippers\n\n';
    page += formatTable(['from_user', 'tips', 'total_coin'], rankBy(tips, tip => tip.fromUser, 'from_user'), this.format);
    page += '\n### Top Receivers\n\n';
    page += formatTable(['to_user', 'tips', 'total_coin'], rankBy(tips, tip => tip.toUser ?? '', 'to_user'), this.format);
    return page;
  }

  async tipsPage(): Promise<string> {
    const tips = await this.store.listActions({
      type: 'tip',
      state: 'completed',
      newestFirst: true,
      limit: this.config.stats.tipsLimit
    });

    return '### All Completed Tips\n\n' + formatTable(TIP_COLUMNS, tips.map(toRow), this.format);
  }

  /**
   * @returns null when the user is not registered
   */
  async userPage(username: string): Promise<string | null> {
    const user = await this.store.getUser(username);
    if (!user) return null;

    const history = await this.store.listActions({ involving: user.username, newestFirst: true });
    const completedTips = history.filter(action => action.type === 'tip' && action.state === 'completed');
    const tipped = completedTips.filter(tip => sameUser(tip.fromUser, user.username));
    const received = completedTips.filter(tip => sameUser(tip.toUser, user.username));

    let page = `### Tipping Summary for /u/${user.username}\n\n`;
    page += formatTable(['direction', 'tips', 'total_coin'], [
      { direction: 'tipped', tips: tipped.length, total_coin: sumAmounts(tipped.map(tip => tip.amount ?? 0n)) },
      { direction: 'received', tips: received.length, total_coin: sumAmounts(received.map(tip => tip.amount ?? 0n)) }
    ], this.format);
    page += '\n#### History\n\n';
    page += formatTable(HISTORY_COLUMNS, history.map(toRow), this.format, user.username);
    return page;
  }

  /**
   * Write every page to the configured subreddit's wiki.
   * @returns Names of the pages written
   */
  async publish(wiki: WikiPublisher, reason = 'Stats update'): Promise<string[]> {
    const { subreddit, page, pageTips } = this.config.stats;
    if (!subreddit) {
      throw new ConfigError('STATS_SUBREDDIT environment variable not set');
    }

    const written: string[] = [];

    await wiki.editWikiPage(subreddit, page, await this.globalPage(), reason);
    written.push(page);

    await wiki.editWikiPage(subreddit, pageTips, await this.tipsPage(), reason);
    written.push(pageTips);

    for (const user of await this.store.listUsers()) {
      const content = await this.userPage(user.username);
      if (content === null) continue;
      const name = `${page}_${user.username}`;
      await wiki.editWikiPage(subreddit, name, content, reason);
      written.push(name);
    }

    console.log(`📊 Published ${written.length} stats page(s) to /r/${subreddit}`);
    return written;
  }
}

function toRow(action: Action): StatsRow {
  return {
    created_utc: action.createdAt,
    type: action.type,
    state: action.state,
    from_user: action.fromUser,
    to_user: action.toUser,
    amount_coin: action.amount,
    to_addr: action.address,
    subreddit: action.subreddit,
    link: action.permalink
  };
}

// Ten users with the largest totals; ties break alphabetically
function rankBy(tips: Action[], key: (tip: Action) => string, column: string): StatsRow[] {
  const totals = new Map<string, { name: string; tips: number; total: bigint }>();

  for (const tip of tips) {
    const name = key(tip);
    if (!name) continue;
    const entry = totals.get(name.toLowerCase()) ?? { name, tips: 0, total: 0n };
    entry.tips += 1;
    entry.total += tip.amount ?? 0n;
    totals.set(name.toLowerCase(), entry);
  }

  return [...totals.values()]
    .sort((a, b) => (a.total === b.total ? a.name.toLowerCase().localeCompare(b.name.toLowerCase()) : a.total > b.total ? -1 : 1))
    .slice(0, 10)
    .map(entry => ({ [column]: entry.name, tips: entry.tips, total_coin: entry.total }));
}
