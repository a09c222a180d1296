// Tip bot configuration, read from the environment

import dotenv from 'dotenv';
import { ConfigError } from '../src/services/errors';
import { CommandPattern, CommandType, InboxItemKind } from '../src/models/types';
import { parseAmount } from '../src/utils/amount';
import commandPatterns from './commands.json';
import amountKeywords from './keywords.json';

dotenv.config();

export interface RedditConfig {
  clientId: string;
  clientSecret: string;
  username: string;
  password: string;
  userAgent: string;
  batchLimit: number;
  bannedUsers: string[];
  sendSorry: boolean;
}

export interface CoinConfig {
  name: string;
  symbol: string;
  units: string[];
  decimals: number;
  addressPattern: string;           // regex source for withdraw destinations
  rpcUrl: string;
  confirmations: number;
  encryptedWalletKey?: string;
  minTip: bigint;
  minWithdraw: bigint;
  withdrawFee: bigint;
  explorer: {
    address: string;
    tx: string;
  };
}

export interface BotConfig {
  reddit: RedditConfig;
  database: {
    url: string;
    ssl: boolean;
  };
  coin: CoinConfig;
  loop: {
    sleepSeconds: number;
    expirePendingHours: number;
    autoRegisterRecipients: boolean;
  };
  notify: {
    enabled: boolean;
    operatorUsername?: string;
  };
  stats: {
    subreddit?: string;
    page: string;
    pageTips: string;
    tipsLimit: number;
  };
  commands: CommandPattern[];
  keywords: Record<string, string>;  // phrase -> decimal amount or "all"
  masterEncryptionKey?: string;
  port: number;
}

const COMMAND_TYPES: readonly CommandType[] = ['register', 'info', 'accept', 'decline', 'tip', 'withdraw'];
const SCOPES: readonly InboxItemKind[] = ['comment', 'message'];

/**
 * Build the bot configuration from environment variables.
 * @param env - Defaults to process.env
 */
export function loadBotConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
  const username = required(env, 'REDDIT_USERNAME');
  const databaseUrl = required(env, 'DATABASE_URL');
  const decimals = integer(env, 'COIN_DECIMALS', 18);

  const config: BotConfig = {
    reddit: {
      clientId: env.REDDIT_CLIENT_ID || '',
      clientSecret: env.REDDIT_CLIENT_SECRET || '',
      username,
      password: env.REDDIT_PASSWORD || '',
      userAgent: env.REDDIT_USER_AGENT || `tipbot/1.0 (by /u/${username})`,
      batchLimit: integer(env, 'BATCH_LIMIT', 25),
      bannedUsers: list(env.BANNED_USERS).map(name => name.toLowerCase()),
      sendSorry: flag(env, 'SEND_SORRY', true)
    },
    database: {
      url: databaseUrl,
      ssl: flag(env, 'DATABASE_SSL', false)
    },
    coin: {
      name: env.COIN_NAME || 'ether',
      symbol: env.COIN_SYMBOL || 'Ξ',
      units: list(env.COIN_UNITS || 'eth,ether').map(unit => unit.toLowerCase()),
      decimals,
      addressPattern: env.COIN_ADDRESS_PATTERN || '0x[0-9a-fA-F]{40}',
      rpcUrl: env.COIN_RPC_URL || 'http://localhost:8545',
      confirmations: integer(env, 'COIN_CONFIRMATIONS', 1),
      encryptedWalletKey: env.COIN_WALLET_KEY_ENCRYPTED || undefined,
      minTip: amount(env, 'MIN_TIP', '0.0001', decimals),
      minWithdraw: amount(env, 'MIN_WITHDRAW', '0.001', decimals),
      withdrawFee: amount(env, 'WITHDRAW_FEE', '0.0005', decimals),
      explorer: {
        address: env.EXPLORER_ADDRESS_URL || 'https://etherscan.io/address/',
        tx: env.EXPLORER_TX_URL || 'https://etherscan.io/tx/'
      }
    },
    loop: {
      sleepSeconds: integer(env, 'SLEEP_SECONDS', 30),
      expirePendingHours: hours(env, 'EXPIRE_PENDING_HOURS', 48),
      autoRegisterRecipients: flag(env, 'AUTO_REGISTER_RECIPIENTS', false)
    },
    notify: {
      enabled: flag(env, 'NOTIFY_ENABLED', true),
      operatorUsername: env.OPERATOR_USERNAME || undefined
    },
    stats: {
      subreddit: env.STATS_SUBREDDIT || undefined,
      page: env.STATS_PAGE || 'stats',
      pageTips: env.STATS_PAGE_TIPS || 'tips',
      tipsLimit: integer(env, 'STATS_TIPS_LIMIT', 100)
    },
    commands: loadCommandPatterns(commandPatterns),
    keywords: { ...amountKeywords },
    masterEncryptionKey: env.MASTER_ENCRYPTION_KEY || undefined,
    port: integer(env, 'PORT', 3000)
  };

  validate(config);
  return config;
}

export function loadCommandPatterns(entries: ReadonlyArray<{ type: string; scope: string; pattern: string }>): CommandPattern[] {
  return entries.map((entry, index) => {
    const type = COMMAND_TYPES.find(t => t === entry.type);
    const scope = SCOPES.find(s => s === entry.scope);
    if (!type || !scope) {
      throw new ConfigError(`commands.json entry ${index}: unknown type "${entry.type}" or scope "${entry.scope}"`);
    }
    return { type, scope, pattern: entry.pattern };
  });
}

function validate(config: BotConfig): void {
  if (config.coin.units.length === 0) {
    throw new ConfigError('COIN_UNITS must name at least one unit');
  }

  if (config.reddit.batchLimit < 1 || config.reddit.batchLimit > 100) {
    throw new ConfigError('BATCH_LIMIT must be between 1 and 100');
  }

  for (const [phrase, value] of Object.entries(config.keywords)) {
    if (value !== 'all' && parseAmount(value, config.coin.decimals) === null) {
      throw new ConfigError(`Keyword "${phrase}" has an invalid amount: ${value}`);
    }
  }
}

function required(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[name];
  if (!value) {
    throw new ConfigError(`${name} environment variable not set`);
  }
  return value;
}

function integer(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) return fallback;

  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

function hours(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) return fallback;

  if (!/^(\d+(\.\d+)?|\.\d+)$/.test(raw.trim())) {
    throw new ConfigError(`${name} must be a non-negative number of hours, got "${raw}"`);
  }
  return parseFloat(raw);
}

function flag(env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (!raw) return fallback;
  return raw === 'true' || raw === '1';
}

function amount(env: NodeJS.ProcessEnv, name: string, fallback: string, decimals: number): bigint {
  const raw = env[name] || fallback;
  const value = parseAmount(raw, decimals);
  if (value === null) {
    throw new ConfigError(`${name} is not a valid amount: "${raw}"`);
  }
  return value;
}

function list(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}
