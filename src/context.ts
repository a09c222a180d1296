import { BotConfig, loadBotConfig } from '../config/bot.config';
import { LedgerStore } from './models/ledger';
import { CoinBackend, MessageSource, OperatorNotifier, WikiPublisher } from './models/services';
import { CoinService } from './services/coin.service';
import { DbService } from './services/db.service';
import { EncryptionService } from './services/encryption.service';
import { ExecutorService } from './services/executor.service';
import { createNotifier } from './services/notify.service';
import { ParserService } from './services/parser.service';
import { RedditService } from './services/reddit.service';

/**
 * Everything a component needs, built once at startup and passed down.
 */
export interface BotContext {
  config: BotConfig;
  store: LedgerStore;
  source: MessageSource & WikiPublisher;
  coin: CoinBackend;
  notifier: OperatorNotifier;
}

export function createContext(config: BotConfig = loadBotConfig()): BotContext {
  const source = new RedditService(config.reddit);
  const encryption = new EncryptionService(config.masterEncryptionKey);

  return {
    config,
    store: DbService.connect(config.database.url, config.database.ssl),
    source,
    coin: new CoinService(config.coin, encryption),
    notifier: createNotifier(source, config.notify)
  };
}

export function createParser(config: BotConfig): ParserService {
  return new ParserService({
    botUsername: config.reddit.username,
    units: config.coin.units,
    decimals: config.coin.decimals,
    addressPattern: config.coin.addressPattern,
    keywords: config.keywords,
    commands: config.commands
  });
}

export function createExecutor(ctx: Pick<BotContext, 'config' | 'store' | 'coin'>): ExecutorService {
  return new ExecutorService({ config: ctx.config, store: ctx.store, coin: ctx.coin });
}
