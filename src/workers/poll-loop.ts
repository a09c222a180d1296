import { BotConfig } from '../../config/bot.config';
import { Action } from '../models/action';
import { LedgerStore } from '../models/ledger';
import { MessageSource, OperatorNotifier } from '../models/services';
import { InboxMessage } from '../models/types';
import { sameUser } from '../models/user';
import { ExecutorService } from '../services/executor.service';
import { ParserService } from '../services/parser.service';
import {
  DuplicateMessageError,
  UpstreamError,
  describeError,
  isLedgerError,
  isTransientError
} from '../services/errors';
import { didNotUnderstand, expiredTipNotice, pendingTipNotice, resultReply } from '../services/templates';

export type LoopState = 'idle' | 'expiring' | 'fetching' | 'processing' | 'sleeping' | 'failed';

export type ItemOutcome =
  | 'no_author'
  | 'duplicate'
  | 'own_message'
  | 'banned'
  | 'unmatched'
  | 'executed'
  | 'aborted';

export interface IterationSummary {
  fetched: number;
  outcomes: ItemOutcome[];
  expired: number;
  settled: number;
}

export interface PollLoopDeps {
  config: BotConfig;
  store: LedgerStore;
  source: MessageSource;
  notifier: OperatorNotifier;
  parser: ParserService;
  executor: ExecutorService;
  sleep?: (ms: number) => Promise<void>;
}

// Reddit's subjects for replies the bot did not ask for
const NO_SORRY_SUBJECTS = ['post reply', 'comment reply'];

/**
 * expire → fetch → process → sleep, one batch at a time, items strictly in
 * delivery order. The expire step also books withdrawals that were sent but
 * never debited.
 */
export class PollLoop {
  private deps: PollLoopDeps;
  private currentState: LoopState = 'idle';
  private stopped = false;
  private wake: (() => void) | null = null;

  constructor(deps: PollLoopDeps) {
    this.deps = deps;
  }

  get state(): LoopState {
    return this.currentState;
  }

  /**
   * Poll until stopped or a fatal error.
   * @returns Process exit status: 0 after stop(), 1 after a failure
   */
  async run(): Promise<number> {
    const { config, notifier } = this.deps;
    console.log(`🚀 Poll loop started for /u/${config.reddit.username}`);

    while (!this.stopped) {
      try {
        await this.runIteration();
      } catch (error) {
        if (isTransientError(error)) {
          console.warn(`⚠️ Upstream unavailable, batch ended early: ${error.message}`);
        } else {
          this.currentState = 'failed';
          console.error('❌ Poll loop failed:', error instanceof Error ? error.stack : error);
          await this.alert(error);
          return 1;
        }
      }

      if (this.stopped) break;

      this.currentState = 'sleeping';
      await this.sleep(config.loop.sleepSeconds * 1000);
      this.currentState = 'idle';
    }

    console.log('🛑 Poll loop stopped');
    return 0;
  }

  /**
   * Ask the loop to end after the current step.
   */
  stop(): void {
    this.stopped = true;
    if (this.wake) {
      this.wake();
    }
  }

  async runIteration(): Promise<IterationSummary> {
    const { config, source } = this.deps;

    this.currentState = 'expiring';
    const expired = await this.expire();
    const settled = await this.settle();

    this.currentState = 'fetching';
    const messages = await source.fetchUnread(config.reddit.batchLimit);
    if (messages.length > 0) {
      console.log(`📨 Fetched ${messages.length} inbox item(s)`);
    }

    this.currentState = 'processing';
    const outcomes: ItemOutcome[] = [];
    for (const message of messages) {
      if (this.stopped) break;
      // A TransientUpstreamError from here ends the batch
      outcomes.push(await this.processItem(message));
    }

    this.currentState = 'idle';
    return { fetched: messages.length, outcomes, expired, settled };
  }

  async processItem(message: InboxMessage): Promise<ItemOutcome> {
    const { config, store, parser, executor } = this.deps;

    if (!message.author) {
      await this.markRead(message);
      return 'no_author';
    }

    try {
      if (await store.actionExists(message.id)) {
        console.log(`↩️ Already handled ${message.id}`);
        await this.markRead(message);
        return 'duplicate';
      }

      if (sameUser(message.author, config.reddit.username)) {
        await this.markRead(message);
        return 'own_message';
      }

      if (config.reddit.bannedUsers.includes(message.author.toLowerCase())) {
        console.log(`🚫 Ignoring banned user /u/${message.author}`);
        await this.markRead(message);
        return 'banned';
      }

      const command = parser.parse(message);
      if (!command) {
        if (config.reddit.sendSorry && !NO_SORRY_SUBJECTS.includes(message.subject.trim().toLowerCase())) {
          await this.reply(message, didNotUnderstand(config.reddit.username));
        }
        await this.markRead(message);
        return 'unmatched';
      }

      console.log(`\n📨 ${command.type} from /u/${message.author}: "${message.body.slice(0, 120)}"`);

      const result = await executor.execute(command, message);

      if (result.status === 'pending' && result.action.toUser) {
        const notice = pendingTipNotice(config.coin, result.action, config.reddit.username, config.loop.expirePendingHours);
        await this.sendMessage(result.action.toUser, notice.subject, notice.body);
      }

      await this.reply(message, resultReply(config.coin, command, result, config.reddit.username));
      await this.markRead(message);
      console.log(`✅ ${command.type} ${result.status} (action ${result.action.id})`);
      return 'executed';

    } catch (error) {
      if (error instanceof DuplicateMessageError) {
        await this.markRead(message);
        return 'duplicate';
      }
      if (isLedgerError(error)) {
        // left unread so the next poll retries it
        console.error(`❌ Ledger error on ${message.id}: ${error.message}`);
        return 'aborted';
      }
      throw error;
    }
  }

  private async expire(): Promise<number> {
    const { config, executor } = this.deps;

    let expired: Action[];
    try {
      expired = await executor.expirePending();
    } catch (error) {
      console.error(`❌ Expiry sweep failed: ${describeError(error)}`);
      return 0;
    }

    // The tips are already expired; a lost notice is not retried
    for (const tip of expired) {
      const notice = expiredTipNotice(config.coin, tip);
      try {
        await this.sendMessage(tip.fromUser, notice.subject, notice.body);
      } catch (error) {
        console.error(`❌ Expiry notice to /u/${tip.fromUser} failed: ${describeError(error)}`);
      }
    }
    return expired.length;
  }

  private async settle(): Promise<number> {
    try {
      return (await this.deps.executor.settleWithdrawals()).length;
    } catch (error) {
      console.error(`❌ Withdrawal settlement failed: ${describeError(error)}`);
      return 0;
    }
  }

  // Replies and notices are best effort unless Reddit is unreachable

  private async reply(message: InboxMessage, body: string): Promise<void> {
    await this.tolerate(() => this.deps.source.reply(message, body), `reply to ${message.id}`);
  }

  private async sendMessage(username: string, subject: string, body: string): Promise<void> {
    await this.tolerate(() => this.deps.source.sendMessage(username, subject, body), `message to /u/${username}`);
  }

  private async markRead(message: InboxMessage): Promise<void> {
    await this.tolerate(() => this.deps.source.markRead(message), `mark ${message.id} read`);
  }

  private async tolerate(call: () => Promise<void>, context: string): Promise<void> {
    try {
      await call();
    } catch (error) {
      if (error instanceof UpstreamError) {
        console.warn(`⚠️ ${context} failed: ${error.message}`);
        return;
      }
      throw error;
    }
  }

  private async alert(error: unknown): Promise<void> {
    const detail = error instanceof Error ? error.stack ?? error.message : String(error);
    try {
      await this.deps.notifier.notify(`Tip bot /u/${this.deps.config.reddit.username} stopped`, detail);
    } catch (notifyError) {
      console.error('❌ Operator notification failed:', notifyError);
    }
  }

  private sleep(ms: number): Promise<void> {
    if (this.deps.sleep) {
      return this.deps.sleep(ms);
    }

    return new Promise(resolve => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }
}
