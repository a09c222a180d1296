import { BotConfig } from '../../config/bot.config';
import { Action, ExecutionResult, DeclineReason, NewAction } from '../models/action';
import { LedgerSession, LedgerStore } from '../models/ledger';
import { CoinBackend } from '../models/services';
import { InboxMessage, ParsedCommand } from '../models/types';
import { User, sameUser } from '../models/user';
import { formatAmount, sumAmounts } from '../utils/amount';
import {
  DuplicateMessageError,
  InsufficientBalanceError,
  InvalidStateTransitionError,
  describeError
} from './errors';

export interface ExecutorDeps {
  config: BotConfig;
  store: LedgerStore;
  coin: CoinBackend;
  now?: () => Date;
}

type WithdrawPlan =
  | { kind: 'done'; result: ExecutionResult }
  | { kind: 'send'; action: Action; amount: bigint };

/**
 * Validates parsed commands and applies them to the ledger. Every execution
 * records exactly one action for its source message, and every balance change
 * shares a transaction with the state transition it belongs to.
 */
export class ExecutorService {
  private config: BotConfig;
  private store: LedgerStore;
  private coin: CoinBackend;
  private now: () => Date;

  constructor(deps: ExecutorDeps) {
    this.config = deps.config;
    this.store = deps.store;
    this.coin = deps.coin;
    this.now = deps.now ?? (() => new Date());
  }

  async execute(command: ParsedCommand, message: InboxMessage): Promise<ExecutionResult> {
    switch (command.type) {
      case 'register':
      case 'accept':
        return this.register(command.type, message);
      case 'decline':
        return this.declineIncoming(message);
      case 'info':
        return this.info(message);
      case 'tip':
        return this.tip(command, message);
      case 'withdraw':
        return this.withdraw(command, message);
    }
  }

  // ========== REGISTER / ACCEPT ==========

  private async register(type: 'register' | 'accept', message: InboxMessage): Promise<ExecutionResult> {
    const author = authorOf(message);

    return this.store.transaction(async tx => {
      const existing = await tx.getUser(author);
      const user = existing ?? await tx.createUser(author);
      if (!existing) {
        console.log(`👤 Registered /u/${user.username}`);
      }

      const action = await tx.createAction({ ...this.base(message), type, state: 'completed' });
      const claimed = await this.claimPending(tx, user.username);
      const current = await tx.getUser(user.username);

      return {
        status: 'completed',
        action,
        alreadyRegistered: existing !== null,
        claimed,
        balance: current ? current.balance : user.balance
      };
    });
  }

  /**
   * Complete pending tips addressed to a newly registered user, oldest first.
   * A tip whose sender no longer has the funds is declined instead.
   */
  private async claimPending(tx: LedgerSession, username: string): Promise<Action[]> {
    const pending = await tx.listActions({ type: 'tip', state: 'pending', toUser: username });
    const claimed: Action[] = [];

    for (const tip of pending) {
      const amount = tip.amount ?? 0n;
      const sender = await tx.getUser(tip.fromUser);

      if (!sender || sender.balance < amount || amount <= 0n) {
        await tx.transitionAction(tip.id, 'declined');
        console.warn(`⚠️ Pending tip ${tip.id} from /u/${tip.fromUser} declined: sender cannot cover it`);
        continue;
      }

      await tx.adjustBalance(sender.username, -amount);
      await tx.adjustBalance(username, amount);
      claimed.push(await tx.transitionAction(tip.id, 'completed'));
    }

    return claimed;
  }

  // ========== DECLINE ==========

  private async declineIncoming(message: InboxMessage): Promise<ExecutionResult> {
    const author = authorOf(message);

    return this.store.transaction(async tx => {
      const pending = await tx.listActions({ type: 'tip', state: 'pending', toUser: author });
      const declinedTips: Action[] = [];
      for (const tip of pending) {
        declinedTips.push(await tx.transitionAction(tip.id, 'declined'));
      }

      const action = await tx.createAction({ ...this.base(message), type: 'decline', state: 'completed' });
      return { status: 'completed', action, declinedTips };
    });
  }

  // ========== INFO ==========

  private async info(message: InboxMessage): Promise<ExecutionResult> {
    const author = authorOf(message);

    return this.store.transaction(async tx => {
      const user = await tx.getUser(author);
      if (!user) {
        const action = await tx.createAction({ ...this.base(message), type: 'info', state: 'declined' });
        return { status: 'declined', action, reason: 'not_registered' };
      }

      const pendingOutgoing = await tx.sumPendingTips(user.username);
      const action = await tx.createAction({ ...this.base(message), type: 'info', state: 'completed' });
      return { status: 'completed', action, balance: user.balance, pendingOutgoing };
    });
  }

  // ========== TIP ==========

  private async tip(
    command: Extract<ParsedCommand, { type: 'tip' }>,
    message: InboxMessage
  ): Promise<ExecutionResult> {
    const author = authorOf(message);
    const recipient = normalizeRecipient(command.recipient);

    return this.store.transaction(async tx => {
      const sender = await tx.getUser(author);
      const available = sender ? await this.available(tx, sender) : 0n;
      const amount = command.amount.kind === 'exact' ? command.amount.value : available;

      const action = await tx.createAction({
        ...this.base(message),
        type: 'tip',
        state: 'pending',
        toUser: recipient,
        amount: amount > 0n ? amount : null
      });

      const decline = async (reason: DeclineReason): Promise<ExecutionResult> => ({
        status: 'declined',
        action: await tx.transitionAction(action.id, 'declined'),
        reason
      });

      if (!sender) return decline('not_registered');
      if (sameUser(sender.username, recipient)) return decline('self_tip');
      if (amount <= 0n || amount > available) return decline('insufficient_balance');
      if (amount < this.config.coin.minTip) return decline('below_minimum');

      let receiver = await tx.getUser(recipient);
      if (!receiver && this.config.loop.autoRegisterRecipients) {
        receiver = await tx.createUser(recipient);
        console.log(`👤 Auto-registered /u/${receiver.username} on first tip`);
      }

      if (!receiver) {
        console.log(`⏳ Tip ${action.id} from /u/${sender.username} waits for /u/${recipient} to register`);
        return { status: 'pending', action };
      }

      await tx.adjustBalance(sender.username, -amount);
      const credited = await tx.adjustBalance(receiver.username, amount);
      const completed = await tx.transitionAction(action.id, 'completed');

      console.log(`💸 /u/${sender.username} tipped /u/${credited.username} ${this.describe(amount)}`);
      return { status: 'completed', action: completed };
    });
  }

  // ========== WITHDRAW ==========

  private async withdraw(
    command: Extract<ParsedCommand, { type: 'withdraw' }>,
    message: InboxMessage
  ): Promise<ExecutionResult> {
    const author = authorOf(message);
    const fee = this.config.coin.withdrawFee;
    const addressValid = await this.coin.validateAddress(command.address);

    const plan = await this.store.transaction(async (tx): Promise<WithdrawPlan> => {
      const sender = await tx.getUser(author);
      const available = sender ? await this.available(tx, sender) : 0n;
      const amount = command.amount.kind === 'exact' ? command.amount.value : available - fee;

      const action = await tx.createAction({
        ...this.base(message),
        type: 'withdraw',
        state: 'pending',
        address: command.address,
        amount: amount > 0n ? amount : null
      });

      const decline = async (reason: DeclineReason): Promise<WithdrawPlan> => ({
        kind: 'done',
        result: { status: 'declined', action: await tx.transitionAction(action.id, 'declined'), reason }
      });

      if (!sender) return decline('not_registered');
      if (!addressValid) return decline('invalid_address');
      if (amount <= 0n || amount + fee > available) return decline('insufficient_balance');
      if (amount < this.config.coin.minWithdraw) return decline('below_minimum');

      return { kind: 'send', action, amount };
    });

    if (plan.kind === 'done') {
      return plan.result;
    }

    // The send happens outside any transaction; the ledger is debited only
    // once the coin backend returned a txid
    let txid: string;
    try {
      txid = await this.coin.send(command.address, plan.amount);
    } catch (error) {
      console.error(`❌ Withdrawal ${plan.action.id} for /u/${author} failed: ${describeError(error)}`);
      const declined = await this.store.transitionAction(plan.action.id, 'declined');
      return { status: 'declined', action: declined, reason: 'send_failed' };
    }

    // With the txid on record, settleWithdrawals finishes the debit if the
    // transaction below fails
    const sent = await this.store.setTxid(plan.action.id, txid);

    return this.store.transaction(async tx => {
      const { action, user } = await this.debitWithdrawal(tx, sent, txid);
      return { status: 'completed', action, balance: user.balance };
    });
  }

  /**
   * Debit withdrawals that went out on chain but were never booked, oldest first.
   * @returns The withdrawals moved to completed
   */
  async settleWithdrawals(): Promise<Action[]> {
    const pending = await this.store.listActions({ type: 'withdraw', state: 'pending' });
    const settled: Action[] = [];

    for (const withdrawal of pending) {
      const txid = withdrawal.txid;
      if (txid === null) continue;

      try {
        settled.push(await this.store.transaction(async tx => (await this.debitWithdrawal(tx, withdrawal, txid)).action));
      } catch (error) {
        if (!(error instanceof InvalidStateTransitionError || error instanceof InsufficientBalanceError)) throw error;
        console.warn(`⚠️ Could not settle withdrawal ${withdrawal.id}: ${error.message}`);
      }
    }

    if (settled.length > 0) {
      console.log(`🏧 Settled ${settled.length} sent withdrawal(s)`);
    }
    return settled;
  }

  private async debitWithdrawal(tx: LedgerSession, withdrawal: Action, txid: string): Promise<{ action: Action; user: User }> {
    const amount = withdrawal.amount ?? 0n;
    const user = await tx.adjustBalance(withdrawal.fromUser, -(amount + this.config.coin.withdrawFee));
    const action = await tx.transitionAction(withdrawal.id, 'completed', txid);

    console.log(`🏧 /u/${user.username} withdrew ${this.describe(amount)} to ${withdrawal.address} (${txid})`);
    return { action, user };
  }

  /**
   * Balance not yet spoken for. Pending tips and pending withdrawals (with
   * their fee) are reserved; balances only move when an action completes.
   */
  private async available(tx: LedgerSession, user: User): Promise<bigint> {
    const pendingTips = await tx.sumPendingTips(user.username);
    const withdrawals = await tx.listActions({ type: 'withdraw', state: 'pending', fromUser: user.username });
    const reserved = sumAmounts(withdrawals.map(withdrawal => (withdrawal.amount ?? 0n) + this.config.coin.withdrawFee));
    return user.balance - pendingTips - reserved;
  }

  // ========== DEPOSITS ==========

  /**
   * Credit an on-chain deposit. Keyed by txid so a transaction is credited once.
   */
  async recordDeposit(username: string, amount: bigint, txid: string): Promise<ExecutionResult> {
    const sourceMessageId = `deposit:${txid}`;

    return this.store.transaction(async tx => {
      if (await tx.actionExists(sourceMessageId)) {
        throw new DuplicateMessageError(sourceMessageId);
      }

      const name = normalizeRecipient(username);
      const user = (await tx.getUser(name)) ?? await tx.createUser(name);
      const action = await tx.createAction({
        type: 'deposit',
        state: 'pending',
        sourceMessageId,
        fromUser: user.username,
        toUser: user.username,
        amount,
        txid,
        createdAt: this.now()
      });

      const credited = await tx.adjustBalance(user.username, amount);
      const completed = await tx.transitionAction(action.id, 'completed');
      console.log(`💰 Credited /u/${credited.username} ${this.describe(amount)} (${txid})`);
      return { status: 'completed', action: completed, balance: credited.balance };
    });
  }

  // ========== EXPIRY ==========

  /**
   * Expire pending tips older than the configured TTL. Balances are untouched.
   * @returns The tips that moved to expired
   */
  async expirePending(now: Date = this.now()): Promise<Action[]> {
    const cutoff = new Date(now.getTime() - this.config.loop.expirePendingHours * 3600 * 1000);
    const stale = await this.store.listActions({ type: 'tip', state: 'pending', createdBefore: cutoff });
    const expired: Action[] = [];

    for (const tip of stale) {
      try {
        expired.push(await this.store.transitionAction(tip.id, 'expired'));
      } catch (error) {
        if (!(error instanceof InvalidStateTransitionError)) throw error;
        console.warn(`⚠️ Could not expire tip ${tip.id}: ${error.message}`);
      }
    }

    if (expired.length > 0) {
      console.log(`⌛ Expired ${expired.length} pending tip(s)`);
    }
    return expired;
  }

  private base(message: InboxMessage): Pick<NewAction, 'sourceMessageId' | 'fromUser' | 'subreddit' | 'permalink' | 'createdAt'> {
    return {
      sourceMessageId: message.id,
      fromUser: authorOf(message),
      subreddit: message.subreddit ?? null,
      permalink: message.permalink ?? null,
      createdAt: this.now()
    };
  }

  private describe(amount: bigint): string {
    return `${formatAmount(amount, this.config.coin.decimals)} ${this.config.coin.name}`;
  }
}

function authorOf(message: InboxMessage): string {
  if (!message.author) {
    throw new Error(`Message ${message.id} has no author`);
  }
  return message.author;
}

function normalizeRecipient(recipient: string): string {
  // keep the user's casing, drop a /u/ prefix
  return recipient.trim().replace(/^\/?u\//i, '');
}

