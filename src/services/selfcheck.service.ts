import { CoinConfig } from '../../config/bot.config';
import { Action } from '../models/action';
import { LedgerStore } from '../models/ledger';
import { CoinBackend } from '../models/services';
import { InvariantViolationError } from './errors';
import { coinAmount } from './templates';

export interface SelfCheckReport {
  walletBalance: bigint;
  ledgerBalance: bigint;
  pendingTips: bigint;
  unfinishedWithdrawals: Action[];
}

/**
 * Startup checks run before the first poll. Comparisons are exact; any
 * discrepancy throws InvariantViolationError.
 */
export async function runSelfChecks(
  store: LedgerStore,
  coin: CoinBackend,
  coinConfig: CoinConfig,
  botUsername: string
): Promise<SelfCheckReport> {
  console.log('🔍 Running self-checks...');

  const bot = await store.getUser(botUsername);
  if (!bot) {
    await store.createUser(botUsername);
    console.log(`👤 Registered bot account /u/${botUsername}`);
  }

  const walletBalance = await coin.getBalance();
  if (walletBalance < 0n) {
    throw new InvariantViolationError(`Hot wallet balance is negative: ${walletBalance}`);
  }

  const negative = (await store.listUsers()).filter(user => user.balance < 0n);
  if (negative.length > 0) {
    throw new InvariantViolationError(
      `Negative balances: ${negative.map(user => `${user.username}=${user.balance}`).join(', ')}`
    );
  }

  const pendingTips = await store.sumPendingTips();
  if (pendingTips > walletBalance) {
    throw new InvariantViolationError(
      `Pending tips (${coinAmount(coinConfig, pendingTips)}) exceed the hot wallet (${coinAmount(coinConfig, walletBalance)})`
    );
  }

  const ledgerBalance = await store.sumBalances();
  if (ledgerBalance > walletBalance) {
    throw new InvariantViolationError(
      `User balances (${coinAmount(coinConfig, ledgerBalance)}) exceed the hot wallet (${coinAmount(coinConfig, walletBalance)})`
    );
  }

  const unfinishedWithdrawals = await store.listActions({ type: 'withdraw', state: 'pending' });
  for (const withdrawal of unfinishedWithdrawals) {
    console.warn(
      `⚠️ Withdrawal ${withdrawal.id} by /u/${withdrawal.fromUser} of ${coinAmount(coinConfig, withdrawal.amount)} ` +
      `to ${withdrawal.address} is still pending; check the chain before resolving it`
    );
  }

  console.log(`✅ Self-checks passed. Wallet: ${coinAmount(coinConfig, walletBalance)} | Ledger: ${coinAmount(coinConfig, ledgerBalance)}`);
  return { walletBalance, ledgerBalance, pendingTips, unfinishedWithdrawals };
}
