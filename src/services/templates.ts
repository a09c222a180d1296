import { CoinConfig } from '../../config/bot.config';
import { Action, DeclineReason, ExecutionResult } from '../models/action';
import { ParsedCommand } from '../models/types';
import { formatAmount, sumAmounts } from '../utils/amount';

// Reply and private-message texts. Reddit renders these as Markdown.

export interface MessageText {
  subject: string;
  body: string;
}

export function coinAmount(coin: CoinConfig, amount: bigint | null): string {
  return `${formatAmount(amount ?? 0n, coin.decimals)} ${coin.name}`;
}

export function resultReply(coin: CoinConfig, command: ParsedCommand, result: ExecutionResult, botUsername: string): string {
  if (result.status === 'declined') {
    return declinedReply(coin, result.reason, result.action, botUsername);
  }

  const { action } = result;

  if (result.status === 'pending') {
    return `⏳ Tip of ${coinAmount(coin, action.amount)} to /u/${action.toUser} is waiting for them to register. ` +
      `It expires if they don't accept it in time.`;
  }

  switch (command.type) {
    case 'register':
    case 'accept': {
      const head = result.alreadyRegistered ? '✅ Already registered!' : '✅ Registered!';
      const claimed = result.claimed ?? [];
      const claimedLine = claimed.length > 0
        ? ` Received ${claimed.length} pending tip(s) worth ${coinAmount(coin, sumAmounts(claimed.map(tip => tip.amount ?? 0n)))}.`
        : '';
      return `${head}${claimedLine} Balance: ${coinAmount(coin, result.balance ?? 0n)}`;
    }

    case 'decline': {
      const count = result.declinedTips?.length ?? 0;
      return count > 0 ? `✅ Declined ${count} pending tip(s).` : 'No pending tips to decline.';
    }

    case 'info': {
      let reply = `💰 Balance: ${coinAmount(coin, result.balance ?? 0n)}`;
      if (result.pendingOutgoing && result.pendingOutgoing > 0n) {
        reply += ` | Pending tips: ${coinAmount(coin, result.pendingOutgoing)}`;
      }
      return reply;
    }

    case 'tip':
      return `✅ /u/${action.fromUser} tipped /u/${action.toUser} ${coinAmount(coin, action.amount)}`;

    case 'withdraw':
      return `✅ Sent ${coinAmount(coin, action.amount)} to ${action.address} ` +
        `([transaction](${coin.explorer.tx}${action.txid})). Balance: ${coinAmount(coin, result.balance ?? 0n)}`;
  }
}

export function declinedReply(coin: CoinConfig, reason: DeclineReason, action: Action, botUsername: string): string {
  switch (reason) {
    case 'not_registered':
      return `❌ Not registered. Send /u/${botUsername} a message saying "register".`;
    case 'self_tip':
      return `❌ You can't tip yourself.`;
    case 'below_minimum': {
      const minimum = action.type === 'withdraw' ? coin.minWithdraw : coin.minTip;
      return `❌ Minimum ${action.type} is ${coinAmount(coin, minimum)}`;
    }
    case 'insufficient_balance':
      return action.type === 'withdraw'
        ? `❌ Insufficient balance. Withdrawals cost a ${coinAmount(coin, coin.withdrawFee)} network fee.`
        : `❌ Insufficient balance for ${coinAmount(coin, action.amount)}`;
    case 'invalid_address':
      return `❌ ${action.address ?? 'That'} is not a valid ${coin.name} address.`;
    case 'send_failed':
      return `❌ Withdrawal failed. Your balance was not changed; try again later.`;
  }
}

export function didNotUnderstand(botUsername: string): string {
  return `Sorry, I didn't understand that. Send /u/${botUsername} a message saying "info" or "register".`;
}

export function pendingTipNotice(coin: CoinConfig, action: Action, botUsername: string, expireHours: number): MessageText {
  return {
    subject: `/u/${action.fromUser} sent you a tip`,
    body: `/u/${action.fromUser} tipped you ${coinAmount(coin, action.amount)}. ` +
      `Reply "accept" (or send /u/${botUsername} "register") within ${expireHours} hours to claim it, or "decline" to refuse.`
  };
}

export function expiredTipNotice(coin: CoinConfig, action: Action): MessageText {
  return {
    subject: 'Your tip expired',
    body: `Your tip of ${coinAmount(coin, action.amount)} to /u/${action.toUser} expired unclaimed. ` +
      `Nothing was deducted from your balance.`
  };
}
