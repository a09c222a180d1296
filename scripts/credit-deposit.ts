import { loadBotConfig } from '../config/bot.config';
import { ExecutorService } from '../src/services/executor.service';
import { CoinService } from '../src/services/coin.service';
import { DbService } from '../src/services/db.service';
import { EncryptionService } from '../src/services/encryption.service';
import { parseAmount, formatAmount } from '../src/utils/amount';

/**
 * Credit an on-chain deposit to a user.
 * Usage: credit-deposit <username> <amount> <txid>
 */
async function creditDeposit(args: string[]) {
  const [username, amountText, txid] = args;
  if (!username || !amountText || !txid) {
    throw new Error('Usage: credit-deposit <username> <amount> <txid>');
  }

  const config = loadBotConfig();
  const amount = parseAmount(amountText, config.coin.decimals);
  if (amount === null || amount <= 0n) {
    throw new Error(`Invalid amount: ${amountText}`);
  }

  const db = DbService.connect(config.database.url, config.database.ssl);
  try {
    const coin = new CoinService(config.coin, new EncryptionService(config.masterEncryptionKey));
    const executor = new ExecutorService({ config, store: db, coin });
    const result = await executor.recordDeposit(username, amount, txid);

    if (result.status === 'completed' && result.balance !== undefined) {
      console.log(`✅ /u/${result.action.fromUser} balance: ${formatAmount(result.balance, config.coin.decimals)} ${config.coin.name}`);
    }
  } finally {
    await db.close();
  }
}

creditDeposit(process.argv.slice(2))
  .then(() => process.exit(0))
  .catch(error => {
    console.error('❌ Deposit not credited:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
