import { ethers } from 'ethers';
import { CoinConfig } from '../../config/bot.config';
import { CoinBackend } from '../models/services';
import { formatAmount, toBigNumber } from '../utils/amount';
import { EncryptionService } from './encryption.service';
import { ConfigError, TransientUpstreamError, describeError, errorCode } from './errors';

// ethers v5 error codes that mean "try again later"
const TRANSIENT_ETHERS_CODES = ['NETWORK_ERROR', 'TIMEOUT', 'SERVER_ERROR'];

/**
 * Hot wallet on an EVM chain, reached over JSON-RPC.
 */
export class CoinService implements CoinBackend {
  private provider: ethers.providers.JsonRpcProvider;
  private wallet: ethers.Wallet;
  private config: CoinConfig;

  constructor(config: CoinConfig, encryption: EncryptionService) {
    if (!config.encryptedWalletKey) {
      throw new ConfigError('COIN_WALLET_KEY_ENCRYPTED environment variable not set');
    }

    this.config = config;
    this.provider = new ethers.providers.JsonRpcProvider(config.rpcUrl);
    this.wallet = new ethers.Wallet(encryption.decrypt(config.encryptedWalletKey), this.provider);
  }

  /**
   * Hot wallet balance in base units
   */
  async getBalance(): Promise<bigint> {
    try {
      const balance = await this.provider.getBalance(this.wallet.address);
      return balance.toBigInt();
    } catch (error) {
      throw toCoinError(error, 'getBalance');
    }
  }

  /**
   * Send coins from the hot wallet and wait for the configured confirmations.
   * @returns Transaction hash
   */
  async send(address: string, amount: bigint): Promise<string> {
    let tx: ethers.providers.TransactionResponse;
    try {
      console.log(`Sending ${formatAmount(amount, this.config.decimals)} ${this.config.name} to ${address}...`);

      tx = await this.wallet.sendTransaction({
        to: ethers.utils.getAddress(address),
        value: toBigNumber(amount)
      });
      console.log(`Transaction sent: ${tx.hash}`);

    } catch (error) {
      console.error('Error sending coins:', error);
      throw toCoinError(error, 'send');
    }

    // Once broadcast the coins are gone; a slow confirmation still returns the hash
    try {
      await tx.wait(this.config.confirmations);
      console.log(`✅ Transfer confirmed: ${tx.hash}`);
    } catch (error) {
      console.warn(`⚠️ ${tx.hash} not confirmed yet: ${describeError(error)}`);
    }
    return tx.hash;
  }

  async validateAddress(address: string): Promise<boolean> {
    return ethers.utils.isAddress(address);
  }
}

function toCoinError(error: unknown, operation: string): Error {
  const code = errorCode(error);
  if (code && TRANSIENT_ETHERS_CODES.includes(code)) {
    return new TransientUpstreamError(`Coin backend ${operation}: ${code}`, undefined, error);
  }
  return error instanceof Error ? error : new Error(`Coin backend ${operation} failed: ${String(error)}`);
}
