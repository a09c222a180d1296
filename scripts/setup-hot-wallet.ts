import dotenv from 'dotenv';
import { ethers } from 'ethers';
import { EncryptionService } from '../src/services/encryption.service';

// Load environment
dotenv.config();

/**
 * Create (or import) the bot's hot wallet and print its key encrypted under
 * MASTER_ENCRYPTION_KEY, ready for COIN_WALLET_KEY_ENCRYPTED.
 */
async function setupHotWallet() {
  console.log('\n🔐 Hot Wallet Setup\n');
  console.log('━'.repeat(80));

  const encryption = new EncryptionService(process.env.MASTER_ENCRYPTION_KEY);

  if (process.env.COIN_WALLET_KEY_ENCRYPTED) {
    const wallet = new ethers.Wallet(encryption.decrypt(process.env.COIN_WALLET_KEY_ENCRYPTED));
    console.log('\n✅ Hot wallet already configured:');
    console.log(`\nAddress: ${wallet.address}`);
    console.log('\n⚠️  To create a new wallet, remove COIN_WALLET_KEY_ENCRYPTED from .env first.\n');
    return;
  }

  // Check if a plain key is provided to import
  const existingPrivateKey = process.env.HOT_WALLET_PRIVATE_KEY;
  let wallet: ethers.Wallet;

  if (existingPrivateKey) {
    console.log('\n📝 Importing wallet from HOT_WALLET_PRIVATE_KEY...\n');
    wallet = new ethers.Wallet(existingPrivateKey);
  } else {
    console.log('\n🎲 Generating new random wallet...\n');
    wallet = ethers.Wallet.createRandom();
  }

  const rpcUrl = process.env.COIN_RPC_URL || 'http://localhost:8545';
  const provider = new ethers.providers.JsonRpcProvider(rpcUrl);
  const network = await provider.getNetwork();

  console.log('✅ Hot wallet ready!\n');
  console.log('━'.repeat(80));
  console.log(`\nAddress: ${wallet.address}`);
  console.log(`Network: ${network.name} (Chain ID: ${network.chainId})`);
  console.log('\nAdd to .env:');
  console.log(`COIN_WALLET_KEY_ENCRYPTED='${encryption.encrypt(wallet.privateKey)}'`);
  console.log('\n━'.repeat(80));

  console.log('\n⚠️  IMPORTANT:');
  console.log('1. Deposits are sent to this address and credited with credit-deposit');
  console.log('2. Keep enough balance for withdrawal network fees');
  if (existingPrivateKey) {
    console.log('3. Remove HOT_WALLET_PRIVATE_KEY from .env now');
  }
  console.log('');
}

setupHotWallet()
  .then(() => {
    console.log('Done!\n');
    process.exit(0);
  })
  .catch(error => {
    console.error('❌ Error setting up hot wallet:', error);
    process.exit(1);
  });
