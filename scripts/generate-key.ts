import { EncryptionService } from '../src/services/encryption.service';

/**
 * Generate a master encryption key for the hot wallet's AES-256-GCM envelope.
 * Run once; the key goes into MASTER_ENCRYPTION_KEY.
 */

const masterKey = EncryptionService.generateMasterKey();

console.log('\n🔐 Master Encryption Key Generated\n');
console.log('━'.repeat(80));
console.log('\nYour master encryption key (keep this SECRET):');
console.log('\n' + masterKey + '\n');
console.log('━'.repeat(80));
console.log('\n⚠️  IMPORTANT:');
console.log('1. Add this to your .env file as MASTER_ENCRYPTION_KEY');
console.log('2. Run setup-hot-wallet next to encrypt the wallet key under it');
console.log('3. If you lose this key, the encrypted wallet key is UNRECOVERABLE');
console.log('\nExample .env entry:');
console.log(`MASTER_ENCRYPTION_KEY=${masterKey}\n`);
