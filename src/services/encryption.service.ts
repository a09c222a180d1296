import crypto from 'crypto';
import { ConfigError } from './errors';

interface EncryptedData {
  iv: string;
  encrypted: string;
  tag: string;
}

/**
 * AES-256-GCM envelope for the hot wallet key.
 */
export class EncryptionService {
  private masterKey: Buffer;
  private algorithm = 'aes-256-gcm';

  constructor(masterKeyHex: string | undefined) {
    if (!masterKeyHex) {
      throw new ConfigError('MASTER_ENCRYPTION_KEY environment variable not set');
    }

    // 32 bytes (256 bits)
    if (!/^[0-9a-fA-F]{64}$/.test(masterKeyHex)) {
      throw new ConfigError('MASTER_ENCRYPTION_KEY must be 32 bytes (64 hex characters)');
    }

    this.masterKey = Buffer.from(masterKeyHex, 'hex');
  }

  /**
   * @returns iv, ciphertext and auth tag as a JSON string
   */
  encrypt(plaintext: string): string {
    const iv = crypto.randomBytes(12);
    const cipher = crypto.createCipheriv(this.algorithm, this.masterKey, iv) as crypto.CipherGCM;

    let encrypted = cipher.update(plaintext, 'utf8', 'base64');
    encrypted += cipher.final('base64');

    const encryptedData: EncryptedData = {
      iv: iv.toString('base64'),
      encrypted,
      tag: cipher.getAuthTag().toString('base64')
    };

    return JSON.stringify(encryptedData);
  }

  decrypt(ciphertext: string): string {
    try {
      const encryptedData = parseEnvelope(ciphertext);

      const iv = Buffer.from(encryptedData.iv, 'base64');
      const tag = Buffer.from(encryptedData.tag, 'base64');

      const decipher = crypto.createDecipheriv(this.algorithm, this.masterKey, iv) as crypto.DecipherGCM;
      decipher.setAuthTag(tag);

      let decrypted = decipher.update(encryptedData.encrypted, 'base64', 'utf8');
      decrypted += decipher.final('utf8');

      return decrypted;

    } catch (error) {
      throw new Error(`Decryption failed: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  }

  static generateMasterKey(): string {
    return crypto.randomBytes(32).toString('hex');
  }
}

function parseEnvelope(ciphertext: string): EncryptedData {
  const parsed: unknown = JSON.parse(ciphertext);
  if (
    typeof parsed === 'object' && parsed !== null &&
    'iv' in parsed && typeof parsed.iv === 'string' &&
    'encrypted' in parsed && typeof parsed.encrypted === 'string' &&
    'tag' in parsed && typeof parsed.tag === 'string'
  ) {
    return { iv: parsed.iv, encrypted: parsed.encrypted, tag: parsed.tag };
  }
  throw new Error('malformed envelope');
}
