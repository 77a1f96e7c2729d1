import crypto from 'crypto';
import { DecryptionError } from '../services/integrations/integration.errors';

interface EncryptedData {
  v: number;
  encrypted: string;
  iv: string;
  authTag: string;
}

const FORMAT_VERSION = 1;
const IV_BYTES = 12;
const AUTH_TAG_BYTES = 16;
const HEX = /^[0-9a-f]*$/i;

function isEncryptedData(value: unknown): value is EncryptedData {
  if (!value || typeof value !== 'object') return false;
  return (
    'v' in value && value.v === FORMAT_VERSION &&
    'encrypted' in value && typeof value.encrypted === 'string' &&
    'iv' in value && typeof value.iv === 'string' &&
    'authTag' in value && typeof value.authTag === 'string'
  );
}

/**
 * Token cipher for OAuth tokens at rest, using AES-256-GCM.
 * Ciphertext is a JSON string: {v, iv, authTag, encrypted}.
 */
export class TokenCipher {
  private algorithm = 'aes-256-gcm' as const;
  private key: Buffer;

  constructor(secret: string) {
    if (!secret) {
      throw new Error('ENCRYPTION_KEY is not configured');
    }

    // Derive 32-byte key from the configured secret
    const salt = 'assistme-integration-tokens';
    this.key = crypto.scryptSync(secret, salt, 32);
  }

  encrypt(plaintext: string): string {
    const iv = crypto.randomBytes(IV_BYTES);
    const cipher = crypto.createCipheriv(this.algorithm, this.key, iv);

    let encrypted = cipher.update(plaintext, 'utf8', 'hex');
    encrypted += cipher.final('hex');

    const data: EncryptedData = {
      v: FORMAT_VERSION,
      iv: iv.toString('hex'),
      authTag: cipher.getAuthTag().toString('hex'),
      encrypted,
    };
    return JSON.stringify(data);
  }

  /**
   * Verifies the auth tag before returning plaintext. Any malformed, truncated,
   * tampered or foreign-key ciphertext fails with DecryptionError.
   */
  decrypt(ciphertext: string): string {
    let parsed: unknown;
    try {
      parsed = JSON.parse(ciphertext);
    } catch {
      throw new DecryptionError('ciphertext is not valid JSON');
    }

    if (!isEncryptedData(parsed)) {
      throw new DecryptionError('ciphertext is missing fields');
    }

    const { iv, authTag, encrypted } = parsed;
    if (
      !HEX.test(iv) || iv.length !== IV_BYTES * 2 ||
      !HEX.test(authTag) || authTag.length !== AUTH_TAG_BYTES * 2 ||
      !HEX.test(encrypted) || encrypted.length % 2 !== 0
    ) {
      throw new DecryptionError('ciphertext is malformed');
    }

    try {
      const decipher = crypto.createDecipheriv(this.algorithm, this.key, Buffer.from(iv, 'hex'));
      decipher.setAuthTag(Buffer.from(authTag, 'hex'));

      // final() throws if the auth tag doesn't match
      let decrypted = decipher.update(encrypted, 'hex', 'utf8');
      decrypted += decipher.final('utf8');
      return decrypted;
    } catch {
      throw new DecryptionError('authentication failed');
    }
  }
}
