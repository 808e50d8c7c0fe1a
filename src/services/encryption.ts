import { createCipheriv, createDecipheriv, createHash, randomBytes } from 'node:crypto';
import { KeyMismatchError } from '../shared/errors.js';

export interface CredentialCipher {
  encrypt(plaintext: string): string;
  decrypt(ciphertext: string): string;
}

const VERSION = 'v1';
const IV_BYTES = 12;

const deriveKey = (secret: string) => createHash('sha256').update(secret, 'utf8').digest();

const keyIdFor = (key: Buffer) => createHash('sha256').update(key).digest('hex').slice(0, 8);

/**
 * AES-256-GCM envelope for refresh credentials at rest.
 * Format: `v1.<keyId>.<iv>.<tag>.<payload>`, binary parts base64url.
 */
export const createCredentialCipher = (secret: string): CredentialCipher => {
  if (!secret) {
    throw new Error('credential encryption secret is empty');
  }
  const key = deriveKey(secret);
  const keyId = keyIdFor(key);

  return {
    encrypt: (plaintext) => {
      const iv = randomBytes(IV_BYTES);
      const cipher = createCipheriv('aes-256-gcm', key, iv);
      const payload = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
      const tag = cipher.getAuthTag();
      return [
        VERSION,
        keyId,
        iv.toString('base64url'),
        tag.toString('base64url'),
        payload.toString('base64url'),
      ].join('.');
    },
    decrypt: (ciphertext) => {
      const parts = ciphertext.split('.');
      if (parts.length !== 5 || parts[0] !== VERSION) {
        throw new KeyMismatchError('credential ciphertext has an unknown format');
      }
      const [, storedKeyId, ivPart, tagPart, payloadPart] = parts;
      if (storedKeyId !== keyId) {
        throw new KeyMismatchError();
      }
      try {
        const decipher = createDecipheriv('aes-256-gcm', key, Buffer.from(ivPart, 'base64url'));
        decipher.setAuthTag(Buffer.from(tagPart, 'base64url'));
        return Buffer.concat([
          decipher.update(Buffer.from(payloadPart, 'base64url')),
          decipher.final(),
        ]).toString('utf8');
      } catch (error) {
        throw new KeyMismatchError(`credential ciphertext failed authentication: ${String(error)}`);
      }
    },
  };
};
