import sodium from 'sodium-native';
import fs from 'fs';
import path from 'path';
import { DecryptionFailedError, errorMessage } from '../../lib/errors.js';

/**
 * Symmetric encryption for credential payloads (libsodium secretbox).
 * The key lives hex-encoded in `keyFile` and is created on first use.
 */
export class SecretStore {
  private key: Buffer;

  constructor(private readonly keyFile: string) {
    this.key = this.loadOrCreateKey();
  }

  private loadOrCreateKey(): Buffer {
    if (fs.existsSync(this.keyFile)) {
      const keyHex = fs.readFileSync(this.keyFile, 'utf-8').trim();
      const key = Buffer.from(keyHex, 'hex');
      if (key.length !== sodium.crypto_secretbox_KEYBYTES) {
        throw new Error(`Encryption key at ${this.keyFile} must be ${sodium.crypto_secretbox_KEYBYTES} bytes`);
      }
      return key;
    }

    const key = Buffer.alloc(sodium.crypto_secretbox_KEYBYTES);
    sodium.randombytes_buf(key);

    const dir = path.dirname(this.keyFile);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    fs.writeFileSync(this.keyFile, key.toString('hex'), { mode: 0o600 });

    return key;
  }

  encrypt(plaintext: string): string {
    const message = Buffer.from(plaintext, 'utf-8');
    const nonce = Buffer.alloc(sodium.crypto_secretbox_NONCEBYTES);
    sodium.randombytes_buf(nonce);

    const ciphertext = Buffer.alloc(message.length + sodium.crypto_secretbox_MACBYTES);
    sodium.crypto_secretbox_easy(ciphertext, message, nonce, this.key);

    // nonce + ciphertext, base64
    return Buffer.concat([nonce, ciphertext]).toString('base64');
  }

  decrypt(encrypted: string): string {
    const combined = Buffer.from(encrypted, 'base64');
    const minLength = sodium.crypto_secretbox_NONCEBYTES + sodium.crypto_secretbox_MACBYTES;
    if (combined.length < minLength) {
      throw new DecryptionFailedError('ciphertext is too short');
    }

    const nonce = combined.subarray(0, sodium.crypto_secretbox_NONCEBYTES);
    const ciphertext = combined.subarray(sodium.crypto_secretbox_NONCEBYTES);

    const decrypted = Buffer.alloc(ciphertext.length - sodium.crypto_secretbox_MACBYTES);
    const success = sodium.crypto_secretbox_open_easy(decrypted, ciphertext, nonce, this.key);

    if (!success) {
      throw new DecryptionFailedError('authentication failed');
    }

    return decrypted.toString('utf-8');
  }

  encryptObject(obj: Record<string, unknown>): string {
    return this.encrypt(JSON.stringify(obj));
  }

  /**
   * Decrypt a payload written by `encryptObject` into a flat string map.
   */
  decryptObject(encrypted: string): Record<string, string> {
    const plaintext = this.decrypt(encrypted);
    let parsed: unknown;
    try {
      parsed = JSON.parse(plaintext);
    } catch (error) {
      throw new DecryptionFailedError(`payload is not JSON (${errorMessage(error)})`);
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new DecryptionFailedError('payload is not an object');
    }

    const result: Record<string, string> = {};
    for (const [key, value] of Object.entries(parsed)) {
      if (value === null || value === undefined) continue;
      result[key] = typeof value === 'string' ? value : JSON.stringify(value);
    }
    return result;
  }
}
