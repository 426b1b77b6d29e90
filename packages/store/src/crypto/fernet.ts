/**
 * Fernet tokens (https://github.com/fernet/spec)
 *
 * token = base64url(0x80 | timestamp:u64be | iv:16 | AES-128-CBC ciphertext | HMAC-SHA256:32)
 * key   = base64url(signing key:16 | encryption key:16)
 *
 * Tokens are interchangeable with other Fernet implementations.
 */

import { createCipheriv, createDecipheriv, createHmac, randomBytes, timingSafeEqual } from 'node:crypto';
import { ConfigurationError, CryptoError, ENCRYPTION_KEY_ENV, errorMessage } from '@question-pool/core';

const VERSION = 0x80;
const IV_LENGTH = 16;
const BLOCK_LENGTH = 16;
const HMAC_LENGTH = 32;
const HEADER_LENGTH = 1 + 8 + IV_LENGTH;
const KEY_RE = /^[A-Za-z0-9_-]{43}=?$/;
const TOKEN_RE = /^[A-Za-z0-9_-]+={0,2}$/;

export interface FernetKey {
  signingKey: Buffer;
  encryptionKey: Buffer;
}

export interface EncryptOptions {
  /** Fixed IV; random when omitted */
  iv?: Uint8Array;
  /** Token timestamp; now when omitted */
  now?: Date;
}

export interface DecryptOptions {
  /** Reject tokens older than this many seconds */
  ttlSeconds?: number;
  now?: Date;
}

function toBase64Url(bytes: Uint8Array): string {
  const encoded = Buffer.from(bytes).toString('base64url');
  return encoded + '='.repeat((4 - (encoded.length % 4)) % 4);
}

/**
 * Fresh random key in the standard Fernet encoding (44 chars, padded)
 */
export function generateKey(): string {
  return toBase64Url(randomBytes(32));
}

export function parseKey(key: string): FernetKey {
  const trimmed = key.trim();
  if (!KEY_RE.test(trimmed)) {
    throw new ConfigurationError(`${ENCRYPTION_KEY_ENV} must be 32 url-safe base64-encoded bytes`);
  }
  const raw = Buffer.from(trimmed, 'base64url');
  return {
    signingKey: raw.subarray(0, 16),
    encryptionKey: raw.subarray(16, 32),
  };
}

function sign(key: FernetKey, data: Uint8Array): Buffer {
  return createHmac('sha256', key.signingKey).update(data).digest();
}

export function encryptToken(key: FernetKey, plaintext: Uint8Array, options: EncryptOptions = {}): string {
  const iv = options.iv ? Buffer.from(options.iv) : randomBytes(IV_LENGTH);
  if (iv.length !== IV_LENGTH) {
    throw new CryptoError(`IV must be ${IV_LENGTH} bytes, got ${iv.length}`);
  }
  const seconds = Math.floor((options.now ?? new Date()).getTime() / 1000);

  const cipher = createCipheriv('aes-128-cbc', key.encryptionKey, iv);
  const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);

  const header = Buffer.alloc(HEADER_LENGTH);
  header.writeUInt8(VERSION, 0);
  header.writeBigUInt64BE(BigInt(seconds), 1);
  iv.copy(header, 9);

  const body = Buffer.concat([header, ciphertext]);
  return toBase64Url(Buffer.concat([body, sign(key, body)]));
}

export function decryptToken(key: FernetKey, token: string | Uint8Array, options: DecryptOptions = {}): Buffer {
  const text = (typeof token === 'string' ? token : Buffer.from(token).toString('ascii')).trim();
  if (!TOKEN_RE.test(text)) {
    throw new CryptoError('Invalid token: not url-safe base64');
  }

  const data = Buffer.from(text, 'base64url');
  if (data.length < HEADER_LENGTH + BLOCK_LENGTH + HMAC_LENGTH || data[0] !== VERSION) {
    throw new CryptoError('Invalid token: bad version or length');
  }

  const body = data.subarray(0, data.length - HMAC_LENGTH);
  const mac = data.subarray(data.length - HMAC_LENGTH);
  if (!timingSafeEqual(mac, sign(key, body))) {
    throw new CryptoError('Invalid token: signature mismatch (wrong key or tampered data)');
  }

  if (options.ttlSeconds !== undefined) {
    const issued = Number(data.readBigUInt64BE(1));
    const now = Math.floor((options.now ?? new Date()).getTime() / 1000);
    if (issued + options.ttlSeconds < now) {
      throw new CryptoError('Invalid token: expired');
    }
  }

  const ciphertext = body.subarray(HEADER_LENGTH);
  if (ciphertext.length % BLOCK_LENGTH !== 0) {
    throw new CryptoError('Invalid token: ciphertext is not block aligned');
  }

  try {
    const decipher = createDecipheriv('aes-128-cbc', key.encryptionKey, body.subarray(9, HEADER_LENGTH));
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  } catch (err) {
    throw new CryptoError(`Invalid token: ${errorMessage(err)}`, { cause: err });
  }
}
