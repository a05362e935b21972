import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';
import { DecryptionError } from '@transit-pulse/domain';

const ALGORITHM = 'aes-256-cbc';
const KEY_BYTES = 32;
const BLOCK_BYTES = 16;
const BASE64_RE = /^[A-Za-z0-9+/]+={0,2}$/;

/** Decodes the pre-shared key; throws on anything but exactly 32 bytes. */
export function parseEnvelopeKey(encoded: string): Buffer {
  const trimmed = encoded.trim();
  if (!BASE64_RE.test(trimmed) || trimmed.length % 4 !== 0) {
    throw new Error('envelope key must be base64');
  }
  const key = Buffer.from(trimmed, 'base64');
  if (key.length !== KEY_BYTES) {
    throw new Error(`envelope key must decode to ${KEY_BYTES} bytes, got ${key.length}`);
  }
  return key;
}

/**
 * Envelope layout: base64(IV ‖ ciphertext), PKCS7 padded.
 * A random IV is drawn unless one is supplied.
 */
export function encryptEnvelope(plaintext: string, key: Buffer, iv: Buffer = randomBytes(BLOCK_BYTES)): string {
  if (iv.length !== BLOCK_BYTES) {
    throw new Error(`IV must be ${BLOCK_BYTES} bytes`);
  }
  const cipher = createCipheriv(ALGORITHM, key, iv);
  const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
  return Buffer.concat([iv, ciphertext]).toString('base64');
}

export function decryptEnvelope(encoded: string, key: Buffer): string {
  if (!BASE64_RE.test(encoded) || encoded.length % 4 !== 0) {
    throw new DecryptionError('encrypted_data is not valid base64');
  }
  const raw = Buffer.from(encoded, 'base64');
  if (raw.length < BLOCK_BYTES * 2) {
    throw new DecryptionError('Envelope too short to hold an IV and one cipher block');
  }
  const iv = raw.subarray(0, BLOCK_BYTES);
  const ciphertext = raw.subarray(BLOCK_BYTES);
  if (ciphertext.length % BLOCK_BYTES !== 0) {
    throw new DecryptionError('Ciphertext length is not a multiple of the block size');
  }

  let plain: Buffer;
  try {
    const decipher = createDecipheriv(ALGORITHM, key, iv);
    plain = Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  } catch (err) {
    throw new DecryptionError('Bad padding or wrong key', { cause: err });
  }

  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(plain);
  } catch (err) {
    throw new DecryptionError('Decrypted payload is not UTF-8', { cause: err });
  }
}
