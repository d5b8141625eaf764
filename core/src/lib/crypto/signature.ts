import { createPublicKey, verify } from 'node:crypto';
import type { KeyObject } from 'node:crypto';
import { createLogger } from '../logging/logger.js';

const logger = createLogger('Signature');

const HEX = /^(?:[0-9a-f]{2})+$/i;
const PUBLIC_KEY_BYTES = 32;
const SIGNATURE_BYTES = 64;

const keyCache = new Map<string, KeyObject>();

/** Import a raw 32-byte Ed25519 public key given as hex. */
export function importPublicKey(publicKeyHex: string): KeyObject {
    const cached = keyCache.get(publicKeyHex);
    if (cached) return cached;

    const raw = Buffer.from(publicKeyHex, 'hex');
    if (!HEX.test(publicKeyHex) || raw.length !== PUBLIC_KEY_BYTES) {
        throw new TypeError(`expected a ${PUBLIC_KEY_BYTES}-byte hex Ed25519 public key`);
    }
    const key = createPublicKey({
        key: { kty: 'OKP', crv: 'Ed25519', x: raw.toString('base64url') },
        format: 'jwk',
    });
    keyCache.set(publicKeyHex, key);
    return key;
}

/**
 * Check an Ed25519 signature over `message` (timestamp + raw body).
 * Malformed keys or signatures verify as false.
 */
export function verifySignature(publicKeyHex: string, signatureHex: string, message: string | Buffer): boolean {
    if (!HEX.test(signatureHex) || signatureHex.length !== SIGNATURE_BYTES * 2) return false;

    try {
        const key = importPublicKey(publicKeyHex);
        return verify(null, Buffer.isBuffer(message) ? message : Buffer.from(message), key, Buffer.from(signatureHex, 'hex'));
    } catch (err) {
        logger.warn({ err }, 'Signature verification errored');
        return false;
    }
}
