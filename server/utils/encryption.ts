/**
 * Field-Level Encryption Utility
 *
 * AES-256-GCM encryption for stored plugin settings (SCP passwords, bot
 * access tokens, OAuth refresh tokens).
 *
 * Behavior:
 * - SECRET_ENCRYPTION_KEY unset: settings are stored as plaintext JSON and a
 *   warning is logged once
 * - SECRET_ENCRYPTION_KEY set: must be 64 hex characters (32 bytes)
 *
 * Generate a key with: openssl rand -hex 32
 */

import { createCipheriv, createDecipheriv, randomBytes } from 'crypto';
import logger from './logger';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 16;
const AUTH_TAG_LENGTH = 16;

let cachedKey: Buffer | null = null;
let cachedKeyHex: string | undefined;
let warnedPlaintext = false;

/**
 * Resolve the encryption key from the environment.
 * Returns null when encryption is not configured.
 */
function getEncryptionKey(): Buffer | null {
    const keyHex = process.env.SECRET_ENCRYPTION_KEY;

    if (!keyHex) {
        if (!warnedPlaintext) {
            logger.warn('[Encryption] SECRET_ENCRYPTION_KEY not set, plugin settings are stored as plaintext');
            warnedPlaintext = true;
        }
        return null;
    }

    if (cachedKey && cachedKeyHex === keyHex) {
        return cachedKey;
    }

    if (!/^[0-9a-fA-F]{64}$/.test(keyHex)) {
        throw new Error(`SECRET_ENCRYPTION_KEY must be 64 hexadecimal characters (got ${keyHex.length})`);
    }

    cachedKey = Buffer.from(keyHex, 'hex');
    cachedKeyHex = keyHex;
    logger.debug('[Encryption] Key validated successfully');
    return cachedKey;
}

/**
 * Check if a string looks like our ciphertext rather than plaintext JSON.
 * IV + AuthTag + at least one byte is 33 bytes, i.e. 44+ base64 characters.
 */
export function isLikelyEncrypted(value: string): boolean {
    if (!value || value.length < 44) return false;
    if (value.startsWith('{') || value.startsWith('[')) return false;
    return /^[A-Za-z0-9+/]+=*$/.test(value);
}

/**
 * Encrypt a plaintext string. Without a key the plaintext is returned as-is.
 *
 * @returns Base64 of IV + AuthTag + ciphertext
 */
export function encrypt(plaintext: string): string {
    const key = getEncryptionKey();
    if (key === null) {
        return plaintext;
    }

    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv(ALGORITHM, key, iv);
    const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
    const authTag = cipher.getAuthTag();

    return Buffer.concat([iv, authTag, encrypted]).toString('base64');
}

/**
 * Decrypt a value produced by encrypt(). Plaintext values written before a key
 * was configured are passed through.
 *
 * @throws Error if decryption fails (wrong key, corrupted data)
 */
export function decrypt(ciphertext: string): string {
    if (!isLikelyEncrypted(ciphertext)) {
        return ciphertext;
    }

    const key = getEncryptionKey();
    if (key === null) {
        throw new Error('Stored settings are encrypted but SECRET_ENCRYPTION_KEY is not set');
    }

    try {
        const data = Buffer.from(ciphertext, 'base64');
        const iv = data.subarray(0, IV_LENGTH);
        const authTag = data.subarray(IV_LENGTH, IV_LENGTH + AUTH_TAG_LENGTH);
        const encrypted = data.subarray(IV_LENGTH + AUTH_TAG_LENGTH);

        const decipher = createDecipheriv(ALGORITHM, key, iv);
        decipher.setAuthTag(authTag);

        return Buffer.concat([decipher.update(encrypted), decipher.final()]).toString('utf8');
    } catch (error) {
        logger.error(`[Encryption] Decryption failed: error="${error instanceof Error ? error.message : String(error)}"`);
        throw new Error('Failed to decrypt data. The encryption key may have changed.');
    }
}
