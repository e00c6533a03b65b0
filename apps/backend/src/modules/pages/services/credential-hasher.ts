import { randomBytes, scrypt, timingSafeEqual } from 'node:crypto';

const SALT_BYTES = 16;
const KEY_BYTES = 64;
const PREFIX = 'scrypt';

function deriveKey(credential: string, salt: Buffer): Promise<Buffer> {
    return new Promise((resolve, reject) => {
        scrypt(credential, salt, KEY_BYTES, (error, derivedKey) => {
            if (error) {
                reject(error);
                return;
            }
            resolve(derivedKey);
        });
    });
}

/**
 * Hash a credential with a random salt.
 *
 * @returns `scrypt:<saltHex>:<hashHex>`
 */
export async function hashCredential(credential: string): Promise<string> {
    const salt = randomBytes(SALT_BYTES);
    const derived = await deriveKey(credential, salt);
    return `${PREFIX}:${salt.toString('hex')}:${derived.toString('hex')}`;
}

/**
 * Check a credential against a stored hash in constant time.
 *
 * A malformed stored value never verifies.
 */
export async function verifyCredential(credential: string, stored: string): Promise<boolean> {
    const [prefix, saltHex, hashHex] = stored.split(':');
    if (prefix !== PREFIX || !saltHex || !hashHex) {
        return false;
    }

    const expected = Buffer.from(hashHex, 'hex');
    if (expected.length !== KEY_BYTES) {
        return false;
    }

    const derived = await deriveKey(credential, Buffer.from(saltHex, 'hex'));
    return timingSafeEqual(derived, expected);
}
