import { randomBytes } from 'node:crypto';

const MAX_PREFIX_LENGTH = 50;

const SAFE_PREFIX_PATTERN = /^[a-z0-9-]+$/i;

/**
 * Session ids supplied by clients are opaque but bounded to a safe alphabet
 */
const CLIENT_ID_PATTERN = /^[A-Za-z0-9_.:-]{1,200}$/;

/**
 * Generate a unique id: `{prefix}-{base36 timestamp}-{12 chars base64url}`
 *
 * @throws {Error} If prefix is empty, too long, or contains unsafe characters
 *
 * @example
 * generateId('etp') // => 'etp-m5x8z7k-A3bC9dE2fG1h'
 */
export function generateId(prefix: string): string {
  if (!prefix) {
    throw new Error('Prefix must be a non-empty string');
  }

  if (prefix.length > MAX_PREFIX_LENGTH) {
    throw new Error(`Prefix must be ${MAX_PREFIX_LENGTH} characters or less`);
  }

  if (!SAFE_PREFIX_PATTERN.test(prefix)) {
    throw new Error('Prefix must contain only alphanumeric characters and hyphens');
  }

  const timestamp = Date.now().toString(36);
  const random = randomBytes(9).toString('base64url').slice(0, 12);

  return `${prefix}-${timestamp}-${random}`;
}

/**
 * Whether a client-assigned session id can be used as a storage key
 */
export function isValidSessionId(id: string): boolean {
  return CLIENT_ID_PATTERN.test(id);
}
