import crypto from 'node:crypto';

/**
 * Content fingerprint of a payload: SHA-256, hex encoded.
 * Payloads themselves are never stored.
 */
export function hashData(data: Uint8Array): string {
    return crypto.createHash('sha256').update(data).digest('hex');
}

/**
 * Grouping hash of an error message.
 *
 * Only the leading code token (text before the first ':') is hashed, so
 * "PAYMENT_FAILED: timeout" and "PAYMENT_FAILED: network_error" share a
 * group. Truncated to 16 hex chars; this is a grouping key, not an
 * integrity check.
 */
export function hashError(errorMessage: string): string {
    if (errorMessage === '') {
        return '';
    }

    const separator = errorMessage.indexOf(':');
    const errorCode = separator === -1 ? errorMessage : errorMessage.slice(0, separator);

    return crypto.createHash('sha256').update(errorCode).digest('hex').slice(0, 16);
}
