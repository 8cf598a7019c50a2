import crypto from 'node:crypto';

/**
 * 128-bit random trace id (W3C Trace Context size), hex encoded.
 */
export function generateTraceId(): string {
    return crypto.randomBytes(16).toString('hex');
}

/**
 * 64-bit random span id, hex encoded.
 */
export function generateSpanId(): string {
    return crypto.randomBytes(8).toString('hex');
}
