/**
 * Unit Tests: Timeout middleware
 *
 * @see libs/middleware/timeout.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { isClassifiedError } from '../../libs/errors/classifiedError.js';
import { createSilentLogger } from '../../libs/logging/logger.js';
import { applyMiddleware, createActivityContext, type ActivityContext, type ActivityFunc } from '../../libs/middleware/pipeline.js';
import { ACTIVITY_TIMEOUT_CODE, withTimeout } from '../../libs/middleware/timeout.js';
import { createCapturingLogger, waitFor } from '../helpers/captureLogger.js';

const OUTPUT = new Uint8Array([1, 2, 3]);

/** Settles only when its signal aborts, then rejects with the abort reason */
function untilAborted(ctx: ActivityContext): Promise<Uint8Array> {
    return new Promise((_, reject) => {
        ctx.signal.addEventListener('abort', () => reject(ctx.signal.reason), { once: true });
    });
}

describe('withTimeout()', () => {
    const logger = createSilentLogger();

    it('returns the output of work that finishes in time', async () => {
        const wrapped = applyMiddleware(async () => OUTPUT, withTimeout(1000, logger));
        assert.strictEqual(await wrapped(createActivityContext(), new Uint8Array()), OUTPUT);
    });

    it('passes failures of work that finishes in time through unchanged', async () => {
        const failure = new Error('declined');
        const wrapped = applyMiddleware(async () => {
            throw failure;
        }, withTimeout(1000, logger));

        await assert.rejects(wrapped(createActivityContext(), new Uint8Array()), (error: unknown) => error === failure);
    });

    it('rejects with a timeout error when the deadline passes', async () => {
        const wrapped = applyMiddleware(untilAborted, withTimeout(20, logger));

        await assert.rejects(wrapped(createActivityContext(), new Uint8Array()), (error: unknown) => {
            assert.ok(isClassifiedError(error));
            assert.strictEqual(error.kind, 'timeout');
            assert.strictEqual(error.code, ACTIVITY_TIMEOUT_CODE);
            assert.strictEqual(error.message, 'activity exceeded timeout of 20ms');
            return true;
        });
    });

    it('does not wait for abandoned work', async () => {
        let finished = false;
        const wrapped = applyMiddleware(async () => {
            await new Promise(resolve => setTimeout(resolve, 200));
            finished = true;
            return OUTPUT;
        }, withTimeout(10, logger));

        await assert.rejects(wrapped(createActivityContext(), new Uint8Array()), { code: ACTIVITY_TIMEOUT_CODE });
        assert.strictEqual(finished, false);
    });

    it('hands the work a derived signal that aborts on the deadline', async () => {
        const captured: { ctx?: ActivityContext } = {};
        const parent = createActivityContext({ traceId: 'trace-1' });
        const wrapped = applyMiddleware(async (ctx) => {
            captured.ctx = ctx;
            return untilAborted(ctx);
        }, withTimeout(10, logger));

        await assert.rejects(wrapped(parent, new Uint8Array()));

        const seen = captured.ctx;
        assert.ok(seen);
        assert.notStrictEqual(seen.signal, parent.signal);
        assert.strictEqual(seen.signal.aborted, true);
        assert.strictEqual(seen.traceId, 'trace-1');
        assert.strictEqual(parent.signal.aborted, false);
    });

    it('ends the race when the caller aborts', async () => {
        const controller = new AbortController();
        const cancelled = new Error('caller cancelled');
        const wrapped = applyMiddleware(untilAborted, withTimeout(10_000, logger));

        setTimeout(() => controller.abort(cancelled), 5);
        await assert.rejects(
            wrapped(createActivityContext({ signal: controller.signal }), new Uint8Array()),
            (error: unknown) => error === cancelled
        );
    });

    it('does not start work for an already cancelled caller', async () => {
        const controller = new AbortController();
        const cancelled = new Error('caller cancelled');
        controller.abort(cancelled);
        let called = false;
        const wrapped = applyMiddleware(async () => {
            called = true;
            return OUTPUT;
        }, withTimeout(1000, logger));

        await assert.rejects(
            wrapped(createActivityContext({ signal: controller.signal }), new Uint8Array()),
            (error: unknown) => error === cancelled
        );
        assert.strictEqual(called, false);
    });

    it('logs a late failure of the abandoned work', async () => {
        const captured = createCapturingLogger('debug');
        const wrapped = applyMiddleware(untilAborted, withTimeout(10, captured.logger));

        await assert.rejects(wrapped(createActivityContext(), new Uint8Array()));
        await waitFor(() => captured.withMessage('Abandoned activity attempt failed after timeout').length === 1);
    });

    it('disarms the deadline and the caller listener when the work throws synchronously', async () => {
        const failure = new Error('bad input');
        const parent = new AbortController();
        const seen: { signal?: AbortSignal } = {};
        const throwing: ActivityFunc = (ctx) => {
            seen.signal = ctx.signal;
            throw failure;
        };
        const wrapped = applyMiddleware(throwing, withTimeout(10, logger));

        await assert.rejects(
            wrapped(createActivityContext({ signal: parent.signal }), new Uint8Array()),
            (error: unknown) => error === failure
        );

        await new Promise(resolve => setTimeout(resolve, 30));
        parent.abort(new Error('caller cancelled'));
        const derived = seen.signal;
        assert.ok(derived);
        assert.strictEqual(derived.aborted, false);
    });

    it('rejects a non-positive timeout', () => {
        assert.throws(() => withTimeout(0, logger), RangeError);
    });
});
