import { describe, it, expect } from 'vitest';
import { TimeoutError } from '../src/middleware/errorHandler';
import { withTimeout } from '../src/utils/timeout';

describe('withTimeout', () => {
    it('resolves with the result when the call finishes in time', async () => {
        await expect(withTimeout('quick call', 100, async () => 'done')).resolves.toBe('done');
    });

    it('rejects with TimeoutError and aborts the signal at the deadline', async () => {
        let seenSignal: AbortSignal | undefined;
        const call = withTimeout('slow call', 20, signal => {
            seenSignal = signal;
            return new Promise<string>(() => undefined);
        });

        await expect(call).rejects.toBeInstanceOf(TimeoutError);
        await expect(call).rejects.toThrow('slow call timed out after 20ms');
        expect(seenSignal?.aborted).toBe(true);
    });

    it('passes through errors raised by the call', async () => {
        await expect(withTimeout('failing call', 100, async () => {
            throw new Error('backend error');
        })).rejects.toThrow('backend error');
    });
});
