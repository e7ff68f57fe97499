import { TimeoutError } from '../middleware/errorHandler';

/**
 * Runs `fn` with an abort signal that fires after `ms`. The returned promise
 * rejects with a TimeoutError at the deadline even if `fn` ignores the signal.
 */
export const withTimeout = async <T>(
    label: string,
    ms: number,
    fn: (signal: AbortSignal) => Promise<T>
): Promise<T> => {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const deadline = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => {
            reject(new TimeoutError(label, ms));
            controller.abort();
        }, ms);
    });

    try {
        return await Promise.race([fn(controller.signal), deadline]);
    } finally {
        clearTimeout(timer);
    }
};
