import { CheckAbortedError } from '../middleware/errorHandler';

// Resolves after `ms`, or rejects with CheckAbortedError as soon as the signal fires.
export const sleep = (ms: number, signal?: AbortSignal): Promise<void> => {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(new CheckAbortedError());
            return;
        }

        const onAbort = () => {
            clearTimeout(timer);
            reject(new CheckAbortedError());
        };

        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);

        signal?.addEventListener('abort', onAbort, { once: true });
    });
};
