import { setMaxListeners } from 'events';

// Start one task per item and wait for all of them. The first failure aborts
// the signal handed to the remaining tasks and is rethrown.
export async function fanOut<T, R>(
    items: readonly T[],
    task: (item: T, signal: AbortSignal) => Promise<R>,
    parentSignal?: AbortSignal
): Promise<R[]> {
    const controller = new AbortController();
    // Every child task, queued request and nested fan-out listens on this one signal
    setMaxListeners(0, controller.signal);
    const onParentAbort = () => controller.abort(parentSignal?.reason);

    if (parentSignal?.aborted) {
        controller.abort(parentSignal.reason);
    } else {
        parentSignal?.addEventListener('abort', onParentAbort, { once: true });
    }

    try {
        return await Promise.all(items.map((item) => task(item, controller.signal)));
    } catch (error) {
        controller.abort(error);
        throw error;
    } finally {
        parentSignal?.removeEventListener('abort', onParentAbort);
    }
}
