/**
 * Raised when a guarded task outlives its time budget.
 */
export class TimeoutError extends Error {
    constructor(
        public readonly label: string,
        public readonly timeoutMs: number
    ) {
        super(`${label} timed out after ${timeoutMs}ms`);
        this.name = 'TimeoutError';
    }
}

/**
 * Run `task` with an abort signal that fires after `timeoutMs` or when `parent` aborts.
 * The returned promise rejects with `TimeoutError` on expiry, without waiting for the task
 * to notice the abort. A non-positive `timeoutMs` disables the timer.
 */
export function withTimeout<T>(
    task: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    label: string,
    parent?: AbortSignal
): Promise<T> {
    const controller = new AbortController();

    return new Promise<T>((resolve, reject) => {
        let timer: ReturnType<typeof setTimeout> | undefined;
        let settled = false;

        const settle = (finish: () => void): void => {
            if (settled) return;
            settled = true;
            if (timer !== undefined) clearTimeout(timer);
            parent?.removeEventListener('abort', onParentAbort);
            finish();
        };

        function onParentAbort(): void {
            controller.abort(parent?.reason);
            settle(() => reject(new TimeoutError(label, timeoutMs)));
        }

        if (parent?.aborted) {
            onParentAbort();
            return;
        }
        parent?.addEventListener('abort', onParentAbort, { once: true });

        if (timeoutMs > 0) {
            timer = setTimeout(() => {
                const error = new TimeoutError(label, timeoutMs);
                controller.abort(error);
                settle(() => reject(error));
            }, timeoutMs);
        }

        let running: Promise<T>;
        try {
            running = task(controller.signal);
        } catch (error) {
            settle(() => reject(error));
            return;
        }
        void running.then(
            (value) => settle(() => resolve(value)),
            (error: unknown) => settle(() => reject(error))
        );
    });
}
