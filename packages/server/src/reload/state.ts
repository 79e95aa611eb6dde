/**
 * Reload version shared by the file watcher and every open reload stream.
 *
 * @packageDocumentation
 */

/**
 * A version counter that readers can wait on.
 *
 * {@link bump} increments the version and wakes every pending
 * {@link waitForChange} call at once. Waiters are promises; nothing polls.
 *
 * @example
 * ```typescript
 * const state = new ReloadState();
 * const pending = state.waitForChange(state.get(), 15_000);
 * state.bump();
 * await pending; // 1
 * ```
 */
export class ReloadState {
    private version = 0;
    private readonly waiters = new Set<() => void>();

    /** Current version, without waiting. */
    get(): number {
        return this.version;
    }

    /** Number of callers currently blocked in {@link waitForChange}. */
    get waiterCount(): number {
        return this.waiters.size;
    }

    /**
     * Increments the version and wakes all waiters.
     *
     * @returns The new version
     */
    bump(): number {
        this.version += 1;
        for (const wake of [...this.waiters]) {
            wake();
        }
        return this.version;
    }

    /**
     * Waits until the version differs from `lastSeen`.
     *
     * @param lastSeen - The version the caller already knows about
     * @param timeoutMs - How long to wait before giving up
     * @param signal - Ends the wait early, as a timeout
     * @returns The new version, or `null` when the wait timed out or was aborted
     */
    waitForChange(
        lastSeen: number,
        timeoutMs: number,
        signal?: AbortSignal,
    ): Promise<number | null> {
        if (this.version !== lastSeen) {
            return Promise.resolve(this.version);
        }
        if (signal?.aborted) {
            return Promise.resolve(null);
        }

        return new Promise((resolve) => {
            const settle = () => {
                clearTimeout(timer);
                this.waiters.delete(settle);
                signal?.removeEventListener('abort', settle);
                resolve(this.version === lastSeen ? null : this.version);
            };

            const timer = setTimeout(settle, timeoutMs);
            this.waiters.add(settle);
            signal?.addEventListener('abort', settle, { once: true });
        });
    }
}
