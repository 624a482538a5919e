// ConversationLock: per-conversation queue so one chat never runs two cycles at once

export class ConversationLock {
    private readonly tails = new Map<string, Promise<void>>();

    /**
     * Runs `task` after every task queued earlier under the same key has
     * settled. Tasks under different keys run independently. The task's own
     * result or error is returned to the caller.
     */
    async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();
        const run = previous.then(task);
        const tail = run.then(
            () => undefined,
            () => undefined
        );
        this.tails.set(key, tail);

        try {
            return await run;
        } finally {
            if (this.tails.get(key) === tail) this.tails.delete(key);
        }
    }

    /** Check if a conversation has a running or queued task. */
    isLocked(key: string): boolean {
        return this.tails.has(key);
    }

    get activeKeys(): string[] {
        return [...this.tails.keys()];
    }
}
