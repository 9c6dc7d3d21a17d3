/**
 * @file Keyed Lock
 *
 * Serializes async tasks per key: tasks sharing a key run one after
 * another in call order, tasks under different keys run freely. The
 * engine keys on workflow id so two completions in the same workflow
 * can never recompute the frontier at the same time.
 *
 * @module dag/engine
 */

function noop(): void {}

export class KeyedLock {
    private readonly tails = new Map<string, Promise<void>>();

    /**
     * Run `task` once every earlier task under `key` has settled.
     * A rejected task does not block the ones queued after it.
     */
    run<T>(key: string, task: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();
        const result = previous.then((): Promise<T> => task());

        const tail: Promise<void> = result.then(noop, noop).then((): void => {
            if (this.tails.get(key) === tail) this.tails.delete(key);
        });
        this.tails.set(key, tail);

        return result;
    }

    /** Whether any task under `key` is queued or running. */
    isHeld(key: string): boolean {
        return this.tails.has(key);
    }
}
