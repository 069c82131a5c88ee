/**
 * FIFO task queue per key. Tasks for one document run one at a time in the
 * order `run` was called; different documents never wait on each other.
 */
export class DocumentLocks {
    #_tails = new Map<string, Promise<void>>();

    run<T>(key : string, task : () => Promise<T>) : Promise<T> {
        const previous = this.#_tails.get(key) ?? Promise.resolve();
        const result = previous.then(task);
        const tail : Promise<void> = result.then(
            () => this.release(key, tail),
            () => this.release(key, tail)
        );
        this.#_tails.set(key, tail);
        return result;
    }

    private release(key : string, tail : Promise<void>) : void {
        if (this.#_tails.get(key) === tail) {
            this.#_tails.delete(key);
        }
    }
}
