const waitCell = new Int32Array(new SharedArrayBuffer(4));

/** Blocks the calling thread. Used between retries of synchronous nodes. */
export function sleepSync(ms: number): void {
    if (ms > 0) {
        Atomics.wait(waitCell, 0, 0, ms);
    }
}

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
