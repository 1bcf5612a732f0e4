export const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

const blocker = new Int32Array(new SharedArrayBuffer(4));

// Blocks the calling thread. Only for the synchronous execution mode.
export function sleepSync(ms: number): void {
    if (!(ms > 0)) return;
    Atomics.wait(blocker, 0, 0, ms);
}
