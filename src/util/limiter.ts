/**
 * Caps how many tasks run at once; the rest wait in FIFO order.
 *
 *   const limit = createLimiter(4);
 *   await Promise.all(jobs.map((job) => limit(() => run(job))));
 */
export function createLimiter(concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
        throw new Error("concurrency must be an integer >= 1");
    }

    let active = 0;
    const queue: Array<() => void> = [];

    const next = () => {
        if (active >= concurrency) return;
        const start = queue.shift();
        if (!start) return;
        active += 1;
        start();
    };

    return <T>(task: () => Promise<T>): Promise<T> =>
        new Promise<T>((resolve, reject) => {
            queue.push(async () => {
                try {
                    resolve(await task());
                } catch (err) {
                    reject(err);
                } finally {
                    active -= 1;
                    next();
                }
            });
            next();
        });
}
