// ═══════════════════════════════════════════════════════════
// WORKER POOL
// ═══════════════════════════════════════════════════════════
// Runs task(0..count-1) with at most `limit` in flight.
// The first task that throws stops further scheduling; tasks already
// running are awaited, then that first error is rethrown.
// ═══════════════════════════════════════════════════════════

export async function runWorkerPool(
    count: number,
    limit: number,
    task: (index: number) => Promise<void>
): Promise<void> {
    if (!Number.isInteger(limit) || limit < 1) {
        throw new RangeError(`Worker pool limit must be a positive integer, got ${limit}`);
    }

    let next = 0;
    const errors: unknown[] = [];

    const worker = async () => {
        while (errors.length === 0 && next < count) {
            const index = next++;
            try {
                await task(index);
            } catch (error) {
                errors.push(error);
            }
        }
    };

    await Promise.all(Array.from({ length: Math.min(limit, count) }, () => worker()));

    if (errors.length > 0) {
        throw errors[0];
    }
}
