/**
 * Run `fn` and hand back whatever it threw (or rejected with).
 */
export function catchError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (err) {
        return err;
    }
    return undefined;
}

export async function catchAsyncError(fn: () => Promise<unknown>): Promise<unknown> {
    try {
        await fn();
    } catch (err) {
        return err;
    }
    return undefined;
}
