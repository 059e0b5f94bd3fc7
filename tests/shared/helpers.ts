/**
 * Runs `fn` and returns what it threw, so tests can assert on the error's fields.
 */
export function captureError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }
    throw new Error('Expected the function to throw.');
}
