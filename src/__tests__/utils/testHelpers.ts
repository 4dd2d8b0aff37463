/**
 * Test helper utilities
 */

/**
 * Runs `fn` and returns what it threw, or undefined if it returned normally.
 * Lets tests assert on error fields such as `issues` as well as the type.
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}
