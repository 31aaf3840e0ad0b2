/**
 * @fileoverview Jest test setup and global utilities
 *
 * Provides custom matchers and utility functions for tests.
 */

import { ErrorKind, PipelineResult } from '../src/domain/result/Result';

// ============================================================================
// Global Type Declarations
// ============================================================================

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace jest {
    interface Matchers<R> {
      /**
       * Check that a pipeline result is a failure of the given kind
       * @param kind Expected error kind
       */
      toBeFailureOf(kind: ErrorKind): R;

      /**
       * Check that a pipeline result is a success
       */
      toBeSuccess(): R;
    }
  }

  /**
   * Wait for condition to be true
   * @param condition Function that returns boolean
   * @param timeout Maximum time to wait in ms
   * @param interval Check interval in ms
   */
  // eslint-disable-next-line no-var
  var waitFor: (condition: () => boolean, timeout?: number, interval?: number) => Promise<void>;

  /**
   * Sleep for specified milliseconds
   */
  // eslint-disable-next-line no-var
  var sleep: (ms: number) => Promise<void>;
}

// ============================================================================
// Custom Jest Matchers
// ============================================================================

function describeResult(result: PipelineResult<unknown>): string {
  return result.ok ? 'Success' : `Failure(${result.error.kind}: ${result.error.message})`;
}

expect.extend({
  toBeFailureOf(received: PipelineResult<unknown>, kind: ErrorKind) {
    const pass = !received.ok && received.error.kind === kind;
    return {
      pass,
      message: () =>
        pass
          ? `Expected result not to be Failure(${kind})`
          : `Expected Failure(${kind}), received ${describeResult(received)}`,
    };
  },

  toBeSuccess(received: PipelineResult<unknown>) {
    const pass = received.ok;
    return {
      pass,
      message: () =>
        pass ? 'Expected result not to be a Success' : `Expected Success, received ${describeResult(received)}`,
    };
  },
});

// ============================================================================
// Global Utility Functions
// ============================================================================

/**
 * Wait for a condition to be true with timeout
 *
 * @example
 * ```typescript
 * await waitFor(() => sink.records.length > 0, 2000, 10);
 * ```
 */
globalThis.waitFor = async (condition, timeout = 5000, interval = 20) => {
  const startTime = Date.now();
  while (!condition()) {
    if (Date.now() - startTime > timeout) {
      throw new Error(`Timeout waiting for condition after ${timeout}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, interval));
  }
};

globalThis.sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));
