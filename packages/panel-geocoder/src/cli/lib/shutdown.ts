/**
 * Signal handling for the CLI
 *
 * Commands register cleanups (closing the resolution cache) while they hold
 * a resource. On SIGINT or SIGTERM every registered cleanup runs before the
 * process exits with the conventional 128 + signal number.
 *
 * @module cli/lib/shutdown
 */

export type Cleanup = () => Promise<void> | void;

export const SIGNAL_EXIT_CODES = {
  SIGINT: 130,
  SIGTERM: 143,
} as const;

export type ShutdownSignal = keyof typeof SIGNAL_EXIT_CODES;

export interface ShutdownOptions {
  readonly exit?: (code: number) => void;
  readonly report?: (message: string) => void;
}

const cleanups = new Set<Cleanup>();

/**
 * Register a cleanup; the returned function unregisters it
 */
export function onShutdown(cleanup: Cleanup): () => void {
  cleanups.add(cleanup);
  return () => {
    cleanups.delete(cleanup);
  };
}

/**
 * Keep `cleanup` registered for as long as `fn` runs
 */
export async function withShutdownCleanup<T>(cleanup: Cleanup, fn: () => Promise<T>): Promise<T> {
  const release = onShutdown(cleanup);
  try {
    return await fn();
  } finally {
    release();
  }
}

export function pendingCleanups(): number {
  return cleanups.size;
}

/**
 * Run every registered cleanup once, then exit. A failing cleanup is
 * reported and does not stop the others.
 */
export async function shutdown(signal: ShutdownSignal, options: ShutdownOptions = {}): Promise<void> {
  const report = options.report ?? ((message: string) => console.error(message));
  const exit = options.exit ?? ((code: number) => process.exit(code));

  const pending = [...cleanups];
  cleanups.clear();

  report(`Received ${signal}, closing ${pending.length} open resource(s)`);
  const results = await Promise.allSettled(pending.map(async (cleanup) => cleanup()));
  for (const result of results) {
    if (result.status === 'rejected') {
      const reason: unknown = result.reason;
      report(`Cleanup failed: ${reason instanceof Error ? reason.message : String(reason)}`);
    }
  }

  exit(SIGNAL_EXIT_CODES[signal]);
}

export function installSignalHandlers(options: ShutdownOptions = {}): void {
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal, options).catch((error: unknown) => {
        console.error(`Shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(SIGNAL_EXIT_CODES[signal]);
      });
    });
  }
}
