/** Raised when an event is constructed without a usable type. */
export class InvalidEventError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidEventError';
  }
}

/** A handler did not settle within the bus's per-handler timeout. */
export class HandlerTimeoutError extends Error {
  constructor(
    readonly handler: string,
    readonly eventType: string,
    readonly timeoutMs: number,
  ) {
    super(`Handler "${handler}" timed out after ${timeoutMs}ms on "${eventType}"`);
    this.name = 'HandlerTimeoutError';
  }
}

/** onLoad()/onUnload() of a plugin did not settle in time. */
export class LifecycleTimeoutError extends Error {
  constructor(
    readonly plugin: string,
    readonly hook: 'onLoad' | 'onUnload',
    readonly timeoutMs: number,
  ) {
    super(`Plugin "${plugin}" ${hook}() timed out after ${timeoutMs}ms`);
    this.name = 'LifecycleTimeoutError';
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Race a promise against a timer. The timer is always cleared, so a settled
 * call leaves nothing pending. `timeoutMs <= 0` disables the bound.
 */
export async function withTimeout<T>(
  work: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  if (timeoutMs <= 0) return work;

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
