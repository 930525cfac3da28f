import { createHash, randomBytes, timingSafeEqual } from "node:crypto";

/**
 * Send a signal to a process. Returns true if delivered, false if the
 * process is already dead (ESRCH) or belongs to someone else (EPERM).
 * Re-throws unexpected errors.
 */
export function safeKill(pid: number, signal: NodeJS.Signals | 0 = "SIGTERM"): boolean {
  try {
    process.kill(pid, signal);
    return true;
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === "ESRCH" || code === "EPERM") return false;
    throw error;
  }
}

/**
 * Check whether a process is alive via signal 0.
 * Returns false only for ESRCH (definitely dead).
 * Returns true for EPERM (alive but owned by another user).
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ESRCH") return false;
    return true;
  }
}

export function generateConnectionId(): string {
  return `c-${randomBytes(4).toString("hex")}`;
}

/** Exact string equality without an early exit on the first differing byte. */
export function safeEqual(actual: string | undefined, expected: string): boolean {
  if (actual === undefined) return false;
  const a = createHash("sha256").update(actual).digest();
  const b = createHash("sha256").update(expected).digest();
  return timingSafeEqual(a, b) && actual === expected;
}

/**
 * Race `promise` against a timer. The deadline is fixed when this is called
 * and never extended.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, onTimeout: () => Error): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(onTimeout()), timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}
