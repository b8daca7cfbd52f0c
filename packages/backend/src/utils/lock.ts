const locks = new Map<string, Promise<void>>();

/**
 * Runs `operation` once every operation queued earlier under the same key has
 * finished. Keys are process-local.
 */
export async function withLock<T>(key: string, operation: () => Promise<T>): Promise<T> {
  const previousLock = locks.get(key);

  let releaseLock: () => void = () => undefined;
  const currentLock = new Promise<void>((resolve) => {
    releaseLock = resolve;
  });

  locks.set(key, currentLock);

  try {
    if (previousLock) {
      await previousLock;
    }
    return await operation();
  } finally {
    releaseLock();
    if (locks.get(key) === currentLock) {
      locks.delete(key);
    }
  }
}
