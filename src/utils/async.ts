export class TimeoutError extends Error {
  constructor(label: string, timeoutMs: number) {
    super(`${label}: timeout after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

export const withTimeout = async <T>(promise: Promise<T>, timeoutMs: number, label = "operation"): Promise<T> => {
  if (timeoutMs <= 0) return await promise;

  return await new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new TimeoutError(label, timeoutMs));
    }, timeoutMs);

    promise
      .then((value) => {
        clearTimeout(timer);
        resolve(value);
      })
      .catch((error: unknown) => {
        clearTimeout(timer);
        reject(error);
      });
  });
};

export const sleep = async (ms: number): Promise<void> =>
  await new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });
