import * as lockfile from "proper-lockfile";

// Writers inside this process queue per path; proper-lockfile keeps other processes out.
const queues = new Map<string, Promise<void>>();

export async function withFileLock<T>(
  filePath: string,
  fn: () => T | Promise<T>,
): Promise<T> {
  const previous = queues.get(filePath) ?? Promise.resolve();
  const run = previous.then(() => lockAndRun(filePath, fn));
  const tail = run.then(
    () => undefined,
    () => undefined,
  );
  queues.set(filePath, tail);
  try {
    return await run;
  } finally {
    if (queues.get(filePath) === tail) queues.delete(filePath);
  }
}

async function lockAndRun<T>(filePath: string, fn: () => T | Promise<T>): Promise<T> {
  let release: (() => Promise<void>) | undefined;
  try {
    release = await lockfile.lock(filePath, {
      retries: { retries: 3, minTimeout: 100 },
      realpath: false,
    });
    return await fn();
  } finally {
    await release?.();
  }
}
