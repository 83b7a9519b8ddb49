/** Mongo duplicate-key (E11000) detection and translation into IntegrityError. */
import type { AppError } from "./errors.js";

export function isDuplicateKeyError(err: unknown): err is { code: 11000; keyPattern?: unknown } {
  return typeof err === "object" && err !== null && "code" in err && err.code === 11000;
}

/** Indexed fields named by a duplicate-key error; null when `err` is something else. */
export function duplicateKeyFields(err: unknown): string[] | null {
  if (!isDuplicateKeyError(err)) return null;
  const pattern = err.keyPattern;
  return typeof pattern === "object" && pattern !== null ? Object.keys(pattern) : [];
}

/** Awaits `op`, rethrowing duplicate-key failures as the error `toError` builds. */
export async function translateDuplicateKey<T>(
  op: Promise<T>,
  toError: (fields: string[]) => AppError
): Promise<T> {
  try {
    return await op;
  } catch (err: unknown) {
    const fields = duplicateKeyFields(err);
    if (fields) throw toError(fields);
    throw err;
  }
}
