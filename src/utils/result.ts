/**
 * Typed result for operations that can fail without throwing.
 *
 * Repositories, the cache and the shortcut service return `Result` so command
 * handlers decide how each failure reaches the user. `Ok(null)` means "nothing
 * there"; `Err(error)` means the operation itself failed.
 *
 * ```ts
 * const res = await service.getEntry(guildId, name);
 * if (res.isErr()) return reply(res.error);
 * const entry = res.value;
 * ```
 */
export type Result<T, E = Error> = Ok<T, E> | Err<T, E>;

export class Ok<T, E> {
  constructor(public readonly value: T) {}

  isOk(): this is Ok<T, E> {
    return true;
  }

  isErr(): this is Err<T, E> {
    return false;
  }
}

export class Err<T, E> {
  constructor(public readonly error: E) {}

  isOk(): this is Ok<T, E> {
    return false;
  }

  isErr(): this is Err<T, E> {
    return true;
  }
}

/** Successful result. */
export const OkResult = <T, E = Error>(value: T): Result<T, E> => new Ok<T, E>(value);

/** Failed result. */
export const ErrResult = <T, E = Error>(error: E): Result<T, E> => new Err<T, E>(error);

/** Normalizes anything caught in a `catch` into an `Error`. */
export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));
