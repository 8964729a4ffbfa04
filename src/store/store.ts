export type MaybePromise<T> = T | Promise<T>

/**
 * Shared key-value cache for the app access token.
 * TTLs are in seconds; `getTtl` resolves `undefined` when the key is missing or never expires.
 * @public
 */
export abstract class Store {
  constructor() {}

  abstract get(key: string): MaybePromise<string | undefined>

  abstract set(key: string, value: string, ttl: number): MaybePromise<void>

  abstract getTtl(key: string): MaybePromise<number | undefined>
}
