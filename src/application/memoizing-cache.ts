/**
 * Named arguments of a cached function. Keys are serialized in sorted order,
 * so `{ a, b }` and `{ b, a }` share an entry.
 */
export type CacheArgs = Readonly<Record<string, unknown>>;

export interface CachedFunctionOptions<A extends CacheArgs, R> {
  /** Argument names left out of the cache key (clocks, abort signals). */
  readonly ignore?: readonly (keyof A & string)[];
  /** Resolved values failing this check are dropped instead of kept. */
  readonly retain?: (value: R) => boolean;
}

export interface CachedFunction<A extends CacheArgs, R> {
  readonly fnKey: string;
  /** Cached result of the function given to `define()`. */
  call(args: A): Promise<R>;
  /** Cached result for `args`, computed with `compute` on a miss. */
  getOrCompute(args: A, compute: (args: A) => Promise<R>): Promise<R>;
  /** Drops one entry, or every entry of this function when `args` is omitted. */
  invalidate(args?: A): boolean;
  has(args: A): boolean;
}

interface Invalidator {
  invalidate(args?: CacheArgs): boolean;
}

function stableStringify(value: unknown): string {
  if (value === undefined) return 'undefined';
  if (typeof value === 'bigint') return `${value.toString()}n`;
  if (value instanceof Date) return `Date(${value.toISOString()})`;
  if (Array.isArray(value)) return `[${value.map(stableStringify).join(',')}]`;
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, inner]) => `${JSON.stringify(key)}:${stableStringify(inner)}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value);
}

/** Stable key for `args` with the `ignore` names removed. */
export function serializeArgs(args: CacheArgs, ignore: readonly string[] = []): string {
  const kept = Object.entries(args).filter(([name]) => !ignore.includes(name));
  return stableStringify(Object.fromEntries(kept));
}

/**
 * Promise memoization keyed by function name and arguments.
 *
 * Entries never expire: they live until invalidated. An entry holds the
 * in-flight promise, so concurrent callers with the same key share one
 * computation. A rejected computation is removed before the rejection
 * reaches any caller.
 */
export class MemoizingCache {
  private readonly functions = new Map<string, Invalidator>();

  define<A extends CacheArgs, R>(
    fnKey: string,
    compute: (args: A) => Promise<R>,
    options: CachedFunctionOptions<A, R> = {},
  ): CachedFunction<A, R> {
    if (this.functions.has(fnKey)) {
      throw new Error(`Cached function "${fnKey}" is already defined`);
    }

    const ignore: readonly string[] = options.ignore ?? [];
    const retain = options.retain;
    const entries = new Map<string, Promise<R>>();

    const getOrCompute = (args: A, fn: (args: A) => Promise<R>): Promise<R> => {
      const key = serializeArgs(args, ignore);
      const existing = entries.get(key);
      if (existing) return existing;

      const run = async (): Promise<R> => fn(args);
      const pending: Promise<R> = run().then(
        (value) => {
          if (retain && !retain(value) && entries.get(key) === pending) {
            entries.delete(key);
          }
          return value;
        },
        (err: unknown) => {
          if (entries.get(key) === pending) entries.delete(key);
          throw err;
        },
      );
      entries.set(key, pending);
      return pending;
    };

    const invalidate = (args?: CacheArgs): boolean => {
      if (args === undefined) {
        const hadEntries = entries.size > 0;
        entries.clear();
        return hadEntries;
      }
      return entries.delete(serializeArgs(args, ignore));
    };

    this.functions.set(fnKey, { invalidate });

    return {
      fnKey,
      call: (args) => getOrCompute(args, compute),
      getOrCompute,
      invalidate,
      has: (args) => entries.has(serializeArgs(args, ignore)),
    };
  }

  /**
   * Invalidates by function name. Unknown names and never-populated keys
   * are a no-op returning false.
   */
  invalidate(fnKey: string, args?: CacheArgs): boolean {
    return this.functions.get(fnKey)?.invalidate(args) ?? false;
  }

  /** Clears every entry of every function. */
  clear(): void {
    for (const fn of this.functions.values()) fn.invalidate();
  }
}
