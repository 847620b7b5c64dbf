import { z } from 'zod';

/**
 * Helper to create enum-like object with Zod schema
 * - Creates object with uppercase keys, dashes become underscores: EMPTY_ARCHIVE -> 'empty-archive'
 * - Creates Zod schema for validation
 * - Infers TypeScript type as string literals
 *
 * @example
 * ```ts
 * const level = createEnum(['debug', 'info'] as const);
 *
 * // level.object.DEBUG === 'debug'
 * // level.schema - Zod schema
 * // typeof level.type === 'debug' | 'info'
 * ```
 */
export function createEnum<const T extends readonly string[]>(values: T) {
  const obj = Object.fromEntries(values.map((v) => [toKey(v), v])) as {
    [K in T[number] as EnumKey<K>]: K;
  };

  return {
    values,
    object: obj,
    schema: z.enum(values),
    type: null as unknown as T[number],
  };
}

type EnumKey<S extends string> = S extends `${infer Head}-${infer Tail}`
  ? `${Uppercase<Head>}_${EnumKey<Tail>}`
  : Uppercase<S>;

function toKey(value: string): string {
  return value.toUpperCase().replace(/-/g, '_');
}
