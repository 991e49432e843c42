/**
 * Build an enum-like object from a list of kebab-case string literals.
 *
 * Keys are the values upper-cased with dashes turned into underscores:
 * `'computing-cursor'` becomes `COMPUTING_CURSOR`.
 *
 * @example
 * ```ts
 * const phase = createEnum(['idle', 'computing-cursor'] as const);
 * phase.object.COMPUTING_CURSOR; // 'computing-cursor'
 * type Phase = typeof phase.type; // 'idle' | 'computing-cursor'
 * ```
 */
export function createEnum<const T extends readonly [string, ...string[]]>(values: T) {
  const obj = Object.fromEntries(values.map((v) => [v.toUpperCase().replace(/-/g, '_'), v])) as {
    [K in T[number] as Uppercase<Replace<K>>]: K;
  };

  return {
    object: obj,
    type: null as unknown as T[number],
  };
}

type Replace<S extends string> = S extends `${infer Head}-${infer Tail}` ? `${Head}_${Replace<Tail>}` : S;
