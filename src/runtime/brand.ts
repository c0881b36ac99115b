/**
 * Nominal typing for values that have passed a boundary check
 * (a canonicalised root, a validated config).
 *
 * String-keyed marker rather than `unique symbol`, so zod schemas that
 * transform into branded types can still be exported.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
