/**
 * Resolves an intersection into one object type, so that editors show the
 * diagnostic variants as flat objects on hover.
 *
 * @example
 * ```ts
 * // Shows `{ code: 'x'; pool: string }` rather than `Base<'x'> & { pool: string }`
 * type Flat = Simplify<Base<'x'> & { pool: string }>;
 * ```
 */
export type Simplify<T> = { [K in keyof T]: T[K] } & {};
