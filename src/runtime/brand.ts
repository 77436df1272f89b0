/**
 * Nominal marker over a structural type.
 *
 * `ValidatedConfig<StrConfig>` and `PatternCacheSize` carry one so that only
 * `loadStrConfig` / `createValidatedConfig` can produce them. The marker is a
 * string key rather than a `unique symbol`, which keeps exported zod-derived
 * types nameable in declaration output.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
