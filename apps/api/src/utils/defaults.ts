/**
 * Overlay the defined values of `overrides` on `defaults`.
 * Unlike object spread, an explicit undefined keeps the default.
 */
export function withDefaults<T extends Record<string, number>>(
  defaults: T,
  overrides: Partial<T> = {}
): T {
  const result: T = { ...defaults };
  for (const key in overrides) {
    const value = overrides[key];
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}
