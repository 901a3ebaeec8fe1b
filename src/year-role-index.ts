// year → role lookup, inverted from the config's role → years pairs.
// Pure functions — no side effects, no state.

/** Later roles overwrite earlier ones for a shared year. The config loader rejects such files. */
export function buildYearRoleIndex(
  roleYearPairs: ReadonlyMap<string, readonly number[]>,
): ReadonlyMap<number, string> {
  const index = new Map<number, string>();
  for (const [role, years] of roleYearPairs) {
    for (const year of years) {
      index.set(year, role);
    }
  }
  return index;
}

export function roleForYear(
  index: ReadonlyMap<number, string>,
  year: number,
  wildcardRole: string,
): string {
  return index.get(year) ?? wildcardRole;
}
