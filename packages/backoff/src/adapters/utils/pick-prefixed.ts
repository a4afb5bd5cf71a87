/** Keep the entries whose key starts with `prefix`, with the prefix removed. */
export function pickPrefixed(
  values: Record<string, string | undefined>,
  prefix: string,
): Record<string, string | undefined> {
  if (!prefix) return { ...values }

  const picked: Record<string, string | undefined> = {}

  for (const [key, value] of Object.entries(values)) {
    if (key.startsWith(prefix)) {
      picked[key.slice(prefix.length)] = value
    }
  }

  return picked
}
