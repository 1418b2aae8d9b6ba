/**
 * Parse a --services argument: "all" expands to the whole catalog, anything
 * else is a comma-separated list. Entries are trimmed, blanks dropped and
 * duplicates removed in first-seen order.
 */
export function parseServices(arg: string, catalog: string[]): string[] {
  if (arg.trim().toLowerCase() === "all") return [...catalog];
  const seen = new Set<string>();
  for (const entry of arg.split(",")) {
    const service = entry.trim();
    if (service) seen.add(service);
  }
  return [...seen];
}

export function findUnknownServices(services: string[], catalog: string[]): string[] {
  const known = new Set(catalog);
  return services.filter((s) => !known.has(s));
}
