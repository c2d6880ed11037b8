const MAX_NAME_LENGTH = 253;
const MAX_LABEL_LENGTH = 63;

/**
 * Lowercases a domain and makes it fully qualified (trailing dot).
 * Returns null for names that can't be cache keys: empty, the root, names
 * with empty labels, or names exceeding DNS length limits.
 */
export function normalizeDomain(domain: string): string | null {
  const trimmed = domain.trim().toLowerCase();
  const bare = trimmed.endsWith(".") ? trimmed.slice(0, -1) : trimmed;

  if (bare.length === 0 || bare.length > MAX_NAME_LENGTH) {
    return null;
  }

  const labels = bare.split(".");
  if (
    labels.some(
      (label) => label.length === 0 || label.length > MAX_LABEL_LENGTH
    )
  ) {
    return null;
  }

  return `${bare}.`;
}

/** Strips the trailing dot, for resolvers that expect a plain hostname. */
export function toHostname(fqdn: string): string {
  return fqdn.endsWith(".") ? fqdn.slice(0, -1) : fqdn;
}
