export type QueryValue = string | number | undefined;

export const normalizeTag = (tag: string): string =>
  tag.trim().toLowerCase().replace(/\s+/g, "_");

/**
 * Joins include and exclude tags into the API's space separated tag list.
 * Exclusions are written as "-tag" whether or not the caller already
 * prefixed them.
 */
export function formatTags(
  include: readonly string[],
  exclude: readonly string[] = [],
): string {
  const tokens: string[] = [];

  for (const tag of include) {
    const normalized = normalizeTag(tag);
    if (normalized) tokens.push(normalized);
  }

  for (const tag of exclude) {
    const normalized = normalizeTag(tag.trim().replace(/^-+/, ""));
    if (normalized) tokens.push(`-${normalized}`);
  }

  return tokens.join(" ");
}

export function buildQuery(params: Record<string, QueryValue>): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    search.append(key, String(value));
  }
  return search.toString();
}

const CREDENTIAL_PARAMS = ["api_key", "user_id"];

/**
 * Drops credentials from a request URL so it can go into logs and errors.
 */
export function redactUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url;
  }
  if (!CREDENTIAL_PARAMS.some((name) => parsed.searchParams.has(name))) {
    return url;
  }
  for (const name of CREDENTIAL_PARAMS) parsed.searchParams.delete(name);
  return parsed.toString();
}
