export type UriScheme = "https" | "http";

/** Prefixes `path` with `/` when it has none */
export function normalizePath(path: string): string {
  return path.startsWith("/") ? path : `/${path}`;
}

/**
 * Builds the target URL of a request from its parts.
 * `host` may include a port. An empty or missing parameter map adds no query string.
 *
 * @example
 * ```typescript
 * buildUri("https", "api.example.com", "items", { page: "2" }).toString();
 * // "https://api.example.com/items?page=2"
 * ```
 */
export function buildUri(
  scheme: UriScheme,
  host: string,
  path: string,
  params?: Readonly<Record<string, string>>
): URL {
  const url = new URL(`${scheme}://${host}${normalizePath(path)}`);
  if (params) {
    for (const [name, value] of Object.entries(params)) {
      url.searchParams.append(name, value);
    }
  }
  return url;
}
