/**
 * Guards against requests being aimed at internal infrastructure (SSRF).
 */

export interface UrlValidationOptions {
  /**
   * Allow private/internal IP addresses (default: false)
   */
  allowPrivateIPs?: boolean;
  /**
   * Allow localhost addresses (default: false)
   */
  allowLocalhost?: boolean;
  /**
   * Permitted protocols (default: ['http:', 'https:'])
   */
  allowedProtocols?: string[];
  /**
   * Skip validation entirely (default: false)
   */
  disableValidation?: boolean;
}

export class SSRFError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SSRFError";
  }
}

const PRIVATE_IPV6_PREFIXES = [/^fc/i, /^fd/i, /^fe80:/i];

function isLocalhost(hostname: string): boolean {
  return (
    hostname === "localhost" ||
    hostname.endsWith(".localhost") ||
    hostname === "::1" ||
    hostname === "0.0.0.0" ||
    hostname.startsWith("127.")
  );
}

function privateRangeOf(hostname: string): string | undefined {
  const ipv4 = /^(\d{1,3})\.(\d{1,3})\.\d{1,3}\.\d{1,3}$/.exec(hostname);
  if (ipv4) {
    const a = Number(ipv4[1]);
    const b = Number(ipv4[2]);
    if (a === 10) return "10.x.x.x";
    if (a === 172 && b >= 16 && b <= 31) return "172.16-31.x.x";
    if (a === 192 && b === 168) return "192.168.x.x";
    if (a === 169 && b === 254) return "169.254.x.x";
    return undefined;
  }
  if (!hostname.includes(":")) {
    return undefined;
  }
  return PRIVATE_IPV6_PREFIXES.some((prefix) => prefix.test(hostname))
    ? "private IPv6"
    : undefined;
}

/**
 * Validates a request URL before it is dispatched.
 *
 * @throws {SSRFError} If the URL uses a disallowed protocol or points at a
 * localhost or private address that the options do not allow
 */
export function validateUrl(
  url: string | URL,
  options: UrlValidationOptions = {}
): void {
  const {
    allowPrivateIPs = false,
    allowLocalhost = false,
    allowedProtocols = ["http:", "https:"],
    disableValidation = false,
  } = options;

  if (disableValidation) {
    return;
  }

  let parsedUrl: URL;
  try {
    parsedUrl = typeof url === "string" ? new URL(url) : url;
  } catch {
    throw new SSRFError(`Invalid URL format: ${String(url)}`);
  }

  const protocol = parsedUrl.protocol.toLowerCase();
  if (!allowedProtocols.includes(protocol)) {
    throw new SSRFError(
      `Protocol "${protocol}" is not allowed. Only ${allowedProtocols.join(", ")} are permitted.`
    );
  }

  const hostname = parsedUrl.hostname.toLowerCase().replace(/^\[|\]$/g, "");

  if (!allowLocalhost && isLocalhost(hostname)) {
    throw new SSRFError(
      "Localhost addresses are not allowed. Set allowLocalhost=true to override."
    );
  }

  if (!allowPrivateIPs) {
    const range = privateRangeOf(hostname);
    if (range) {
      throw new SSRFError(
        `Private addresses (${range}) are not allowed. Set allowPrivateIPs=true to override.`
      );
    }
  }
}
