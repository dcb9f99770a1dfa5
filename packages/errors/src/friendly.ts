/**
 * Operator-facing rewording of backend failures.
 *
 * The raw message from an SDK or HTTP body is rarely actionable for the
 * person running a batch; these hints say what to check instead.
 */

const NETWORK_MARKERS = [
  "network",
  "connection",
  "econnrefused",
  "econnreset",
  "enotfound",
  "fetch failed",
  "socket",
] as const;

const TLS_MARKERS = ["ssl", "tls", "certificate"] as const;

const TIMEOUT_MARKERS = ["timeout", "timed out"] as const;

function mentions(haystack: string, markers: readonly string[]): boolean {
  return markers.some((marker) => haystack.includes(marker));
}

export function friendlyErrorMessage(message: string, status?: number): string {
  if (status === 401 || status === 403) {
    return "Authentication failed: check that the API key is valid and allowed to use this model";
  }
  if (status === 429) {
    return "Rate limit reached: this key is sending too many requests, retry later";
  }
  if (status !== undefined && status >= 500 && status < 600) {
    return `Provider server error (HTTP ${status}): the service is temporarily unavailable`;
  }

  const lower = message.toLowerCase();
  if (mentions(lower, TLS_MARKERS)) {
    return "Secure connection failed: check proxy and certificate settings";
  }
  if (mentions(lower, TIMEOUT_MARKERS)) {
    return "Request timed out: the provider did not answer in time";
  }
  if (mentions(lower, NETWORK_MARKERS)) {
    return "Network error: check the connection to the provider";
  }
  return message;
}
