/**
 * Diagnostic codes: fixed-width `<probe id><failure suffix>` strings that name
 * what went wrong in heartbeat lines and alert banners.
 */

export const DIAG_PREFIX_WIDTH = 4;
export const DIAG_WIDTH = 11;

export const FAILURE_SUFFIX = {
  dns: "DNSFAIL",
  connect: "CONNERR",
  timeout: "TIMEOUT",
  httpStatus: "HTTPERR",
  disconnect: "DISCONN",
  transport: "OSERROR",
  payload: "BADDATA",
  unknown: "UNKNOWN",
} as const;

export type FailureCategory = keyof typeof FAILURE_SUFFIX;

export function formatDiagnostic(probeId: string, category: FailureCategory): string {
  const prefix = probeId
    .toUpperCase()
    .replace(/[^A-Z0-9]/g, "")
    .padEnd(DIAG_PREFIX_WIDTH, "X")
    .slice(0, DIAG_PREFIX_WIDTH);
  return (prefix + FAILURE_SUFFIX[category]).padEnd(DIAG_WIDTH, "X").slice(0, DIAG_WIDTH);
}

const DNS_CODES = new Set(["ENOTFOUND", "EAI_AGAIN", "EAI_FAIL", "EAI_NONAME", "ENODATA"]);
const CONNECT_CODES = new Set([
  "ECONNREFUSED",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EHOSTDOWN",
  "ENETDOWN",
  "EADDRNOTAVAIL",
]);
const TIMEOUT_CODES = new Set([
  "ETIMEDOUT",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);
const DISCONNECT_CODES = new Set([
  "ECONNRESET",
  "EPIPE",
  "ECONNABORTED",
  "UND_ERR_SOCKET",
  "UND_ERR_CLOSED",
]);

/**
 * Map a thrown transport error onto a failure category. fetch() wraps the
 * socket error in `cause`, so the chain is walked until a code is found.
 */
export function classifyFailure(err: unknown): FailureCategory {
  let current: unknown = err;
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    if (current.name === "TimeoutError" || current.name === "AbortError") return "timeout";

    const code = errorCode(current);
    if (code) {
      if (DNS_CODES.has(code)) return "dns";
      if (CONNECT_CODES.has(code)) return "connect";
      if (TIMEOUT_CODES.has(code)) return "timeout";
      if (DISCONNECT_CODES.has(code)) return "disconnect";
      return "transport";
    }
    current = current.cause;
  }
  if (err instanceof TypeError) return "transport";
  return "unknown";
}

function errorCode(err: Error): string | undefined {
  if (!("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}
