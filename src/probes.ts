/**
 * Connectivity probes and the registry that holds them.
 *
 * Primary probes are cheap HTTP checks run on every tick. Confirmation probes
 * are DNS-over-HTTPS lookups against independent resolvers, run only to verify
 * a suspected outage. Every probe resolves the target host itself before the
 * request so a DNS failure is reported as such rather than as a fetch error.
 */

import { lookup } from "node:dns/promises";
import { classifyFailure, formatDiagnostic, type FailureCategory } from "./diagnostics.js";

export type ProbeCategory = "primary" | "confirmation";

export type ProbeResult = { ok: true } | { ok: false; diagnostic: string };

export interface Probe {
  /** Four uppercase alphanumerics, used as the diagnostic prefix. */
  readonly id: string;
  readonly name: string;
  readonly category: ProbeCategory;
  run(): Promise<ProbeResult>;
}

/** Network primitives a probe needs; swapped out in tests. */
export interface ProbeTransport {
  resolve(host: string): Promise<void>;
  fetch(url: string, init: RequestInit): Promise<Response>;
}

export const nodeTransport: ProbeTransport = {
  async resolve(host) {
    await lookup(host);
  },
  fetch: (url, init) => fetch(url, init),
};

const PROBE_ID = /^[A-Z0-9]{4}$/;

export class ProbeRegistry {
  private readonly probes = new Map<string, Probe>();

  register(probe: Probe): this {
    if (!PROBE_ID.test(probe.id)) {
      throw new Error(`Probe id must be 4 uppercase alphanumerics, got "${probe.id}"`);
    }
    if (this.probes.has(probe.id)) {
      throw new Error(`Probe "${probe.id}" is already registered`);
    }
    this.probes.set(probe.id, Object.freeze(probe));
    return this;
  }

  get(id: string): Probe | undefined {
    return this.probes.get(id);
  }

  primary(): readonly Probe[] {
    return this.byCategory("primary");
  }

  confirmation(): readonly Probe[] {
    return this.byCategory("confirmation");
  }

  private byCategory(category: ProbeCategory): readonly Probe[] {
    return [...this.probes.values()].filter((p) => p.category === category);
  }
}

// ── Runners ──

class ProbeFailure extends Error {
  constructor(readonly category: FailureCategory, message: string) {
    super(message);
  }
}

interface ProbeTarget {
  id: string;
  transport: ProbeTransport;
  timeoutMs: number;
}

/**
 * Run the two probe stages (DNS, then request + validation) and convert any
 * failure into a diagnostic code. Never throws.
 */
async function runStaged(
  target: ProbeTarget,
  url: URL,
  init: RequestInit,
  validate: (res: Response) => Promise<void>,
): Promise<ProbeResult> {
  try {
    await withTimeout(target.transport.resolve(url.hostname), target.timeoutMs);
  } catch (err) {
    const category = classifyFailure(err) === "timeout" ? "timeout" : "dns";
    return { ok: false, diagnostic: formatDiagnostic(target.id, category) };
  }

  let res: Response | undefined;
  try {
    res = await target.transport.fetch(url.href, {
      ...init,
      redirect: "manual",
      signal: AbortSignal.timeout(target.timeoutMs),
    });
    await validate(res);
    return { ok: true };
  } catch (err) {
    const category = err instanceof ProbeFailure ? err.category : classifyFailure(err);
    return { ok: false, diagnostic: formatDiagnostic(target.id, category) };
  } finally {
    if (res) await discardBody(res);
  }
}

/** Release the connection of a response whose body was never read. */
async function discardBody(res: Response): Promise<void> {
  if (res.bodyUsed || !res.body || res.body.locked) return;
  await res.body.cancel();
}

function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new Error(`timed out after ${ms}ms`);
      err.name = "TimeoutError";
      reject(err);
    }, ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

function checkStatus(res: Response, expected: number): void {
  if (res.status >= 400) {
    throw new ProbeFailure("httpStatus", `HTTP ${res.status}`);
  }
  if (res.status !== expected) {
    throw new ProbeFailure("payload", `expected HTTP ${expected}, got ${res.status}`);
  }
}

export interface HttpProbeOptions {
  id: string;
  name: string;
  url: string;
  expectStatus: number;
  /** Text the response body must contain (captive portals rewrite it). */
  expectBody?: string;
  transport?: ProbeTransport;
  timeoutMs: number;
  category?: ProbeCategory;
}

export function createHttpProbe(opts: HttpProbeOptions): Probe {
  const url = new URL(opts.url);
  const target: ProbeTarget = {
    id: opts.id,
    transport: opts.transport ?? nodeTransport,
    timeoutMs: opts.timeoutMs,
  };
  return {
    id: opts.id,
    name: opts.name,
    category: opts.category ?? "primary",
    run: () =>
      runStaged(target, url, { method: "GET" }, async (res) => {
        checkStatus(res, opts.expectStatus);
        if (opts.expectBody === undefined) return;
        const body = await res.text();
        if (!body.includes(opts.expectBody)) {
          throw new ProbeFailure("payload", "echo token missing from response");
        }
      }),
  };
}

export interface DohProbeOptions {
  id: string;
  name: string;
  /** JSON DoH endpoint, e.g. https://cloudflare-dns.com/dns-query */
  url: string;
  /** Name to resolve through the endpoint. */
  queryName: string;
  transport?: ProbeTransport;
  timeoutMs: number;
}

export function createDohProbe(opts: DohProbeOptions): Probe {
  const url = new URL(opts.url);
  url.searchParams.set("name", opts.queryName);
  url.searchParams.set("type", "A");
  const target: ProbeTarget = {
    id: opts.id,
    transport: opts.transport ?? nodeTransport,
    timeoutMs: opts.timeoutMs,
  };
  return {
    id: opts.id,
    name: opts.name,
    category: "confirmation",
    run: () =>
      runStaged(
        target,
        url,
        { method: "GET", headers: { accept: "application/dns-json" } },
        async (res) => {
          checkStatus(res, 200);
          let body: unknown;
          try {
            body = await res.json();
          } catch {
            throw new ProbeFailure("payload", "DoH response is not JSON");
          }
          if (!isAnsweredDohReply(body)) {
            throw new ProbeFailure("payload", "DoH reply carries no answer");
          }
        },
      ),
  };
}

function isAnsweredDohReply(body: unknown): boolean {
  if (typeof body !== "object" || body === null) return false;
  if (!("Status" in body) || body.Status !== 0) return false;
  return "Answer" in body && Array.isArray(body.Answer) && body.Answer.length > 0;
}

/**
 * The built-in probe set: three primary HTTP endpoints run by different
 * operators, and two DoH resolvers for confirmation.
 */
export function defaultRegistry(
  timeoutMs: number,
  transport: ProbeTransport = nodeTransport,
): ProbeRegistry {
  return new ProbeRegistry()
    .register(
      createHttpProbe({
        id: "GSTC",
        name: "Google connectivity check",
        url: "http://connectivitycheck.gstatic.com/generate_204",
        expectStatus: 204,
        transport,
        timeoutMs,
      }),
    )
    .register(
      createHttpProbe({
        id: "FFOX",
        name: "Firefox captive-portal check",
        url: "http://detectportal.firefox.com/success.txt",
        expectStatus: 200,
        expectBody: "success",
        transport,
        timeoutMs,
      }),
    )
    .register(
      createHttpProbe({
        id: "EXMP",
        name: "example.com",
        url: "http://example.com/",
        expectStatus: 200,
        transport,
        timeoutMs,
      }),
    )
    .register(
      createDohProbe({
        id: "CFLR",
        name: "Cloudflare DNS-over-HTTPS",
        url: "https://cloudflare-dns.com/dns-query",
        queryName: "example.com",
        transport,
        timeoutMs,
      }),
    )
    .register(
      createDohProbe({
        id: "GOOG",
        name: "Google DNS-over-HTTPS",
        url: "https://dns.google/resolve",
        queryName: "example.com",
        transport,
        timeoutMs,
      }),
    );
}
