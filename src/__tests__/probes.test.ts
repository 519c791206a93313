import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  ProbeRegistry,
  createDohProbe,
  createHttpProbe,
  defaultRegistry,
  type Probe,
  type ProbeTransport,
} from "../probes.js";

interface FakeTransportOptions {
  resolveError?: Error;
  resolveHangs?: boolean;
  fetchError?: Error;
  respond?: () => Response;
}

function fakeTransport(opts: FakeTransportOptions) {
  const calls: string[] = [];
  const inits: RequestInit[] = [];
  const transport: ProbeTransport = {
    async resolve(host) {
      calls.push(`resolve ${host}`);
      if (opts.resolveError) throw opts.resolveError;
      if (opts.resolveHangs) await new Promise<never>(() => {});
    },
    async fetch(url, init) {
      calls.push(`fetch ${url}`);
      inits.push(init);
      if (opts.fetchError) throw opts.fetchError;
      return opts.respond ? opts.respond() : new Response(null, { status: 204 });
    },
  };
  return { transport, calls, inits };
}

function codedError(code: string): Error {
  return Object.assign(new Error(code), { code });
}

function httpProbe(
  transport: ProbeTransport,
  extra: { expectBody?: string; expectStatus?: number; timeoutMs?: number } = {},
): Probe {
  return createHttpProbe({
    id: "TEST",
    name: "test endpoint",
    url: "http://probe.test/check",
    expectStatus: extra.expectStatus ?? 204,
    expectBody: extra.expectBody,
    transport,
    timeoutMs: extra.timeoutMs ?? 1_000,
  });
}

describe("createHttpProbe", () => {
  it("resolves the host before fetching", async () => {
    const fake = fakeTransport({});
    const result = await httpProbe(fake.transport).run();
    assert.deepEqual(result, { ok: true });
    assert.deepEqual(fake.calls, ["resolve probe.test", "fetch http://probe.test/check"]);
    assert.equal(fake.inits[0].redirect, "manual");
    assert.ok(fake.inits[0].signal);
  });

  it("reports DNS failure without attempting the request", async () => {
    const fake = fakeTransport({ resolveError: codedError("ENOTFOUND") });
    const result = await httpProbe(fake.transport).run();
    assert.deepEqual(result, { ok: false, diagnostic: "TESTDNSFAIL" });
    assert.deepEqual(fake.calls, ["resolve probe.test"]);
  });

  it("reports a refused connection", async () => {
    const fake = fakeTransport({
      fetchError: new TypeError("fetch failed", { cause: codedError("ECONNREFUSED") }),
    });
    assert.deepEqual(await httpProbe(fake.transport).run(), { ok: false, diagnostic: "TESTCONNERR" });
  });

  it("reports a timeout", async () => {
    const err = new Error("aborted");
    err.name = "TimeoutError";
    const fake = fakeTransport({ fetchError: err });
    assert.deepEqual(await httpProbe(fake.transport).run(), { ok: false, diagnostic: "TESTTIMEOUT" });
  });

  it("times out a DNS lookup that never answers", async () => {
    const fake = fakeTransport({ resolveHangs: true });
    const result = await httpProbe(fake.transport, { timeoutMs: 20 }).run();
    assert.deepEqual(result, { ok: false, diagnostic: "TESTTIMEOUT" });
    assert.deepEqual(fake.calls, ["resolve probe.test"]);
  });

  it("reports a remote disconnect", async () => {
    const fake = fakeTransport({
      fetchError: new TypeError("fetch failed", { cause: codedError("UND_ERR_SOCKET") }),
    });
    assert.deepEqual(await httpProbe(fake.transport).run(), { ok: false, diagnostic: "TESTDISCONN" });
  });

  it("reports HTTP error statuses", async () => {
    const fake = fakeTransport({ respond: () => new Response("oops", { status: 503 }) });
    assert.deepEqual(await httpProbe(fake.transport).run(), { ok: false, diagnostic: "TESTHTTPERR" });
  });

  it("treats a captive-portal redirect as a payload mismatch", async () => {
    const fake = fakeTransport({
      respond: () => new Response(null, { status: 302, headers: { location: "http://portal.test/" } }),
    });
    assert.deepEqual(await httpProbe(fake.transport).run(), { ok: false, diagnostic: "TESTBADDATA" });
  });

  it("releases a response body it does not need", async () => {
    const ok = new Response("<html>example</html>", { status: 200 });
    const failed = new Response("oops", { status: 503 });
    const opts = { expectStatus: 200 };
    assert.deepEqual(await httpProbe(fakeTransport({ respond: () => ok }).transport, opts).run(), {
      ok: true,
    });
    assert.deepEqual(await httpProbe(fakeTransport({ respond: () => failed }).transport, opts).run(), {
      ok: false,
      diagnostic: "TESTHTTPERR",
    });
    assert.equal(ok.bodyUsed, true);
    assert.equal(failed.bodyUsed, true);
  });

  it("checks the echo token in the body", async () => {
    const good = fakeTransport({ respond: () => new Response("success\n", { status: 200 }) });
    const bad = fakeTransport({ respond: () => new Response("<html>login</html>", { status: 200 }) });
    const opts = { expectStatus: 200, expectBody: "success" };
    assert.deepEqual(await httpProbe(good.transport, opts).run(), { ok: true });
    assert.deepEqual(await httpProbe(bad.transport, opts).run(), { ok: false, diagnostic: "TESTBADDATA" });
  });
});

describe("createDohProbe", () => {
  function dohProbe(transport: ProbeTransport): Probe {
    return createDohProbe({
      id: "DOHT",
      name: "test resolver",
      url: "https://resolver.test/dns-query",
      queryName: "example.com",
      transport,
      timeoutMs: 1_000,
    });
  }

  it("is a confirmation probe querying the target name", async () => {
    const fake = fakeTransport({
      respond: () =>
        new Response(JSON.stringify({ Status: 0, Answer: [{ name: "example.com", data: "192.0.2.1" }] }), {
          status: 200,
        }),
    });
    const probe = dohProbe(fake.transport);
    assert.equal(probe.category, "confirmation");
    assert.deepEqual(await probe.run(), { ok: true });
    assert.deepEqual(fake.calls, [
      "resolve resolver.test",
      "fetch https://resolver.test/dns-query?name=example.com&type=A",
    ]);
  });

  it("fails on an empty answer", async () => {
    const fake = fakeTransport({
      respond: () => new Response(JSON.stringify({ Status: 2 }), { status: 200 }),
    });
    assert.deepEqual(await dohProbe(fake.transport).run(), { ok: false, diagnostic: "DOHTBADDATA" });
  });

  it("fails on a non-JSON body", async () => {
    const fake = fakeTransport({ respond: () => new Response("not json", { status: 200 }) });
    assert.deepEqual(await dohProbe(fake.transport).run(), { ok: false, diagnostic: "DOHTBADDATA" });
  });
});

describe("ProbeRegistry", () => {
  const stub = (id: string, category: Probe["category"]): Probe => ({
    id,
    name: id,
    category,
    run: async () => ({ ok: true }),
  });

  it("splits probes by category", () => {
    const registry = new ProbeRegistry()
      .register(stub("AAAA", "primary"))
      .register(stub("BBBB", "confirmation"))
      .register(stub("CCCC", "primary"));
    assert.deepEqual(registry.primary().map((p) => p.id), ["AAAA", "CCCC"]);
    assert.deepEqual(registry.confirmation().map((p) => p.id), ["BBBB"]);
    assert.equal(registry.get("BBBB")?.category, "confirmation");
  });

  it("rejects duplicate and malformed ids", () => {
    const registry = new ProbeRegistry().register(stub("AAAA", "primary"));
    assert.throws(() => registry.register(stub("AAAA", "primary")), /already registered/);
    assert.throws(() => registry.register(stub("abc", "primary")), /4 uppercase/);
  });

  it("default registry has at least two probes per category", () => {
    const registry = defaultRegistry(10_000, fakeTransport({}).transport);
    assert.deepEqual(registry.primary().map((p) => p.id), ["GSTC", "FFOX", "EXMP"]);
    assert.deepEqual(registry.confirmation().map((p) => p.id), ["CFLR", "GOOG"]);
  });
});
