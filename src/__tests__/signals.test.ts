import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { EventEmitter } from "node:events";
import { SignalFlags, installSignalHandlers } from "../signals.js";
import { ControlChannel } from "../control-channel.js";

describe("SignalFlags", () => {
  it("takeReload drains the request", () => {
    const flags = new SignalFlags();
    assert.equal(flags.takeReload(), false);
    flags.requestReload();
    flags.requestReload();
    assert.equal(flags.takeReload(), true);
    assert.equal(flags.takeReload(), false);
  });

  it("shutdown is sticky", () => {
    const flags = new SignalFlags();
    flags.requestShutdown();
    assert.equal(flags.shutdownRequested, true);
    assert.equal(flags.shutdownRequested, true);
  });
});

describe("installSignalHandlers", () => {
  it("maps signals onto flags and uninstalls cleanly", () => {
    const target = new EventEmitter();
    const flags = new SignalFlags();
    const uninstall = installSignalHandlers(flags, target);

    target.emit("SIGUSR1");
    assert.equal(flags.takeReload(), true);
    assert.equal(flags.shutdownRequested, false);

    target.emit("SIGTERM");
    assert.equal(flags.shutdownRequested, true);

    uninstall();
    assert.equal(target.listenerCount("SIGUSR1"), 0);
    assert.equal(target.listenerCount("SIGTERM"), 0);
    assert.equal(target.listenerCount("SIGINT"), 0);
  });

  it("receives a real SIGUSR1 sent through the control channel", async () => {
    const flags = new SignalFlags();
    const uninstall = installSignalHandlers(flags);
    try {
      assert.equal(ControlChannel.signal(process.pid), true);
      let received = false;
      for (let i = 0; i < 100 && !received; i++) {
        await new Promise((r) => setTimeout(r, 10));
        received = flags.takeReload();
      }
      assert.equal(received, true);
    } finally {
      uninstall();
    }
  });
});
