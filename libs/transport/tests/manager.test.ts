import { afterEach, describe, expect, it } from "vitest";
import { ConnectionError, TransportStateError } from "../src/errors";
import { TransportManager } from "../src/manager";
import { FakeLink, waitFor } from "./test-helpers";

function createManager(link: FakeLink): TransportManager {
  return new TransportManager({
    config: { path: "/dev/ttyTEST0", readTimeoutMs: 20, idleDelayMs: 1 },
    link
  });
}

describe.sequential("TransportManager", () => {
  let manager: TransportManager | undefined;

  afterEach(async () => {
    await manager?.stop();
    manager = undefined;
  });

  it("transmits commands in the order they were sent even with a slow link", async () => {
    const link = new FakeLink();
    link.writeDelayMs = 15;
    manager = createManager(link);
    await manager.start();

    manager.sendCommand("a");
    manager.sendCommand("d");
    manager.sendCommand("s11");

    await waitFor(() => link.written.length === 3, 2000, 5, () => JSON.stringify(link.written));
    expect(link.written).toEqual(["a", "d", "s11"]);
  });

  it("sends commands queued before start once running", async () => {
    const link = new FakeLink();
    manager = createManager(link);
    manager.sendCommand("a");
    manager.sendCommand("d");
    expect(manager.getStatus().queueDepth).toBe(2);

    await manager.start();
    await waitFor(() => link.written.length === 2);
    expect(link.written).toEqual(["a", "d"]);
    expect(manager.getStatus().queueDepth).toBe(0);
  });

  it("exposes the latest record and keeps it after stop", async () => {
    const link = new FakeLink();
    manager = createManager(link);
    expect(manager.latestTelemetry()).toBe("");

    await manager.start();
    link.feed("TS:1000 | ARM:1\nTS:15", "00 | ARM:1\n");
    await waitFor(() => manager?.getStatus().telemetry.sequence === 2);
    expect(manager.latestTelemetry()).toBe("TS:1500 | ARM:1 | AGE:500ms");

    await manager.stop();
    expect(manager.getState()).toBe("STOPPED");
    expect(manager.latestTelemetry()).toBe("TS:1500 | ARM:1 | AGE:500ms");
    expect(manager.getStatus().read).toMatchObject({ linesFramed: 2, linesAnnotated: 2 });
  });

  it("tolerates stop before start and repeated stops", async () => {
    const link = new FakeLink();
    manager = createManager(link);

    await manager.stop();
    expect(link.isOpen).toBe(false);

    await manager.start();
    expect(manager.getState()).toBe("RUNNING");
    expect(link.isOpen).toBe(true);

    await Promise.all([manager.stop(), manager.stop()]);
    await manager.stop();
    expect(link.isOpen).toBe(false);
    expect(link.closes).toBe(1);
    expect(manager.getState()).toBe("STOPPED");
  });

  it("surfaces open failures as ConnectionError and stays stopped", async () => {
    const link = new FakeLink();
    link.openError = new Error("ENOENT: no such file");
    manager = createManager(link);

    const failure = manager.start();
    await expect(failure).rejects.toBeInstanceOf(ConnectionError);
    await expect(failure).rejects.toThrow("Failed to open /dev/ttyTEST0: ENOENT: no such file");
    expect(manager.getState()).toBe("STOPPED");
  });

  it("rejects start while already running", async () => {
    const link = new FakeLink();
    manager = createManager(link);
    await manager.start();
    await expect(manager.start()).rejects.toBeInstanceOf(TransportStateError);
  });

  it("closes the link when stopped while starting", async () => {
    const link = new FakeLink();
    link.openDelayMs = 30;
    manager = createManager(link);

    const starting = manager.start();
    expect(manager.getState()).toBe("STARTING");
    await manager.stop();
    await starting;

    expect(link.opens).toBe(1);
    expect(link.isOpen).toBe(false);
    expect(manager.getState()).toBe("STOPPED");
    expect(manager.getStatus().write).toBeUndefined();
  });

  it("can be started again after a stop", async () => {
    const link = new FakeLink();
    manager = createManager(link);
    await manager.start();
    await manager.stop();

    manager.sendCommand("s21");
    await manager.start();
    await waitFor(() => link.written.length === 1);
    expect(link.written).toEqual(["s21"]);
    expect(link.opens).toBe(2);
  });
});
