import { MockBinding, type MockPortBinding } from "@serialport/binding-mock";
import type { BindingInterface } from "@serialport/bindings-interface";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConnectionError, ReadTimeoutError, TransientIOError, WriteError } from "../src/errors";
import { SerialPortLink } from "../src/serial-link";
import { waitFor } from "./test-helpers";

const PATH = "/dev/ttyMOCK0";

/** Mock binding that keeps every port it opens so tests can push bytes or inject faults. */
function trackingBinding(): { binding: BindingInterface<MockPortBinding>; opened: MockPortBinding[] } {
  const opened: MockPortBinding[] = [];
  return {
    opened,
    binding: {
      list: () => MockBinding.list(),
      async open(options) {
        const port = await MockBinding.open(options);
        opened.push(port);
        return port;
      }
    }
  };
}

function lastOpened(opened: MockPortBinding[]): MockPortBinding {
  const port = opened.at(-1);
  if (!port) throw new Error("no port opened");
  return port;
}

describe("SerialPortLink", () => {
  let tracked: ReturnType<typeof trackingBinding>;
  let link: SerialPortLink;

  beforeEach(() => {
    MockBinding.createPort(PATH, { echo: false, record: true });
    tracked = trackingBinding();
    link = new SerialPortLink({ path: PATH, baudRate: 115200, binding: tracked.binding });
  });

  afterEach(async () => {
    await link.close();
    MockBinding.reset();
  });

  it("fails with ConnectionError when the port does not exist", async () => {
    const missing = new SerialPortLink({ path: "/dev/ttyMISSING", baudRate: 115200, binding: tracked.binding });

    await expect(missing.open()).rejects.toBeInstanceOf(ConnectionError);
    expect(missing.isOpen).toBe(false);
  });

  it("refuses a second open while a handle is held", async () => {
    await link.open();

    await expect(link.open()).rejects.toThrow(`Serial port ${PATH} is already open`);
    expect(link.isOpen).toBe(true);
  });

  it("rejects with ReadTimeoutError when nothing arrives in time", async () => {
    await link.open();

    await expect(link.readAvailable(30)).rejects.toBeInstanceOf(ReadTimeoutError);
  });

  it("decodes a multi-byte character split across chunks", async () => {
    await link.open();
    const port = lastOpened(tracked.opened);

    port.emitData(Buffer.from([0x54, 0xc3]));
    expect(await link.readAvailable(500)).toBe("T");

    port.emitData(Buffer.from([0xa9, 0x0a]));
    expect(await link.readAvailable(500)).toBe("é\n");
  });

  it("terminates every written command with a newline", async () => {
    await link.open();

    await link.writeLine("s11");
    await link.writeLine("s51");

    expect(lastOpened(tracked.opened).recording.toString()).toBe("s11\ns51\n");
  });

  it("wakes a pending read when the link closes", async () => {
    await link.open();
    const pending = link.readAvailable(2000);

    await link.close();

    await expect(pending).rejects.toThrow(new TransientIOError("Serial port is not open"));
  });

  it("closes twice without error and can be opened again", async () => {
    await link.open();

    await link.close();
    await link.close();
    expect(link.isOpen).toBe(false);

    await link.open();
    expect(link.isOpen).toBe(true);
  });

  it("rejects a write cut short by close without raising an uncaught error", async () => {
    const uncaught: unknown[] = [];
    const onUncaught = (error: unknown) => uncaught.push(error);
    process.on("uncaughtException", onUncaught);
    try {
      await link.open();
      const write = link.writeLine("s11");

      await link.close();

      await expect(write).rejects.toThrow(new WriteError("Serial write failed: Write canceled"));
      await new Promise((res) => setTimeout(res, 20));
      expect(uncaught).toEqual([]);
    } finally {
      process.off("uncaughtException", onUncaught);
    }
  });

  it("releases the handle when the device disconnects", async () => {
    await link.open();
    const port = lastOpened(tracked.opened);
    // let the stream park its first read before the binding starts failing
    await new Promise((res) => setTimeout(res, 10));
    vi.spyOn(port, "read").mockRejectedValue(new Error("device unplugged"));

    port.emitData("TS:1\n");
    await waitFor(() => !link.isOpen);

    await expect(link.readAvailable(30)).rejects.toBeInstanceOf(TransientIOError);
    await link.open();
    expect(link.isOpen).toBe(true);
    expect(tracked.opened).toHaveLength(2);
  });
});
