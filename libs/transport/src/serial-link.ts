import { StringDecoder } from "node:string_decoder";
import type { BindingInterface } from "@serialport/bindings-interface";
import { SerialPortStream } from "@serialport/stream";
import { SerialPort } from "serialport";
import { ConnectionError, ReadTimeoutError, TransientIOError, WriteError } from "./errors";
import { LINE_TERMINATOR, type Link } from "./link";

export interface SerialPortLinkOptions {
  path: string;
  baudRate: number;
  /** Hardware binding; the platform binding from `serialport` when omitted. */
  binding?: BindingInterface;
}

export class SerialPortLink implements Link {
  private port: SerialPortStream | null = null;
  private decoder = new StringDecoder("utf8");
  private received = "";
  private fault: Error | null = null;
  private wake: (() => void) | null = null;

  constructor(private readonly options: SerialPortLinkOptions) {}

  get isOpen(): boolean {
    return this.port?.isOpen ?? false;
  }

  async open(): Promise<void> {
    if (this.port) {
      throw new ConnectionError(`Serial port ${this.options.path} is already open`);
    }

    const { path, baudRate, binding } = this.options;
    const port: SerialPortStream = binding
      ? new SerialPortStream({ binding, path, baudRate, autoOpen: false })
      : new SerialPort({ path, baudRate, autoOpen: false });

    await new Promise<void>((resolve, reject) => {
      port.open((err) => {
        if (err) {
          reject(new ConnectionError(`Failed to open ${path} at ${String(baudRate)} baud: ${err.message}`, { cause: err }));
          return;
        }
        resolve();
      });
    });

    this.decoder = new StringDecoder("utf8");
    this.received = "";
    this.fault = null;
    port.on("data", (chunk: Buffer) => {
      if (this.port !== port) return;
      const text = this.decoder.write(chunk);
      if (!text) return;
      this.received += text;
      this.notify();
    });
    // stays attached after close: a write cancelled by close() is also emitted here
    port.on("error", (err: Error) => {
      if (this.port !== port) return;
      this.fault = err;
      this.notify();
    });
    port.on("close", () => {
      if (this.port !== port) return;
      // device went away; release the handle so open() can retry
      this.port = null;
      this.notify();
    });
    this.port = port;
  }

  async close(): Promise<void> {
    const port = this.port;
    this.port = null;
    this.notify();
    if (!port || !port.isOpen) return;

    await new Promise<void>((resolve) => {
      port.close(() => resolve());
    });
    port.removeAllListeners("data");
  }

  async readAvailable(timeoutMs: number): Promise<string> {
    if (!this.received && !this.fault && this.isOpen) {
      await new Promise<void>((resolve) => {
        const timer = setTimeout(() => {
          this.wake = null;
          resolve();
        }, timeoutMs);
        this.wake = () => {
          clearTimeout(timer);
          this.wake = null;
          resolve();
        };
      });
    }

    if (this.received) {
      const text = this.received;
      this.received = "";
      return text;
    }
    if (this.fault) {
      const fault = this.fault;
      this.fault = null;
      throw new TransientIOError(`Serial read failed: ${fault.message}`, { cause: fault });
    }
    if (!this.isOpen) {
      throw new TransientIOError("Serial port is not open");
    }
    throw new ReadTimeoutError();
  }

  async writeLine(command: string): Promise<void> {
    const port = this.port;
    if (!port || !port.isOpen) {
      throw new WriteError("Serial port is not open");
    }

    await new Promise<void>((resolve, reject) => {
      port.write(`${command}${LINE_TERMINATOR}`, (err) => {
        if (err) {
          reject(new WriteError(`Serial write failed: ${err.message}`, { cause: err }));
          return;
        }
        port.drain((drainErr) => {
          if (drainErr) {
            reject(new WriteError(`Serial drain failed: ${drainErr.message}`, { cause: drainErr }));
            return;
          }
          resolve();
        });
      });
    });
  }

  private notify(): void {
    this.wake?.();
  }
}
