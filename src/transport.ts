/**
 * Line oriented serial transport for the radio.
 *
 * Owns the serial port handle and turns the byte stream into trimmed text
 * lines. Reads never throw: a timeout, an I/O error or a closed port all
 * resolve to `null`, which callers treat as "no response".
 */

import { SerialPortStream } from "@serialport/stream";
import { autoDetect } from "@serialport/bindings-cpp";
import { ReadlineParser } from "@serialport/parser-readline";
import type {
  BindingInterface,
  PortInfo,
} from "@serialport/bindings-interface";
import { DEFAULT_TIMEOUT, Timing } from "./constants.js";
import { nullLogger, type Logger } from "./logger.js";
import { sleep } from "./utils.js";

// ---------- Errors ----------

export class ConnectionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConnectionError";
  }
}

// ---------- Transport contract ----------

export interface LineTransport {
  readonly isOpen: boolean;
  /** Open the port, wait for the device to boot and flush stale data */
  open(path: string, baudRate: number, timeoutMs: number): Promise<void>;
  close(): Promise<void>;
  /** Write one line. Resolves false instead of throwing on failure. */
  sendLine(text: string): Promise<boolean>;
  /** Next received line, or null on timeout or error. */
  readLine(timeoutMs?: number): Promise<string | null>;
}

export interface SerialTransportOptions {
  /** Serial binding. Default: the platform binding */
  binding?: BindingInterface;
  /** Wait after opening before buffers are flushed. Default: 2000 */
  bootDelayMs?: number;
  /** Wait after each written line. Default: 100 */
  settleDelayMs?: number;
  logger?: Logger;
}

interface PendingRead {
  resolve: (line: string | null) => void;
}

// ---------- Serial implementation ----------

export class SerialTransport implements LineTransport {
  private readonly binding: BindingInterface;
  private readonly bootDelayMs: number;
  private readonly settleDelayMs: number;
  private readonly log: Logger;

  private port: SerialPortStream | null = null;
  private parser: ReadlineParser | null = null;
  private path = "";
  private timeoutMs: number = DEFAULT_TIMEOUT * 1000;
  private lines: string[] = [];
  private pending: PendingRead | null = null;

  constructor(options: SerialTransportOptions = {}) {
    this.binding = options.binding ?? autoDetect();
    this.bootDelayMs = options.bootDelayMs ?? Timing.BOOT_DELAY;
    this.settleDelayMs = options.settleDelayMs ?? Timing.SETTLE_DELAY;
    this.log = options.logger ?? nullLogger;
  }

  get isOpen(): boolean {
    return this.port !== null && this.port.isOpen;
  }

  async open(path: string, baudRate: number, timeoutMs: number): Promise<void> {
    if (this.isOpen) {
      return;
    }

    const port = new SerialPortStream({
      binding: this.binding,
      path,
      baudRate,
      autoOpen: false,
    });

    await new Promise<void>((resolve, reject) => {
      port.open((err) => {
        if (err) {
          reject(new ConnectionError(`Cannot open ${path}: ${err.message}`));
        } else {
          resolve();
        }
      });
    });

    this.port = port;
    this.path = path;
    this.timeoutMs = timeoutMs;
    this.lines = [];

    port.on("error", (err: Error) => {
      this.log.debug(`[${this.path}] Serial error: ${err.message}`);
      this.settlePending(null);
    });
    port.on("close", () => {
      this.log.debug(`[${this.path}] Port closed`);
      this.settlePending(null);
    });
    this.attachParser(port);

    this.log.debug(`[${path}] Opened at ${baudRate} baud, waiting for boot`);
    await sleep(this.bootDelayMs);

    try {
      await new Promise<void>((resolve, reject) => {
        port.flush((err) => (err ? reject(err) : resolve()));
      });
    } catch (err) {
      await this.close();
      throw new ConnectionError(
        `Cannot flush ${path}: ${(err as Error).message}`
      );
    }

    // A fresh parser drops any partial boot banner line
    this.attachParser(port);
    this.lines = [];
  }

  async close(): Promise<void> {
    const port = this.port;
    this.port = null;
    this.detachParser(port);
    this.lines = [];
    this.settlePending(null);

    if (!port || !port.isOpen) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      port.close((err) => {
        if (err) {
          reject(new ConnectionError(`Cannot close ${this.path}: ${err.message}`));
        } else {
          resolve();
        }
      });
    });
    this.log.debug(`[${this.path}] Closed`);
  }

  async sendLine(text: string): Promise<boolean> {
    const port = this.port;
    if (!port || !port.isOpen) {
      this.log.debug("Not connected to send command.");
      return false;
    }

    const line = text.endsWith("\n") ? text : `${text}\n`;
    try {
      await new Promise<void>((resolve, reject) => {
        port.write(line, "utf8", (err) => (err ? reject(err) : resolve()));
      });
      await new Promise<void>((resolve, reject) => {
        port.drain((err) => (err ? reject(err) : resolve()));
      });
    } catch (err) {
      this.log.error(
        `[${this.path}] Error sending '${text.trim()}': ${(err as Error).message}`
      );
      return false;
    }

    this.log.debug(`[${this.path}] SENT: ${text.trim()}`);
    await sleep(this.settleDelayMs);
    return true;
  }

  readLine(timeoutMs: number = this.timeoutMs): Promise<string | null> {
    const buffered = this.lines.shift();
    if (buffered !== undefined) {
      return Promise.resolve(buffered);
    }
    if (!this.isOpen) {
      return Promise.resolve(null);
    }
    // Only one reader at a time: a newer read supersedes an older one
    this.settlePending(null);

    return new Promise<string | null>((resolve) => {
      const timer = setTimeout(() => {
        this.pending = null;
        resolve(null);
      }, timeoutMs);

      this.pending = {
        resolve: (line) => {
          clearTimeout(timer);
          this.pending = null;
          resolve(line);
        },
      };
    });
  }

  private attachParser(port: SerialPortStream): void {
    this.detachParser(port);
    const parser = port.pipe(
      new ReadlineParser({ delimiter: "\n", encoding: "utf8" })
    );
    parser.on("data", (data: string | Buffer) => {
      const line = data.toString().trim();
      this.log.debug(`[${this.path}] RECD: ${line}`);
      if (this.pending) {
        this.pending.resolve(line);
      } else {
        this.lines.push(line);
      }
    });
    this.parser = parser;
  }

  private detachParser(port: SerialPortStream | null): void {
    if (!this.parser) return;
    this.parser.removeAllListeners("data");
    if (port) {
      port.unpipe(this.parser);
    }
    this.parser = null;
  }

  private settlePending(line: string | null): void {
    if (this.pending) {
      this.pending.resolve(line);
    }
  }
}

// ---------- Port enumeration ----------

export interface SerialPortDescription {
  path: string;
  manufacturer?: string;
  serialNumber?: string;
}

/** List the serial ports the binding can see. */
export async function listSerialPorts(
  binding: BindingInterface = autoDetect()
): Promise<SerialPortDescription[]> {
  const ports: PortInfo[] = await binding.list();
  return ports.map((port) => ({
    path: port.path,
    manufacturer: port.manufacturer,
    serialNumber: port.serialNumber,
  }));
}
