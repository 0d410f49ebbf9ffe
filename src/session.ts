/**
 * RadioSession – one caller-owned connection to a TEF ESP32 radio.
 *
 * Holds the transport and the last configuration read from the radio, and
 * exposes the operations a front end needs: connect, read, write, skip,
 * erase, CSV export and differential CSV import.
 *
 * Serial I/O in Node.js is asynchronous, so every operation returns a
 * promise. Status and progress callbacks are passed per call and invoked
 * from inside it. Operations that talk to the radio run one at a time, in
 * call order.
 */

import { EventEmitter } from "node:events";
import { readFile, writeFile } from "node:fs/promises";
import { writeChannel, type ChannelWriteRequest } from "./channel-writer.js";
import { readConfiguration } from "./config-reader.js";
import {
  DEFAULT_BAUD_RATE,
  DEFAULT_TIMEOUT,
  Timing,
} from "./constants.js";
import { exportCsv, planImport, type ImportPlan } from "./csv.js";
import { resolveLogger, type Logger } from "./logger.js";
import { effectiveSkipFrequency, findChannel, isSkipped } from "./skip.js";
import { SerialTransport, type LineTransport } from "./transport.js";
import type {
  CallbackOptions,
  ChannelRecord,
  RadioConfiguration,
  WriteResult,
} from "./types.js";
import { createReporter, sleep, type Reporter } from "./utils.js";

export type SessionState = "disconnected" | "connected" | "failed";

export interface RadioSessionOptions {
  /** Serial speed. Default: 115200 */
  baudRate?: number;
  /** Read timeout in seconds. Default: 2 */
  timeout?: number;
  /** Enable verbose/debug logging. Default: false */
  verbose?: boolean;
  /** Custom logger instance */
  logger?: Logger;
  /** Transport to use instead of a serial port */
  transport?: LineTransport;
  /** Device boot wait after opening the port. Default: 2000 ms */
  bootDelayMs?: number;
  /** Wait after each line written. Default: 100 ms */
  settleDelayMs?: number;
  /** Pause between batch writes. Default: 150 ms */
  writePacingMs?: number;
  /** Pause between batch items that needed no write. Default: 10 ms */
  checkPacingMs?: number;
  /** Timeout for dump lines after the first. Default: 500 ms */
  lineTimeoutMs?: number;
  /** Re-read the configuration after writes. Default: true */
  refreshAfterWrite?: boolean;
}

export interface BatchResult {
  succeeded: number;
  failed: number;
  /** Channels that needed no write (erase only) */
  alreadySkipped: number;
  /** Whether any write command was sent */
  attempted: boolean;
  /** The connection went away part way through */
  aborted: boolean;
  /** Reason the batch could not start */
  error: string | null;
}

function emptyBatch(error: string | null = null): BatchResult {
  return {
    succeeded: 0,
    failed: 0,
    alreadySkipped: 0,
    attempted: false,
    aborted: false,
    error,
  };
}

export class RadioSession extends EventEmitter {
  public readonly path: string;
  public readonly baudRate: number;
  public readonly timeout: number;
  public readonly refreshAfterWrite: boolean;

  private readonly log: Logger;
  private readonly transport: LineTransport;
  private readonly writePacingMs: number;
  private readonly checkPacingMs: number;
  private readonly lineTimeoutMs: number;

  private config: RadioConfiguration | null = null;
  private warnings: string[] = [];
  private currentState: SessionState = "disconnected";
  private queue: Promise<void> = Promise.resolve();

  constructor(path: string, options: RadioSessionOptions = {}) {
    super();

    this.path = path;
    this.baudRate = options.baudRate ?? DEFAULT_BAUD_RATE;
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
    this.refreshAfterWrite = options.refreshAfterWrite ?? true;
    this.writePacingMs = options.writePacingMs ?? Timing.WRITE_PACING;
    this.checkPacingMs = options.checkPacingMs ?? Timing.CHECK_PACING;
    this.lineTimeoutMs = options.lineTimeoutMs ?? Timing.DUMP_LINE_TIMEOUT;
    this.log = resolveLogger(options);

    this.transport =
      options.transport ??
      new SerialTransport({
        bootDelayMs: options.bootDelayMs,
        settleDelayMs: options.settleDelayMs,
        logger: this.log,
      });
  }

  // ---------- State ----------

  get state(): SessionState {
    return this.currentState;
  }

  get isConnected(): boolean {
    return this.currentState === "connected" && this.transport.isOpen;
  }

  /** Last configuration read, or null when none is current */
  get configuration(): RadioConfiguration | null {
    return this.config;
  }

  /** Warnings from the last configuration read */
  get readWarnings(): string[] {
    return [...this.warnings];
  }

  private setState(state: SessionState): void {
    if (state === this.currentState) return;
    this.currentState = state;
    this.emit("state", state);
  }

  private dropConfiguration(): void {
    this.config = null;
    this.warnings = [];
  }

  private reporter(callbacks: CallbackOptions): Reporter {
    return createReporter(callbacks, this.log);
  }

  /** Run `task` after every operation queued before it has settled. */
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  // ---------- Connection management ----------

  /** Open the port. Resolves false (never throws) when it cannot be opened. */
  connect(callbacks: CallbackOptions = {}): Promise<boolean> {
    return this.exclusive(() => this.open(callbacks));
  }

  private async open(callbacks: CallbackOptions): Promise<boolean> {
    const report = this.reporter(callbacks);
    if (this.isConnected) {
      report.status("Already connected.");
      return true;
    }

    this.dropConfiguration();
    report.status(`Attempting to connect to ${this.path}...`);
    report.status("Waiting for device initialization...");
    try {
      await this.transport.open(this.path, this.baudRate, this.timeout * 1000);
    } catch (err) {
      report.status(`ERROR connecting to ${this.path}: ${(err as Error).message}`);
      this.setState("failed");
      return false;
    }

    report.status(`Connected to ${this.path} at ${this.baudRate} baud.`);
    this.setState("connected");
    return true;
  }

  /** Close the port and forget the configuration. */
  disconnect(callbacks: CallbackOptions = {}): Promise<void> {
    return this.exclusive(() => this.close(callbacks));
  }

  private async close(callbacks: CallbackOptions): Promise<void> {
    const report = this.reporter(callbacks);
    this.dropConfiguration();

    if (!this.transport.isOpen) {
      report.status("Already disconnected or not connected.");
      this.setState("disconnected");
      return;
    }

    try {
      await this.transport.close();
      report.status("Disconnected.");
    } catch (err) {
      report.status(`Error during disconnect: ${(err as Error).message}`);
    }
    this.setState("disconnected");
  }

  /** Drop the connection after the radio stopped answering. */
  private async fail(report: Reporter): Promise<void> {
    this.dropConfiguration();
    try {
      await this.transport.close();
    } catch (err) {
      this.log.warn(`Close after failure: ${(err as Error).message}`);
    }
    report.status("Connection failed. Reconnect to continue.");
    this.setState("failed");
  }

  // ---------- Configuration ----------

  /**
   * Read the full configuration. The previous configuration is discarded
   * first; a radio that does not answer moves the session to "failed".
   */
  readConfiguration(
    callbacks: CallbackOptions = {}
  ): Promise<RadioConfiguration | null> {
    return this.exclusive(() => this.read(callbacks));
  }

  private async read(
    callbacks: CallbackOptions
  ): Promise<RadioConfiguration | null> {
    const report = this.reporter(callbacks);
    this.dropConfiguration();

    if (!this.isConnected) {
      report.status("ERROR: Not connected.");
      return null;
    }

    const result = await readConfiguration(this.transport, {
      ...callbacks,
      timeoutMs: this.timeout * 1000,
      lineTimeoutMs: this.lineTimeoutMs,
      logger: this.log,
    });
    if (!result) {
      await this.fail(report);
      return null;
    }

    this.config = result.configuration;
    this.warnings = result.warnings;
    return this.config;
  }

  private async refresh(callbacks: CallbackOptions): Promise<void> {
    if (this.refreshAfterWrite && this.isConnected) {
      await this.read(callbacks);
    }
  }

  // ---------- Skip state ----------

  /** Whether the channel is skipped in the current configuration. */
  isChannelSkipped(channel: number): boolean {
    return isSkipped(this.config, findChannel(this.config, channel));
  }

  // ---------- Writes ----------

  private writeOne(
    request: ChannelWriteRequest,
    callbacks: CallbackOptions
  ): Promise<WriteResult> {
    if (!this.isConnected) {
      return Promise.resolve({
        success: false,
        messages: ["ERROR: Not connected."],
        failure: "connection",
      });
    }
    return writeChannel(this.transport, this.config, request, {
      ...callbacks,
      logger: this.log,
    });
  }

  private skipOne(
    channel: number,
    callbacks: CallbackOptions
  ): Promise<WriteResult> {
    if (channel === 1) {
      return Promise.resolve({
        success: false,
        messages: ["Error: Channel 1 cannot be skipped."],
        failure: "validation",
      });
    }
    const freqKhz = effectiveSkipFrequency(this.config);
    this.reporter(callbacks).status(
      `Attempting skip for Ch ${channel} using freq ${freqKhz}...`
    );
    return this.writeOne(
      { channel, freqKhz, bandwidthCode: 0, monoStereoCode: 1, pi: "", ps: "" },
      callbacks
    );
  }

  /** Write one channel, then refresh the configuration. */
  writeChannel(
    request: ChannelWriteRequest,
    callbacks: CallbackOptions = {}
  ): Promise<WriteResult> {
    return this.exclusive(async () => {
      const result = await this.writeOne(request, callbacks);
      if (result.failure !== "validation" && result.failure !== "connection") {
        await this.refresh(callbacks);
      }
      return result;
    });
  }

  /** Mark a channel as unused: skip frequency, bandwidth 0, stereo, no RDS. */
  skipChannel(
    channel: number,
    callbacks: CallbackOptions = {}
  ): Promise<WriteResult> {
    return this.exclusive(async () => {
      const result = await this.skipOne(channel, callbacks);
      if (result.failure !== "validation" && result.failure !== "connection") {
        await this.refresh(callbacks);
      }
      return result;
    });
  }

  /** Skip every channel from 2 to the last one that is not skipped yet. */
  skipAll(callbacks: CallbackOptions = {}): Promise<BatchResult> {
    return this.exclusive(() => this.eraseAll(callbacks));
  }

  private async eraseAll(callbacks: CallbackOptions): Promise<BatchResult> {
    const report = this.reporter(callbacks);
    const config = this.config;
    const maxChannels = config?.memoryPositions ?? 0;
    if (!this.isConnected || !config || maxChannels < 2) {
      const error = "Connect and read configuration first.";
      report.status(error);
      return emptyBatch(error);
    }

    report.status("Starting erase (skip all) process...");
    const result = emptyBatch();
    const total = maxChannels - 1;

    for (let i = 0; i < total; i++) {
      if (!this.isConnected) {
        result.failed += total - i;
        result.aborted = true;
        break;
      }

      const channel = i + 2;
      report.progress(i + 1, total);

      if (isSkipped(config, findChannel(config, channel))) {
        result.alreadySkipped++;
        await sleep(this.checkPacingMs);
        continue;
      }

      result.attempted = true;
      const write = await this.skipOne(channel, callbacks);
      if (write.success) {
        result.succeeded++;
      } else {
        result.failed++;
        this.log.warn(`Erase All: Failed to skip Ch ${channel}: ${write.messages.join(", ")}`);
      }
      await sleep(this.writePacingMs);
    }

    report.status(
      `Erase All complete. Channels newly skipped: ${result.succeeded}, ` +
        `Failures: ${result.failed}, Already skipped: ${result.alreadySkipped}.`
    );
    if (result.attempted) {
      await this.refresh(callbacks);
    }
    return result;
  }

  /** Write a list of channels in channel order, pacing the commands. */
  executeWriteList(
    records: readonly ChannelRecord[],
    callbacks: CallbackOptions = {}
  ): Promise<BatchResult> {
    return this.exclusive(() => this.writeList(records, callbacks));
  }

  private async writeList(
    records: readonly ChannelRecord[],
    callbacks: CallbackOptions
  ): Promise<BatchResult> {
    const report = this.reporter(callbacks);
    if (!this.isConnected) {
      const error = "Radio became unavailable before writing.";
      report.status(error);
      return emptyBatch(error);
    }

    const ordered = [...records].sort((a, b) => a.channel - b.channel);
    const total = ordered.length;
    const result = emptyBatch();

    for (let i = 0; i < total; i++) {
      if (!this.isConnected) {
        result.failed += total - i;
        result.aborted = true;
        break;
      }

      const record = ordered[i];
      result.attempted = true;
      report.status(`Import: Writing Ch ${record.channel} (${i + 1}/${total})...`);
      const write = await this.writeOne(record, callbacks);
      if (write.success) {
        result.succeeded++;
      } else {
        result.failed++;
        this.log.warn(`Import write fail Ch ${record.channel}: ${write.messages.join(", ")}`);
      }
      report.progress(i + 1, total);
      await sleep(this.writePacingMs);
    }

    report.status(
      `Import write complete. Written: ${result.succeeded}, Failures: ${result.failed}.`
    );
    if (result.attempted) {
      await this.refresh(callbacks);
    }
    return result;
  }

  // ---------- CSV ----------

  /** CSV text of the current configuration, or null when none is loaded. */
  exportCsv(): string | null {
    if (!this.config || this.config.channels.length === 0) {
      return null;
    }
    return exportCsv(this.config);
  }

  /** Write the current configuration to a CSV file; returns rows written. */
  async exportCsvFile(
    filename: string,
    callbacks: CallbackOptions = {}
  ): Promise<number> {
    const report = this.reporter(callbacks);
    const text = this.exportCsv();
    if (text === null || !this.config) {
      throw new Error("No channel data found in configuration.");
    }
    await writeFile(filename, text, "utf8");
    const count = this.config.channels.length;
    report.status(`Exported ${count} channels to ${filename}.`);
    return count;
  }

  /** Diff CSV text against the current configuration. */
  planImport(text: string): ImportPlan {
    if (!this.config) {
      return {
        writes: [],
        warnings: [],
        error: "Connect and read configuration first.",
      };
    }
    return planImport(text, this.config);
  }

  /** Read a CSV file and diff it against the current configuration. */
  async planImportFile(
    filename: string,
    callbacks: CallbackOptions = {}
  ): Promise<ImportPlan> {
    const report = this.reporter(callbacks);
    report.status(`Parsing CSV file: ${filename}...`);

    let text: string;
    try {
      text = await readFile(filename, "utf8");
    } catch (err) {
      return {
        writes: [],
        warnings: [],
        error: `File Read Error: ${(err as Error).message}`,
      };
    }

    const plan = this.planImport(text);
    for (const warning of plan.warnings) {
      this.log.warn(warning);
    }
    report.status(
      plan.error ?? `CSV parse finished. ${plan.writes.length} channel(s) to write.`
    );
    return plan;
  }
}
