/**
 * Reader for the radio's configuration dump (`s` command).
 *
 * The radio answers `s` with a handful of `x:` header lines followed by one
 * comma separated row per memory channel:
 *
 *   r:<model id>
 *   v:<firmware version>
 *   m:<memory positions>
 *   s:<skip frequency kHz>
 *   o:<fm offset kHz>
 *   a:<am low>,<am high>
 *   f:<fm low>,<fm high>
 *   <channel>,<freq kHz>,<bandwidth>,<mono/stereo>,<PI>,<PS>
 */

import { Timing } from "./constants.js";
import { nullLogger, type Logger } from "./logger.js";
import type { LineTransport } from "./transport.js";
import type {
  CallbackOptions,
  ChannelRecord,
  RadioConfiguration,
} from "./types.js";
import { createReporter, parseInteger } from "./utils.js";

/** Lines at the start of a dump that may carry banner noise. */
const HEADER_LINE_ALLOWANCE = 7;

export function emptyConfiguration(): RadioConfiguration {
  return {
    modelId: null,
    version: null,
    memoryPositions: null,
    skipFrequencyValue: null,
    fmOffsetKhz: null,
    amRangeKhz: null,
    fmRangeKhz: null,
    channels: [],
  };
}

function parseRange(text: string): [number, number] | null {
  const parts = text.split(",");
  if (parts.length < 2) return null;
  const low = parseInteger(parts[0]);
  const high = parseInteger(parts[1]);
  if (low === null || high === null) return null;
  return [low, high];
}

/** Parse a dump channel row, or null when a field is not a number. */
export function parseChannelRow(fields: string[]): ChannelRecord | null {
  const channel = parseInteger(fields[0]);
  const freqKhz = parseInteger(fields[1]);
  const bandwidthCode = parseInteger(fields[2]);
  const monoStereoCode = parseInteger(fields[3]);
  if (
    channel === null ||
    freqKhz === null ||
    bandwidthCode === null ||
    monoStereoCode === null
  ) {
    return null;
  }

  const record: ChannelRecord = {
    channel,
    freqKhz,
    bandwidthCode,
    monoStereoCode,
  };
  if (fields[4]) record.pi = fields[4].toUpperCase();
  if (fields[5]) record.ps = fields[5];
  return record;
}

/**
 * Accumulates dump lines into a configuration. Holds no I/O, so a dump can
 * be replayed line by line.
 */
export class ConfigurationParser {
  private readonly config = emptyConfiguration();
  private readonly warningList: string[] = [];
  private lineCount = 0;

  constructor(private readonly onWarning?: (warning: string) => void) {}

  get linesRead(): number {
    return this.lineCount;
  }

  get channelCount(): number {
    return this.config.channels.length;
  }

  /** Channel count declared by the `m:` line, once seen */
  get expectedChannels(): number | null {
    return this.config.memoryPositions;
  }

  get isComplete(): boolean {
    const expected = this.expectedChannels;
    return expected !== null && this.channelCount >= expected;
  }

  get warnings(): string[] {
    return [...this.warningList];
  }

  warn(message: string): void {
    this.warningList.push(message);
    this.onWarning?.(message);
  }

  feed(line: string): void {
    this.lineCount++;
    const prefix = line.slice(0, 2);
    const rest = line.slice(2).trim();

    switch (prefix) {
      case "r:":
        this.config.modelId = rest;
        return;
      case "v:":
        this.config.version = rest;
        return;
      case "m:": {
        const value = parseInteger(rest);
        if (value === null) {
          this.warn(`Warning: Could not parse memory positions: ${line}`);
        } else {
          this.config.memoryPositions = value;
        }
        return;
      }
      case "s:": {
        const value = parseInteger(rest);
        if (value === null) {
          this.warn(`Warning: Could not parse skip frequency: ${line}`);
        } else {
          this.config.skipFrequencyValue = value;
        }
        return;
      }
      case "o:": {
        const value = parseInteger(rest.split(/[,:]/)[0]);
        if (value === null) {
          this.warn(`Warning: Could not parse FM offset: ${line}`);
        } else {
          this.config.fmOffsetKhz = value;
        }
        return;
      }
      case "a:": {
        const range = parseRange(rest);
        if (range === null) {
          this.warn(`Warning: Could not parse AM range: ${line}`);
        } else {
          this.config.amRangeKhz = range;
        }
        return;
      }
      case "f:": {
        const range = parseRange(rest);
        if (range === null) {
          this.warn(`Warning: Could not parse FM range: ${line}`);
        } else {
          this.config.fmRangeKhz = range;
        }
        return;
      }
      default:
        this.feedChannelRow(line);
    }
  }

  /** Snapshot of what has been accumulated so far. */
  result(): RadioConfiguration {
    return {
      ...this.config,
      amRangeKhz: this.config.amRangeKhz && [...this.config.amRangeKhz],
      fmRangeKhz: this.config.fmRangeKhz && [...this.config.fmRangeKhz],
      channels: this.config.channels.map((record) => ({ ...record })),
    };
  }

  private feedChannelRow(line: string): void {
    const fields = line.split(",");
    if (fields.length !== 6) {
      if (this.lineCount > HEADER_LINE_ALLOWANCE) {
        this.warn(`Warning: Ignoring unexpected line: ${line}`);
      }
      return;
    }

    const record = parseChannelRow(fields);
    if (record === null) {
      this.warn(`Warning: Could not parse channel data: ${line}`);
      return;
    }
    this.config.channels.push(record);
  }
}

// ---------- Reading from the radio ----------

export interface ReadConfigurationOptions extends CallbackOptions {
  /** Timeout for the first line in milliseconds */
  timeoutMs: number;
  /** Timeout for every later line. Default: 500 */
  lineTimeoutMs?: number;
  /** Timeout of the read after the last channel. Default: 200 */
  drainTimeoutMs?: number;
  logger?: Logger;
}

export interface ConfigurationReadResult {
  configuration: RadioConfiguration;
  warnings: string[];
}

/**
 * Send `s` and collect the dump.
 *
 * Resolves null when the command could not be sent or the radio never
 * answered. A dump that stops early resolves with the channels received so
 * far and a warning.
 */
export async function readConfiguration(
  transport: LineTransport,
  options: ReadConfigurationOptions
): Promise<ConfigurationReadResult | null> {
  const log = options.logger ?? nullLogger;
  const report = createReporter(options, log);
  const lineTimeoutMs = options.lineTimeoutMs ?? Timing.DUMP_LINE_TIMEOUT;
  const drainTimeoutMs = options.drainTimeoutMs ?? Timing.DUMP_DRAIN_TIMEOUT;

  if (!(await transport.sendLine("s"))) {
    report.status("Failed to send configuration read command ('s').");
    return null;
  }

  report.status("Reading configuration from radio...");
  const parser = new ConfigurationParser((warning) => {
    log.warn(warning);
    report.status(warning);
  });

  for (;;) {
    const timeout = parser.linesRead === 0 ? options.timeoutMs : lineTimeoutMs;
    const line = await transport.readLine(timeout);

    if (line === null) {
      if (parser.linesRead === 0) {
        report.status("ERROR: No response received from radio for 's' command.");
        return null;
      }
      const expected = parser.expectedChannels;
      if (expected !== null && parser.channelCount < expected) {
        parser.warn(
          `Warning: Read timeout before receiving all expected channels (${parser.channelCount}/${expected}).`
        );
      }
      break;
    }

    const before = parser.channelCount;
    parser.feed(line);

    const expected = parser.expectedChannels;
    if (parser.channelCount > before && expected) {
      report.progress(parser.channelCount, expected);
    }

    if (parser.isComplete) {
      await transport.readLine(drainTimeoutMs);
      break;
    }
  }

  const configuration = parser.result();
  report.status(
    `Configuration read complete. Found ${configuration.memoryPositions ?? "?"} channels.`
  );
  return { configuration, warnings: parser.warnings };
}
