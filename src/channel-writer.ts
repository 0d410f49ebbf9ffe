/**
 * Single channel writes (`S` command).
 */

import { PI_MAX_LENGTH, PS_MAX_LENGTH } from "./constants.js";
import { nullLogger, type Logger } from "./logger.js";
import { interpretWriteStatus } from "./response.js";
import { isSkipFrequency } from "./skip.js";
import type { LineTransport } from "./transport.js";
import type {
  CallbackOptions,
  ChannelRecord,
  RadioConfiguration,
  WriteResult,
} from "./types.js";
import { createReporter, parseInteger } from "./utils.js";

export type ChannelWriteRequest = ChannelRecord;

export interface WriteChannelOptions extends CallbackOptions {
  logger?: Logger;
}

/**
 * Check a write request against the loaded configuration. Returns the
 * failure, or null when the request may be sent.
 */
export function validateChannelWrite(
  request: ChannelWriteRequest,
  config: RadioConfiguration | null
): WriteResult | null {
  const maxChannels = config?.memoryPositions ?? null;
  const { channel, freqKhz, bandwidthCode, monoStereoCode } = request;

  if (
    !Number.isInteger(channel) ||
    channel < 1 ||
    (maxChannels !== null && maxChannels > 0 && channel > maxChannels)
  ) {
    return invalid(`Invalid channel number (1-${maxChannels || "?"}).`);
  }
  if (!Number.isInteger(freqKhz) || freqKhz < 0) {
    return invalid("Invalid frequency (must be >= 0 kHz).");
  }
  if (channel === 1 && isSkipFrequency(config, freqKhz)) {
    return invalid("ERROR: Channel 1 cannot be set to skip.");
  }
  if (!Number.isInteger(bandwidthCode) || bandwidthCode < 0) {
    return invalid("Invalid bandwidth code.");
  }
  if (monoStereoCode !== 0 && monoStereoCode !== 1) {
    return invalid("Invalid mono/stereo code (must be 0 or 1).");
  }
  return null;
}

function invalid(message: string): WriteResult {
  return { success: false, messages: [message], failure: "validation" };
}

export interface NormalizedText {
  pi: string;
  ps: string;
  piTruncated: boolean;
  psTruncated: boolean;
}

/** Upper-case PI and cut PI/PS to the lengths the radio stores. */
export function normalizeRdsText(pi = "", ps = ""): NormalizedText {
  const piUpper = pi.toUpperCase();
  return {
    pi: piUpper.slice(0, PI_MAX_LENGTH),
    ps: ps.slice(0, PS_MAX_LENGTH),
    piTruncated: piUpper.length > PI_MAX_LENGTH,
    psTruncated: ps.length > PS_MAX_LENGTH,
  };
}

/** `S<ch>,<freq>,<bw>,<ms>,<PI>,<PS>`, with PI/PS already normalized */
export function encodeWriteCommand(record: ChannelWriteRequest): string {
  const { pi, ps } = normalizeRdsText(record.pi, record.ps);
  return `S${record.channel},${record.freqKhz},${record.bandwidthCode},${record.monoStereoCode},${pi},${ps}`;
}

/** Parse an `S:<code>` reply into the decoded write result. */
export function parseWriteResponse(line: string): WriteResult {
  if (!line.startsWith("S:")) {
    return {
      success: false,
      messages: [`Unexpected response format: ${line}`],
      failure: "protocol",
    };
  }

  const code = parseInteger(line.slice(2));
  if (code === null) {
    return {
      success: false,
      messages: [`Could not parse return code: ${line}`],
      failure: "protocol",
    };
  }

  const status = interpretWriteStatus(code);
  return status.success
    ? { success: true, messages: status.messages }
    : { success: false, messages: status.messages, failure: "rejected" };
}

/**
 * Validate, send and confirm a single channel write.
 *
 * Validation failures never touch the port. Every outcome, including
 * success, carries at least one message.
 */
export async function writeChannel(
  transport: LineTransport,
  config: RadioConfiguration | null,
  request: ChannelWriteRequest,
  options: WriteChannelOptions = {}
): Promise<WriteResult> {
  const log = options.logger ?? nullLogger;
  const report = createReporter(options, log);

  if (!transport.isOpen) {
    return {
      success: false,
      messages: ["ERROR: Not connected."],
      failure: "connection",
    };
  }

  const rejection = validateChannelWrite(request, config);
  if (rejection) {
    return rejection;
  }

  const skipValue = config?.skipFrequencyValue ?? null;
  if (request.freqKhz === 0 && skipValue !== null && skipValue !== 0) {
    report.status(
      `Info: Sending frequency 0 for skip, but radio uses ${skipValue} kHz.`
    );
  }

  const text = normalizeRdsText(request.pi, request.ps);
  if (text.piTruncated) {
    report.status("Warning: PI code truncated.");
  }
  if (text.psTruncated) {
    report.status("Warning: PS text truncated.");
  }

  const command = encodeWriteCommand(request);
  report.status(`Sending: ${command}`);
  if (!(await transport.sendLine(command))) {
    return {
      success: false,
      messages: ["Failed to send 'S' command."],
      failure: "connection",
    };
  }

  const line = await transport.readLine();
  if (line === null) {
    return {
      success: false,
      messages: ["No response received after 'S' command."],
      failure: "timeout",
    };
  }

  const result = parseWriteResponse(line);
  if (result.failure === "protocol") {
    report.status(`ERROR: ${result.messages[0]}`);
  } else {
    report.status(
      `Write Ch ${request.channel} Response: ${result.messages.join(", ")}`
    );
  }
  return result;
}
