/**
 * tef-memory – manage memory channel presets on TEF ESP32 based radios
 * over a serial link.
 */

// Session
export { RadioSession } from "./session.js";
export type {
  RadioSessionOptions,
  SessionState,
  BatchResult,
} from "./session.js";

// Transport
export {
  SerialTransport,
  ConnectionError,
  listSerialPorts,
} from "./transport.js";
export type {
  LineTransport,
  SerialTransportOptions,
  SerialPortDescription,
} from "./transport.js";

// Protocol
export { interpretWriteStatus } from "./response.js";
export type { WriteStatus } from "./response.js";
export {
  ConfigurationParser,
  readConfiguration,
  emptyConfiguration,
} from "./config-reader.js";
export type {
  ReadConfigurationOptions,
  ConfigurationReadResult,
} from "./config-reader.js";
export {
  writeChannel,
  validateChannelWrite,
  encodeWriteCommand,
  parseWriteResponse,
  normalizeRdsText,
} from "./channel-writer.js";
export type { ChannelWriteRequest } from "./channel-writer.js";

// Skip state, bands, display
export {
  isSkipped,
  isSkipFrequency,
  effectiveSkipFrequency,
  findChannel,
} from "./skip.js";
export {
  classifyBand,
  bandwidthTable,
  bandwidthCodeForLabel,
  formatChannelRow,
  sortedChannels,
} from "./band.js";
export type { ChannelRow } from "./band.js";

// CSV
export {
  exportCsv,
  parseCsv,
  parseImport,
  diffImport,
  planImport,
} from "./csv.js";
export type { ImportPlan, ParsedImport } from "./csv.js";

// Constants and shared types
export {
  CSV_HEADER,
  FM_BANDWIDTHS,
  AM_BANDWIDTHS,
  STATUS_BIT_MESSAGES,
  Timing,
} from "./constants.js";
export { createConsoleLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export type {
  Band,
  ChannelRecord,
  RadioConfiguration,
  WriteFailure,
  WriteResult,
  CallbackOptions,
  StatusCallback,
  ProgressCallback,
} from "./types.js";
