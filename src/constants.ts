/**
 * Protocol constants for the TEF ESP32 memory channel protocol.
 */

// ---------- Write status bits ----------

/** Bit 7 of an `S:<code>` reply: the channel was stored. */
export const STATUS_OK_BIT = 7;

/** Human readable meaning of each bit of an `S:<code>` reply. */
export const STATUS_BIT_MESSAGES: Readonly<Record<number, string>> = {
  0: "Frequency out of range",
  1: "Memory channel out of range",
  2: "Bandwidth out of range",
  3: "Mono/auto stereo out of range",
  4: "Memory channel 1 can't be set to skip",
  5: "Incorrect PI code",
  6: "Reserved (X)",
  7: "All ok, channel stored",
};

// ---------- Bandwidth code tables ----------

export const FM_BANDWIDTHS: Readonly<Record<number, string>> = {
  0: "auto",
  1: "56kHz",
  2: "64kHz",
  3: "72kHz",
  4: "84kHz",
  5: "97kHz",
  6: "114kHz",
  7: "133kHz",
  8: "151kHz",
  9: "168kHz",
  10: "184kHz",
  11: "200kHz",
  12: "217kHz",
  13: "236kHz",
  14: "254kHz",
  15: "287kHz",
  16: "311kHz",
};

export const AM_BANDWIDTHS: Readonly<Record<number, string>> = {
  1: "3kHz",
  2: "4kHz",
  3: "6kHz",
  4: "8kHz",
};

// ---------- Field limits ----------

export const PI_MAX_LENGTH = 4;
export const PS_MAX_LENGTH = 8;

// ---------- CSV ----------

export const CSV_HEADER = [
  "Channel",
  "Frequency kHz",
  "Bandwidth Code",
  "Mono/Stereo Code",
  "PI Code",
  "PS Text",
] as const;

// ---------- Timing (milliseconds) ----------

export const Timing = {
  /** Device boot time after the port opens, before stale buffers are flushed */
  BOOT_DELAY: 2000,
  /** Pause after every line written so the device can consume it */
  SETTLE_DELAY: 100,
  /** Read timeout for every dump line after the first */
  DUMP_LINE_TIMEOUT: 500,
  /** Final read after the last expected channel row */
  DUMP_DRAIN_TIMEOUT: 200,
  /** Pause between consecutive write commands in a batch */
  WRITE_PACING: 150,
  /** Pause between batch items that only needed a status check */
  CHECK_PACING: 10,
} as const;

export const DEFAULT_BAUD_RATE = 115200;
/** Default read timeout in seconds */
export const DEFAULT_TIMEOUT = 2;
