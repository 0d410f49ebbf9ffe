/**
 * The one rule for deciding whether a memory slot is skipped.
 *
 * Display, CSV export, write validation and import diffing all go through
 * these helpers.
 */

import type { ChannelRecord, RadioConfiguration } from "./types.js";

/** Frequency the radio uses to mark an unused slot (0 when never reported). */
export function effectiveSkipFrequency(
  config: RadioConfiguration | null
): number {
  return config?.skipFrequencyValue ?? 0;
}

/**
 * Whether writing `freqKhz` would mark a slot as skipped. Both 0 and the
 * radio's own skip value count.
 */
export function isSkipFrequency(
  config: RadioConfiguration | null,
  freqKhz: number
): boolean {
  if (freqKhz === 0) return true;
  const skipValue = config?.skipFrequencyValue;
  return skipValue !== null && skipValue !== undefined && freqKhz === skipValue;
}

export function findChannel(
  config: RadioConfiguration | null,
  channel: number
): ChannelRecord | undefined {
  return config?.channels.find((record) => record.channel === channel);
}

/** Whether a stored channel is currently in the skipped state. */
export function isSkipped(
  config: RadioConfiguration | null,
  record: Pick<ChannelRecord, "freqKhz"> | null | undefined
): boolean {
  if (!config || !record) {
    return false;
  }
  return record.freqKhz === effectiveSkipFrequency(config);
}
