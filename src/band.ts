import { AM_BANDWIDTHS, FM_BANDWIDTHS } from "./constants.js";
import { isSkipped } from "./skip.js";
import type { Band, ChannelRecord, RadioConfiguration } from "./types.js";

/** Classify a frequency against the band edges the radio reported. */
export function classifyBand(
  config: RadioConfiguration | null,
  freqKhz: number
): Band {
  if (!config || freqKhz <= 0) return "Unknown";
  if (
    config.skipFrequencyValue !== null &&
    freqKhz === config.skipFrequencyValue
  ) {
    return "Unknown";
  }

  const am = config.amRangeKhz;
  const fm = config.fmRangeKhz;
  if (am && am[0] <= freqKhz && freqKhz <= am[1]) return "AM";
  if (fm && fm[0] <= freqKhz && freqKhz <= fm[1]) return "FM";
  return "Unknown";
}

/** Bandwidth table for a band; both tables for an unknown band. */
export function bandwidthTable(band: Band): Readonly<Record<number, string>> {
  switch (band) {
    case "AM":
      return AM_BANDWIDTHS;
    case "FM":
      return FM_BANDWIDTHS;
    default:
      return { ...FM_BANDWIDTHS, ...AM_BANDWIDTHS };
  }
}

/** Look a bandwidth label up in the band's table. */
export function bandwidthCodeForLabel(
  band: Band,
  label: string
): number | null {
  const entry = Object.entries(bandwidthTable(band)).find(
    ([, text]) => text === label
  );
  return entry ? Number(entry[0]) : null;
}

export interface ChannelRow {
  channel: number;
  /** MHz with three decimals, "0.000" for skipped slots */
  frequency: string;
  bandwidth: string;
  mode: string;
  pi: string;
  ps: string;
  status: "OK" | "SKIP";
}

/** Render a stored channel the way the channel table shows it. */
export function formatChannelRow(
  config: RadioConfiguration | null,
  record: ChannelRecord
): ChannelRow {
  const skipped = isSkipped(config, record);
  const code = record.bandwidthCode;

  let bandwidth = `Code ${code}`;
  if (!skipped) {
    const band = classifyBand(config, record.freqKhz);
    if (band === "FM") {
      bandwidth = FM_BANDWIDTHS[code] ?? `FM Code ${code}`;
    } else if (band === "AM") {
      bandwidth = AM_BANDWIDTHS[code] ?? `AM Code ${code}`;
    }
  } else if (code === 0) {
    bandwidth = FM_BANDWIDTHS[0];
  }

  let mode = "N/A";
  if (record.monoStereoCode === 1) mode = "Stereo";
  else if (record.monoStereoCode === 0) mode = "Mono";

  return {
    channel: record.channel,
    frequency: skipped ? "0.000" : (record.freqKhz / 1000).toFixed(3),
    bandwidth,
    mode,
    pi: record.pi ?? "",
    ps: record.ps ?? "",
    status: skipped ? "SKIP" : "OK",
  };
}

/** Channels in display order (by channel number). */
export function sortedChannels(
  config: RadioConfiguration | null
): ChannelRecord[] {
  return [...(config?.channels ?? [])].sort((a, b) => a.channel - b.channel);
}
