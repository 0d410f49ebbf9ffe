/** One memory slot on the radio. */
export interface ChannelRecord {
  /** 1-based channel number */
  channel: number;
  freqKhz: number;
  bandwidthCode: number;
  /** 0 = mono, 1 = auto stereo */
  monoStereoCode: number;
  /** RDS PI code, upper case, up to 4 characters */
  pi?: string;
  /** RDS PS text, up to 8 characters */
  ps?: string;
}

/** Snapshot of the radio state returned by the `s` command. */
export interface RadioConfiguration {
  modelId: string | null;
  version: string | null;
  memoryPositions: number | null;
  skipFrequencyValue: number | null;
  fmOffsetKhz: number | null;
  amRangeKhz: [number, number] | null;
  fmRangeKhz: [number, number] | null;
  /** Channels in the order the radio sent them */
  channels: ChannelRecord[];
}

export type Band = "AM" | "FM" | "Unknown";

export type WriteFailure =
  | "connection"
  | "validation"
  | "timeout"
  | "protocol"
  | "rejected";

export interface WriteResult {
  success: boolean;
  /** Always populated, on success too */
  messages: string[];
  failure?: WriteFailure;
}

export type StatusCallback = (message: string) => void;
export type ProgressCallback = (value: number, maximum: number) => void;

export interface CallbackOptions {
  onStatus?: StatusCallback;
  onProgress?: ProgressCallback;
}
