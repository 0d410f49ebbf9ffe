import { ConnectionError, type LineTransport } from "../src/transport.js";
import type { ChannelRecord } from "../src/types.js";

export interface FakeRadioOptions {
  memoryPositions?: number;
  /** null leaves the `s:` line out of the dump */
  skipFrequencyValue?: number | null;
  channels?: ChannelRecord[];
  /** Replace the generated dump with these lines */
  dump?: string[];
  /** Stop the dump after this many channel rows */
  dumpLimit?: number;
  /** Never answer anything */
  silent?: boolean;
  /** Refuse to open */
  failOpen?: boolean;
  /** Answer every `S` command with this line */
  writeReply?: string;
  /** Drop the connection after this many `S` commands have been answered */
  disconnectAfterWrites?: number;
}

const AM_RANGE: [number, number] = [144, 27000];
const FM_RANGE: [number, number] = [64000, 108000];

/** Channels 1..n: channel 1 on 87.5 MHz, the rest on the skip frequency. */
export function makeChannels(count: number, skipFreq = 0): ChannelRecord[] {
  const channels: ChannelRecord[] = [];
  for (let ch = 1; ch <= count; ch++) {
    channels.push(
      ch === 1
        ? { channel: 1, freqKhz: 87500, bandwidthCode: 0, monoStereoCode: 1, pi: "D3A2", ps: "RADIO 1" }
        : { channel: ch, freqKhz: skipFreq, bandwidthCode: 0, monoStereoCode: 1 }
    );
  }
  return channels;
}

function channelRow(record: ChannelRecord): string {
  return [
    record.channel,
    record.freqKhz,
    record.bandwidthCode,
    record.monoStereoCode,
    record.pi ?? "",
    record.ps ?? "",
  ].join(",");
}

/**
 * In-process stand-in for a TEF ESP32 radio. Answers `s` with a dump of its
 * memory and `S` commands with a status code computed from its own limits.
 */
export class FakeRadio implements LineTransport {
  readonly sent: string[] = [];
  readonly memory = new Map<number, ChannelRecord>();
  opened: { path: string; baudRate: number; timeoutMs: number } | null = null;

  private readonly options: FakeRadioOptions;
  private readonly memoryPositions: number;
  private readonly skipFrequencyValue: number | null;
  private queue: string[] = [];
  private connected = false;
  private writes = 0;
  private dropAfterReply = false;

  constructor(options: FakeRadioOptions = {}) {
    this.options = options;
    this.memoryPositions = options.memoryPositions ?? 10;
    this.skipFrequencyValue =
      options.skipFrequencyValue === undefined ? 0 : options.skipFrequencyValue;
    const channels =
      options.channels ?? makeChannels(this.memoryPositions, this.skipFrequencyValue ?? 0);
    for (const record of channels) {
      this.memory.set(record.channel, { ...record });
    }
  }

  get isOpen(): boolean {
    return this.connected;
  }

  async open(path: string, baudRate: number, timeoutMs: number): Promise<void> {
    if (this.options.failOpen) {
      throw new ConnectionError(`Cannot open ${path}: No such file or directory`);
    }
    this.connected = true;
    this.opened = { path, baudRate, timeoutMs };
  }

  async close(): Promise<void> {
    this.connected = false;
    this.queue = [];
  }

  async sendLine(text: string): Promise<boolean> {
    if (!this.connected) return false;
    const line = text.trim();
    this.sent.push(line);
    if (!this.options.silent) {
      this.handle(line);
    }
    return true;
  }

  async readLine(): Promise<string | null> {
    if (!this.connected) return null;
    const line = this.queue.shift() ?? null;
    if (this.dropAfterReply && this.queue.length === 0) {
      this.unplug();
    }
    return line;
  }

  /** Unplug the radio */
  unplug(): void {
    this.connected = false;
    this.dropAfterReply = false;
    this.queue = [];
  }

  private handle(line: string): void {
    if (line === "s") {
      this.queue.push(...this.dump());
    } else if (line.startsWith("S")) {
      this.queue.push(this.options.writeReply ?? `S:${this.store(line.slice(1))}`);
      this.writes++;
      if (this.writes === this.options.disconnectAfterWrites) {
        this.dropAfterReply = true;
      }
    }
  }

  private dump(): string[] {
    if (this.options.dump) {
      return [...this.options.dump];
    }
    const lines = [
      "r:TEF6686_ESP32",
      "v:v2.11",
      `m:${this.memoryPositions}`,
    ];
    if (this.skipFrequencyValue !== null) {
      lines.push(`s:${this.skipFrequencyValue}`);
    }
    lines.push("o:0", `a:${AM_RANGE.join(",")}`, `f:${FM_RANGE.join(",")}`);

    const rows = [...this.memory.values()]
      .sort((a, b) => a.channel - b.channel)
      .slice(0, this.options.dumpLimit)
      .map(channelRow);
    return [...lines, ...rows];
  }

  private store(body: string): number {
    const [ch, freq, bw, ms, pi = "", ps = ""] = body.split(",");
    const channel = Number(ch);
    const freqKhz = Number(freq);
    const bandwidthCode = Number(bw);
    const monoStereoCode = Number(ms);
    const skip = this.skipFrequencyValue ?? 0;
    const isSkip = freqKhz === 0 || freqKhz === skip;

    let code = 0;
    const inBand =
      (freqKhz >= AM_RANGE[0] && freqKhz <= AM_RANGE[1]) ||
      (freqKhz >= FM_RANGE[0] && freqKhz <= FM_RANGE[1]);
    if (!isSkip && !inBand) code |= 1 << 0;
    if (channel < 1 || channel > this.memoryPositions) code |= 1 << 1;
    if (bandwidthCode > 16) code |= 1 << 2;
    if (monoStereoCode !== 0 && monoStereoCode !== 1) code |= 1 << 3;
    if (channel === 1 && isSkip) code |= 1 << 4;
    if (!/^[0-9A-F]{0,4}$/.test(pi)) code |= 1 << 5;

    if (code !== 0) {
      return code;
    }

    const record: ChannelRecord = { channel, freqKhz, bandwidthCode, monoStereoCode };
    if (pi) record.pi = pi;
    if (ps) record.ps = ps;
    this.memory.set(channel, record);
    return 1 << 7;
  }
}
