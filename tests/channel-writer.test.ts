import { describe, it, expect } from "vitest";
import {
  encodeWriteCommand,
  normalizeRdsText,
  parseWriteResponse,
  validateChannelWrite,
  writeChannel,
} from "../src/channel-writer.js";
import { emptyConfiguration } from "../src/config-reader.js";
import type { RadioConfiguration } from "../src/types.js";
import { FakeRadio, type FakeRadioOptions } from "./fake-radio.js";

function config(overrides: Partial<RadioConfiguration> = {}): RadioConfiguration {
  return {
    ...emptyConfiguration(),
    memoryPositions: 10,
    skipFrequencyValue: 500,
    amRangeKhz: [144, 27000],
    fmRangeKhz: [64000, 108000],
    ...overrides,
  };
}

async function connectedRadio(options: FakeRadioOptions = {}): Promise<FakeRadio> {
  const radio = new FakeRadio(options);
  await radio.open("/dev/ttyFAKE", 115200, 2000);
  return radio;
}

describe("encodeWriteCommand", () => {
  it("encodes all six fields", () => {
    expect(
      encodeWriteCommand({
        channel: 3,
        freqKhz: 98100,
        bandwidthCode: 5,
        monoStereoCode: 0,
        pi: "d3a2",
        ps: "CLASSIC FM",
      })
    ).toBe("S3,98100,5,0,D3A2,CLASSIC ");
  });

  it("leaves absent PI and PS empty", () => {
    expect(
      encodeWriteCommand({ channel: 2, freqKhz: 0, bandwidthCode: 0, monoStereoCode: 1 })
    ).toBe("S2,0,0,1,,");
  });
});

describe("normalizeRdsText", () => {
  it("flags truncation", () => {
    expect(normalizeRdsText("abcde", "123456789")).toEqual({
      pi: "ABCD",
      ps: "12345678",
      piTruncated: true,
      psTruncated: true,
    });
  });
});

describe("validateChannelWrite", () => {
  const base = { channel: 2, freqKhz: 98100, bandwidthCode: 0, monoStereoCode: 1 };

  it("accepts a valid request", () => {
    expect(validateChannelWrite(base, config())).toBeNull();
  });

  it.each([
    [{ channel: 0 }, "Invalid channel number (1-10)."],
    [{ channel: 11 }, "Invalid channel number (1-10)."],
    [{ channel: 2.5 }, "Invalid channel number (1-10)."],
    [{ freqKhz: -1 }, "Invalid frequency (must be >= 0 kHz)."],
    [{ channel: 1, freqKhz: 0 }, "ERROR: Channel 1 cannot be set to skip."],
    [{ channel: 1, freqKhz: 500 }, "ERROR: Channel 1 cannot be set to skip."],
    [{ bandwidthCode: -2 }, "Invalid bandwidth code."],
    [{ monoStereoCode: 2 }, "Invalid mono/stereo code (must be 0 or 1)."],
  ])("rejects %o", (change, message) => {
    expect(validateChannelWrite({ ...base, ...change }, config())).toEqual({
      success: false,
      messages: [message],
      failure: "validation",
    });
  });

  it("has no upper channel bound without a configuration", () => {
    expect(validateChannelWrite({ ...base, channel: 400 }, null)).toBeNull();
  });
});

describe("parseWriteResponse", () => {
  it("decodes a success reply", () => {
    expect(parseWriteResponse("S:128")).toEqual({
      success: true,
      messages: ["All ok, channel stored"],
    });
  });

  it("marks device failures as rejected", () => {
    expect(parseWriteResponse("S:1")).toEqual({
      success: false,
      messages: ["Frequency out of range"],
      failure: "rejected",
    });
  });

  it("rejects other reply shapes", () => {
    expect(parseWriteResponse("OK")).toEqual({
      success: false,
      messages: ["Unexpected response format: OK"],
      failure: "protocol",
    });
    expect(parseWriteResponse("S:x")).toEqual({
      success: false,
      messages: ["Could not parse return code: S:x"],
      failure: "protocol",
    });
  });
});

describe("writeChannel", () => {
  it("rejects channel 1 on frequency 0 before sending anything", async () => {
    const radio = await connectedRadio();
    const result = await writeChannel(radio, config(), {
      channel: 1,
      freqKhz: 0,
      bandwidthCode: 0,
      monoStereoCode: 1,
    });

    expect(result.failure).toBe("validation");
    expect(radio.sent).toEqual([]);
  });

  it("writes channel 1 on 500 kHz when that is not the skip value", async () => {
    const radio = await connectedRadio({ skipFrequencyValue: null });
    const result = await writeChannel(radio, config({ skipFrequencyValue: null }), {
      channel: 1,
      freqKhz: 500,
      bandwidthCode: 0,
      monoStereoCode: 1,
    });

    expect(radio.sent).toEqual(["S1,500,0,1,,"]);
    expect(result).toEqual({ success: true, messages: ["All ok, channel stored"] });
  });

  it("reports truncation as status and still writes", async () => {
    const radio = await connectedRadio();
    const statuses: string[] = [];
    const result = await writeChannel(
      radio,
      config(),
      { channel: 4, freqKhz: 98100, bandwidthCode: 5, monoStereoCode: 1, pi: "abcdef", ps: "LONG NAME FM" },
      { onStatus: (message) => statuses.push(message) }
    );

    expect(result.success).toBe(true);
    expect(radio.sent).toEqual(["S4,98100,5,1,ABCD,LONG NAM"]);
    expect(statuses).toEqual([
      "Warning: PI code truncated.",
      "Warning: PS text truncated.",
      "Sending: S4,98100,5,1,ABCD,LONG NAM",
      "Write Ch 4 Response: All ok, channel stored",
    ]);
  });

  it("tells the caller when 0 is sent to a radio with another skip value", async () => {
    const radio = await connectedRadio({ skipFrequencyValue: 500 });
    const statuses: string[] = [];
    await writeChannel(
      radio,
      config(),
      { channel: 3, freqKhz: 0, bandwidthCode: 0, monoStereoCode: 1 },
      { onStatus: (message) => statuses.push(message) }
    );
    expect(statuses[0]).toBe("Info: Sending frequency 0 for skip, but radio uses 500 kHz.");
  });

  it("returns every reason the radio gives", async () => {
    const radio = await connectedRadio();
    const result = await writeChannel(radio, config({ memoryPositions: 100 }), {
      channel: 50,
      freqKhz: 30000,
      bandwidthCode: 20,
      monoStereoCode: 1,
    });

    expect(result).toEqual({
      success: false,
      messages: [
        "Frequency out of range",
        "Memory channel out of range",
        "Bandwidth out of range",
      ],
      failure: "rejected",
    });
  });

  it("fails with a timeout when no reply arrives", async () => {
    const radio = await connectedRadio({ silent: true });
    const result = await writeChannel(radio, config(), {
      channel: 2,
      freqKhz: 98100,
      bandwidthCode: 0,
      monoStereoCode: 1,
    });
    expect(result).toEqual({
      success: false,
      messages: ["No response received after 'S' command."],
      failure: "timeout",
    });
  });

  it("fails on an unexpected reply", async () => {
    const radio = await connectedRadio({ writeReply: "ERR" });
    const result = await writeChannel(radio, config(), {
      channel: 2,
      freqKhz: 98100,
      bandwidthCode: 0,
      monoStereoCode: 1,
    });
    expect(result.failure).toBe("protocol");
    expect(result.messages).toEqual(["Unexpected response format: ERR"]);
  });

  it("fails when not connected", async () => {
    const radio = new FakeRadio();
    const result = await writeChannel(radio, config(), {
      channel: 2,
      freqKhz: 98100,
      bandwidthCode: 0,
      monoStereoCode: 1,
    });
    expect(result).toEqual({
      success: false,
      messages: ["ERROR: Not connected."],
      failure: "connection",
    });
  });
});
