#!/usr/bin/env node

/**
 * tef-memory CLI – command-line interface for managing memory channels on
 * TEF ESP32 based radios.
 */

import { Command, InvalidArgumentError } from "commander";
import { RadioSession } from "./session.js";
import { listSerialPorts } from "./transport.js";
import {
  bandwidthCodeForLabel,
  classifyBand,
  formatChannelRow,
  sortedChannels,
} from "./band.js";
import { DEFAULT_BAUD_RATE, DEFAULT_TIMEOUT } from "./constants.js";
import type { RadioConfiguration, WriteResult } from "./types.js";
import { parseInteger } from "./utils.js";

interface ConnectionOpts {
  port: string;
  baud: number;
  timeout: number;
  verbose: boolean;
}

interface WriteOpts extends ConnectionOpts {
  channel: number;
  frequency: number;
  bandwidth: string;
  mode: number;
  pi: string;
  ps: string;
}

interface SkipOpts extends ConnectionOpts {
  channel: number;
}

interface ExportOpts extends ConnectionOpts {
  output: string;
}

interface ImportOpts extends ConnectionOpts {
  input: string;
  dryRun: boolean;
}

function toInt(value: string): number {
  const parsed = parseInteger(value);
  if (parsed === null) {
    throw new InvalidArgumentError(`Not a number: ${value}`);
  }
  return parsed;
}

function connectionOptions(command: Command): Command {
  return command
    .requiredOption("-p, --port <path>", "Serial port of the radio (e.g. /dev/ttyUSB0, COM3)")
    .option("-B, --baud <number>", "Baud rate", toInt, DEFAULT_BAUD_RATE)
    .option("-t, --timeout <number>", "Read timeout in seconds", toInt, DEFAULT_TIMEOUT)
    .option("-v, --verbose", "Enable verbose logging", false);
}

function createSession(opts: ConnectionOpts): RadioSession {
  return new RadioSession(opts.port, {
    baudRate: opts.baud,
    timeout: opts.timeout,
    verbose: opts.verbose,
  });
}

/** Connect and read the configuration, throwing when either fails. */
async function open(session: RadioSession): Promise<RadioConfiguration> {
  const messages: string[] = [];
  const onStatus = (message: string) => messages.push(message);

  if (!(await session.connect({ onStatus }))) {
    throw new Error(messages[messages.length - 1] ?? `Cannot connect to ${session.path}`);
  }
  const config = await session.readConfiguration({ onStatus });
  if (!config) {
    throw new Error("No response received from radio.");
  }
  for (const warning of session.readWarnings) {
    console.error(warning);
  }
  return config;
}

function printWriteResult(result: WriteResult): void {
  for (const message of result.messages) {
    console.log(message);
  }
  if (!result.success) {
    process.exitCode = 1;
  }
}

function printConfiguration(config: RadioConfiguration): void {
  const range = (r: [number, number] | null) => (r ? `${r[0]}-${r[1]} kHz` : "N/A");
  console.log(`Model:       ${config.modelId ?? "N/A"}`);
  console.log(`Version:     ${config.version ?? "N/A"}`);
  console.log(`Channels:    ${config.memoryPositions ?? "N/A"}`);
  console.log(`Skip freq:   ${config.skipFrequencyValue ?? "N/A"}`);
  console.log(`FM offset:   ${config.fmOffsetKhz ?? "N/A"}`);
  console.log(`AM range:    ${range(config.amRangeKhz)}`);
  console.log(`FM range:    ${range(config.fmRangeKhz)}\n`);

  console.log(
    `${"Ch".padStart(4)}  ${"MHz".padStart(8)}  ${"Bandwidth".padEnd(9)}  ${"Mode".padEnd(6)}  ${"PI".padEnd(4)}  ${"PS".padEnd(8)}  Status`
  );
  console.log("-".repeat(62));
  for (const record of sortedChannels(config)) {
    const row = formatChannelRow(config, record);
    console.log(
      `${String(row.channel).padStart(4)}  ${row.frequency.padStart(8)}  ${row.bandwidth.padEnd(9)}  ` +
        `${row.mode.padEnd(6)}  ${row.pi.padEnd(4)}  ${row.ps.padEnd(8)}  ${row.status}`
    );
  }
}

const program = new Command();

program
  .name("tef-memory")
  .description("CLI for managing memory channels on TEF ESP32 based radios")
  .version("1.0.0");

// ---------- ports ----------

program
  .command("ports")
  .description("List available serial ports")
  .action(async () => {
    try {
      const ports = await listSerialPorts();
      if (ports.length === 0) {
        console.log("No serial ports found.");
      }
      for (const port of ports) {
        console.log(
          `${port.path}  ${port.manufacturer ?? ""}  ${port.serialNumber ?? ""}`.trimEnd()
        );
      }
    } catch (err) {
      console.error(`Error: ${(err as Error).message}`);
      process.exitCode = 1;
    }
  });

// ---------- dump ----------

connectionOptions(
  program.command("dump").description("Read and print the radio configuration")
).action(async (opts: ConnectionOpts) => {
  const session = createSession(opts);
  try {
    printConfiguration(await open(session));
  } catch (err) {
    console.error(`Error: ${(err as Error).message}`);
    process.exitCode = 1;
  } finally {
    await session.disconnect();
  }
});

// ---------- write ----------

connectionOptions(
  program
    .command("write")
    .description("Write a single memory channel")
    .requiredOption("-c, --channel <number>", "Channel number", toInt)
    .requiredOption("-f, --frequency <kHz>", "Frequency in kHz", toInt)
    .option("-b, --bandwidth <code|label>", "Bandwidth code or label (e.g. 97kHz)", "0")
    .option("-m, --mode <number>", "0 = mono, 1 = auto stereo", toInt, 1)
    .option("--pi <code>", "RDS PI code", "")
    .option("--ps <text>", "RDS PS text", "")
).action(async (opts: WriteOpts) => {
  const session = createSession(opts);
  try {
    const config = await open(session);
    const bandwidthCode =
      parseInteger(opts.bandwidth) ??
      bandwidthCodeForLabel(classifyBand(config, opts.frequency), opts.bandwidth);
    if (bandwidthCode === null) {
      throw new Error(`Unknown bandwidth: ${opts.bandwidth}`);
    }
    printWriteResult(
      await session.writeChannel({
        channel: opts.channel,
        freqKhz: opts.frequency,
        bandwidthCode,
        monoStereoCode: opts.mode,
        pi: opts.pi,
        ps: opts.ps,
      })
    );
  } catch (err) {
    console.error(`Error: ${(err as Error).message}`);
    process.exitCode = 1;
  } finally {
    await session.disconnect();
  }
});

// ---------- skip ----------

connectionOptions(
  program
    .command("skip")
    .description("Mark a memory channel as skipped")
    .requiredOption("-c, --channel <number>", "Channel number", toInt)
).action(async (opts: SkipOpts) => {
  const session = createSession(opts);
  try {
    await open(session);
    printWriteResult(await session.skipChannel(opts.channel));
  } catch (err) {
    console.error(`Error: ${(err as Error).message}`);
    process.exitCode = 1;
  } finally {
    await session.disconnect();
  }
});

// ---------- erase ----------

connectionOptions(
  program.command("erase").description("Skip every channel from 2 to the last")
).action(async (opts: ConnectionOpts) => {
  const session = createSession(opts);
  try {
    await open(session);
    const result = await session.skipAll();
    if (result.error) {
      throw new Error(result.error);
    }
    console.log(
      `Channels newly skipped: ${result.succeeded}, Failures: ${result.failed}, ` +
        `Already skipped: ${result.alreadySkipped}`
    );
    if (result.failed > 0) {
      process.exitCode = 1;
    }
  } catch (err) {
    console.error(`Error: ${(err as Error).message}`);
    process.exitCode = 1;
  } finally {
    await session.disconnect();
  }
});

// ---------- export ----------

connectionOptions(
  program
    .command("export")
    .description("Export the channels to a CSV file")
    .requiredOption("-o, --output <file>", "CSV file to write")
).action(async (opts: ExportOpts) => {
  const session = createSession(opts);
  try {
    await open(session);
    const count = await session.exportCsvFile(opts.output);
    console.log(`Exported ${count} channels to ${opts.output}`);
  } catch (err) {
    console.error(`Error: ${(err as Error).message}`);
    process.exitCode = 1;
  } finally {
    await session.disconnect();
  }
});

// ---------- import ----------

connectionOptions(
  program
    .command("import")
    .description("Write the channels of a CSV file that differ from the radio")
    .requiredOption("-i, --input <file>", "CSV file to read")
    .option("--dry-run", "Only show which channels would be written", false)
).action(async (opts: ImportOpts) => {
  const session = createSession(opts);
  try {
    await open(session);
    const plan = await session.planImportFile(opts.input);
    for (const warning of plan.warnings) {
      console.error(warning);
    }
    if (plan.error) {
      throw new Error(plan.error);
    }
    if (plan.writes.length === 0) {
      console.log("No updates needed based on the selected CSV file.");
      return;
    }

    for (const record of plan.writes) {
      console.log(
        `Ch ${record.channel}: ${record.freqKhz} kHz, BW ${record.bandwidthCode}, ` +
          `MS ${record.monoStereoCode}, PI '${record.pi ?? ""}', PS '${record.ps ?? ""}'`
      );
    }
    if (opts.dryRun) {
      return;
    }

    const result = await session.executeWriteList(plan.writes);
    console.log(`Written: ${result.succeeded}, Failures: ${result.failed}`);
    if (result.failed > 0) {
      process.exitCode = 1;
    }
  } catch (err) {
    console.error(`Error: ${(err as Error).message}`);
    process.exitCode = 1;
  } finally {
    await session.disconnect();
  }
});

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
});
