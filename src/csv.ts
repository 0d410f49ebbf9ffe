/**
 * CSV export and differential import of channel presets.
 *
 * Import compares the file against the live configuration and returns only
 * the channels whose stored values would actually change, so that an
 * unchanged file causes no flash writes.
 */

import { CSV_HEADER } from "./constants.js";
import { normalizeRdsText } from "./channel-writer.js";
import { sortedChannels } from "./band.js";
import { isSkipFrequency, isSkipped } from "./skip.js";
import type { ChannelRecord, RadioConfiguration } from "./types.js";
import { parseInteger } from "./utils.js";

const BOM = "\uFEFF";
const LINE_END = "\r\n";

// ---------- Low level codec ----------

function escapeField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsvRow(fields: ReadonlyArray<string | number>): string {
  return fields.map((field) => escapeField(String(field))).join(",");
}

/**
 * Split CSV text into rows of fields. Handles quoted fields with embedded
 * commas, quotes and newlines, CRLF or LF row ends and a leading BOM.
 */
export function parseCsv(text: string): string[][] {
  const source = text.startsWith(BOM) ? text.slice(1) : text;
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let inQuotes = false;
  let rowStarted = false;

  for (let i = 0; i < source.length; i++) {
    const ch = source[i];

    if (inQuotes) {
      if (ch === '"') {
        if (source[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
      rowStarted = true;
    } else if (ch === ",") {
      row.push(field);
      field = "";
      rowStarted = true;
    } else if (ch === "\r" || ch === "\n") {
      if (ch === "\r" && source[i + 1] === "\n") i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = "";
      rowStarted = false;
    } else {
      field += ch;
      rowStarted = true;
    }
  }

  if (rowStarted) {
    row.push(field);
    rows.push(row);
  }
  return rows;
}

// ---------- Export ----------

/** Render the configuration's channels as CSV, sorted by channel. */
export function exportCsv(config: RadioConfiguration): string {
  const lines = [formatCsvRow(CSV_HEADER)];
  for (const record of sortedChannels(config)) {
    lines.push(
      formatCsvRow([
        record.channel,
        record.freqKhz,
        record.bandwidthCode,
        record.monoStereoCode,
        record.pi ?? "",
        record.ps ?? "",
      ])
    );
  }
  return lines.join(LINE_END) + LINE_END;
}

// ---------- Import ----------

export interface ParsedImport {
  /** Valid rows by channel; a later row for the same channel wins */
  records: Map<number, ChannelRecord>;
  warnings: string[];
  /** Fatal problem with the file as a whole */
  error: string | null;
}

export interface ImportPlan {
  /** Channels to write, by channel number */
  writes: ChannelRecord[];
  warnings: string[];
  error: string | null;
}

function headerMatches(header: string[]): boolean {
  return (
    header.length === CSV_HEADER.length &&
    CSV_HEADER.every((name, i) => header[i] === name)
  );
}

/** Parse and validate an import file against the live configuration. */
export function parseImport(
  text: string,
  config: RadioConfiguration
): ParsedImport {
  const records = new Map<number, ChannelRecord>();
  const warnings: string[] = [];
  const rows = parseCsv(text);

  if (rows.length === 0) {
    return { records, warnings, error: "CSV file is empty." };
  }
  const header = rows[0];
  if (!headerMatches(header)) {
    return {
      records,
      warnings,
      error: `Invalid CSV header. Expected: ${CSV_HEADER.join(",")}, Found: ${header.join(",")}`,
    };
  }

  const maxChannels = config.memoryPositions;
  if (maxChannels === null) {
    return {
      records,
      warnings,
      error: "Radio did not report its memory positions. Read the configuration again.",
    };
  }

  rows.slice(1).forEach((row, index) => {
    const prefix = `Row ${index + 2}:`;

    if (!row.some((field) => field.trim() !== "")) {
      warnings.push(`${prefix} Skipped (blank row).`);
      return;
    }
    if (row.length !== CSV_HEADER.length) {
      warnings.push(
        `${prefix} Skipped (Expected ${CSV_HEADER.length} columns, found ${row.length}).`
      );
      return;
    }

    const channel = parseInteger(row[0]);
    const freqKhz = parseInteger(row[1]);
    const bandwidthCode = parseInteger(row[2]);
    const monoStereoCode = parseInteger(row[3]);
    if (
      channel === null ||
      freqKhz === null ||
      bandwidthCode === null ||
      monoStereoCode === null
    ) {
      warnings.push(
        `${prefix} Skipped (Invalid number format in one or more fields: ${row.slice(0, 4).join(",")}).`
      );
      return;
    }

    if (channel < 1 || channel > maxChannels) {
      warnings.push(
        `${prefix} Skipped (Channel ${channel} out of valid range 1-${maxChannels}).`
      );
      return;
    }
    if (freqKhz < 0) {
      warnings.push(`${prefix} Skipped (Frequency ${freqKhz} cannot be negative).`);
      return;
    }
    if (bandwidthCode < 0) {
      warnings.push(
        `${prefix} Skipped (Bandwidth code ${bandwidthCode} cannot be negative).`
      );
      return;
    }
    if (monoStereoCode !== 0 && monoStereoCode !== 1) {
      warnings.push(
        `${prefix} Skipped (Invalid Mono/Stereo code ${monoStereoCode}, must be 0 or 1).`
      );
      return;
    }

    // PS is kept verbatim, leading spaces included
    const rawPi = row[4].trim().toUpperCase();
    const rawPs = row[5];
    const { pi, ps, piTruncated, psTruncated } = normalizeRdsText(rawPi, rawPs);
    if (piTruncated) {
      warnings.push(`${prefix} PI '${rawPi}' truncated to '${pi}' (max 4 chars).`);
    }
    if (psTruncated) {
      warnings.push(`${prefix} PS '${rawPs}' truncated to '${ps}' (max 8 chars).`);
    }

    if (channel === 1 && isSkipFrequency(config, freqKhz)) {
      warnings.push(
        `${prefix} Skipped (Channel 1 cannot be set to skip frequency ${freqKhz} via import).`
      );
      return;
    }

    const record: ChannelRecord = { channel, freqKhz, bandwidthCode, monoStereoCode };
    if (pi) record.pi = pi;
    if (ps) record.ps = ps;
    records.set(channel, record);
  });

  return { records, warnings, error: null };
}

/**
 * Pick the imported records that differ from what the radio holds.
 *
 * A row that only differs in how "skipped" is spelled (0 against the radio's
 * own skip value) for a slot that is already skipped is not written.
 */
export function diffImport(
  records: ReadonlyMap<number, ChannelRecord>,
  config: RadioConfiguration
): ChannelRecord[] {
  const live = new Map(config.channels.map((record) => [record.channel, record]));
  const writes: ChannelRecord[] = [];

  for (const imported of records.values()) {
    const current = live.get(imported.channel);
    const importedIsSkip = isSkipFrequency(config, imported.freqKhz);

    if (!current) {
      if (!importedIsSkip) writes.push(imported);
      continue;
    }

    const othersMatch =
      imported.bandwidthCode === current.bandwidthCode &&
      imported.monoStereoCode === current.monoStereoCode &&
      (imported.pi ?? "").toUpperCase() === (current.pi ?? "").toUpperCase() &&
      (imported.ps ?? "") === (current.ps ?? "");

    if (othersMatch && imported.freqKhz === current.freqKhz) {
      continue;
    }
    if (othersMatch && importedIsSkip && isSkipped(config, current)) {
      continue;
    }
    writes.push(imported);
  }

  return writes.sort((a, b) => a.channel - b.channel);
}

/** Parse an import file and diff it in one step. */
export function planImport(
  text: string,
  config: RadioConfiguration
): ImportPlan {
  const parsed = parseImport(text, config);
  if (parsed.error !== null) {
    return { writes: [], warnings: parsed.warnings, error: parsed.error };
  }
  return {
    writes: diffImport(parsed.records, config),
    warnings: parsed.warnings,
    error: null,
  };
}
