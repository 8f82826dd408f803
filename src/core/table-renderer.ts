import type { CountTable } from "./count-table";
import { labelFor } from "./labels";

export interface DisplayLine {
  byte: number;
  /** Two lowercase hex digits, no prefix. */
  hex: string;
  count: number;
  label: string;
}

const HEX_WIDTH = 3;

export const formatHex = (byte: number): string => byte.toString(16).padStart(2, "0");

/** One line per byte value that occurs, ascending. Does not touch `table`. */
export const renderTable = (table: CountTable): DisplayLine[] => {
  const lines: DisplayLine[] = [];
  for (const [byte, count] of table.entries()) {
    lines.push({ byte, hex: formatHex(byte), count, label: labelFor(byte) });
  }
  return lines;
};

/** `  41 : 12: A` */
export const formatLine = (line: DisplayLine): string =>
  `  ${line.hex.padEnd(HEX_WIDTH)}: ${line.count}: ${line.label}`;

/** The text written out for a table: a blank line, then one row per byte. */
export const formatTable = (table: CountTable): string[] =>
  ["", ...renderTable(table).map(formatLine)];
