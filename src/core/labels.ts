import fs from "node:fs";
import path, { dirname } from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = dirname(fileURLToPath(import.meta.url));

const LABEL_FILE = path.join(__dirname, "../../data/labels.json");

const parseLabels = (raw: unknown): ReadonlyMap<number, string> => {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new Error(`${LABEL_FILE}: expected an object of hex byte to label`);
  }
  const labels = new Map<number, string>();
  for (const [key, value] of Object.entries(raw)) {
    if (!/^[0-9a-f]{2}$/.test(key) || typeof value !== "string") {
      throw new Error(`${LABEL_FILE}: bad entry "${key}"`);
    }
    labels.set(Number.parseInt(key, 16), value);
  }
  return labels;
};

/** Symbolic names for control bytes, space, DEL, NBSP and soft hyphen. */
export const LABELS: ReadonlyMap<number, string> = parseLabels(
  JSON.parse(fs.readFileSync(LABEL_FILE, "utf8"))
);

const isPrintableAscii = (byte: number) => byte >= 0x21 && byte <= 0x7e;

/**
 * Label shown for `byte`: its symbolic name if it has one, the character
 * itself for printable ASCII, otherwise a `\xNN` escape.
 */
export const labelFor = (byte: number): string => {
  const label = LABELS.get(byte);
  if (label !== undefined) return label;
  if (isPrintableAscii(byte)) return String.fromCharCode(byte);
  return `\\x${byte.toString(16).padStart(2, "0")}`;
};
