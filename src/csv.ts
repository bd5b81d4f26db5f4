import type { Cell } from "./types.js";

export type Delimiter = "," | ";" | "\t" | "|";

const DELIMITERS: ReadonlyArray<Delimiter> = [",", ";", "\t", "|"];

/**
 * Parse delimiter-separated text into rows of raw cells using a simple state machine that
 * handles quoted fields, doubled quotes and delimiters or newlines inside quotes.
 * Empty cells become `null`; a trailing blank line is dropped.
 */
export function parseDsvRaw(text: string, delim: Delimiter = ","): Cell[][] {
  const rows: Cell[][] = [];
  let current: Cell[] = [];
  let field = "";
  let inQuotes = false;

  const pushField = () => {
    current.push(field === "" ? null : field);
    field = "";
  };
  const pushRow = () => {
    rows.push(current);
    current = [];
  };

  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    if (inQuotes) {
      if (c === `"`) {
        if (text[i + 1] === `"`) {
          field += `"`;
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += c;
      }
    } else {
      if (c === `"`) {
        inQuotes = true;
      } else if (c === delim) {
        pushField();
      } else if (c === "\n") {
        pushField();
        pushRow();
      } else if (c === "\r") {
        // ignore CR
      } else {
        field += c;
      }
    }
  }
  pushField();
  pushRow();
  if (rows.length && rows[rows.length - 1].every((v) => v === null)) rows.pop();
  return rows;
}

/**
 * Sniff the delimiter among `,` `;` `\t` `|` by column-count stability over the first lines.
 * Prefers the delimiter that yields the same (>1) column count on most lines.
 */
export function detectDelimiterFromText(text: string): Delimiter {
  const lines = text.split(/\r?\n/).filter((l) => l.trim() !== "").slice(0, 30);
  let best: { delim: Delimiter; score: number } = { delim: ",", score: 0 };
  for (const delim of DELIMITERS) {
    const counts = lines.map((l) => parseDsvRaw(l, delim)[0]?.length ?? 0);
    const freq = new Map<number, number>();
    for (const n of counts) if (n > 1) freq.set(n, (freq.get(n) ?? 0) + 1);
    let modeCount = 0;
    let modeCols = 0;
    for (const [cols, count] of freq) {
      if (count > modeCount || (count === modeCount && cols > modeCols)) {
        modeCount = count;
        modeCols = cols;
      }
    }
    // Stability first, then width; comma wins exact ties by order
    const score = modeCount * 1000 + modeCols;
    if (score > best.score) best = { delim, score };
  }
  return best.delim;
}

/**
 * Decode bytes of a delimited text file. UTF-8 (BOM stripped) first; falls back to
 * Windows-1252 when UTF-8 decoding produces replacement characters.
 */
export function decodeText(bytes: Uint8Array): string {
  const utf8 = new TextDecoder("utf-8").decode(bytes);
  const text = utf8.includes("\uFFFD") ? new TextDecoder("windows-1252").decode(bytes) : utf8;
  return text.replace(/^\uFEFF/, "");
}

/** Parse delimited text into a grid, sniffing the delimiter unless one is given. */
export function parseCsvToGrid(text: string, delim?: Delimiter): Cell[][] {
  return parseDsvRaw(text, delim ?? detectDelimiterFromText(text));
}
