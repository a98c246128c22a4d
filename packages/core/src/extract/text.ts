import type { Logger } from "pino";
import { describeError } from "../errors/catalog.js";
import { decodeText } from "./decode.js";
import { docxToText, pdfToText, xlsxToText } from "./documents.js";
import { htmlToText } from "./html.js";
import type { TextExtractor } from "./interface.js";

type Routine = (content: Uint8Array) => string | Promise<string>;

/** Splits one delimited line, honouring double-quoted cells. */
export function splitDelimitedLine(line: string, delimiter: string): string[] {
  const cells: string[] = [];
  let cell = "";
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (quoted) {
      if (char === '"' && line[i + 1] === '"') {
        cell += '"';
        i++;
      } else if (char === '"') {
        quoted = false;
      } else {
        cell += char;
      }
    } else if (char === '"') {
      quoted = true;
    } else if (char === delimiter) {
      cells.push(cell);
      cell = "";
    } else {
      cell += char;
    }
  }
  cells.push(cell);
  return cells;
}

function delimited(delimiter: string): Routine {
  return (content) =>
    decodeText(content)
      .split(/\r?\n/)
      .map((line) =>
        splitDelimitedLine(line, delimiter)
          .map((cell) => cell.trim())
          .filter(Boolean)
          .join(" "),
      )
      .filter(Boolean)
      .join("\n");
}

function collectLeaves(value: unknown, out: string[]): void {
  if (typeof value === "string") {
    if (value.trim()) out.push(value);
  } else if (typeof value === "number" || typeof value === "boolean") {
    out.push(String(value));
  } else if (Array.isArray(value)) {
    for (const item of value) collectLeaves(item, out);
  } else if (value !== null && typeof value === "object") {
    for (const item of Object.values(value)) collectLeaves(item, out);
  }
}

const json: Routine = (content) => {
  const text = decodeText(content);
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    // Not valid JSON: index it as plain text
    return text;
  }
  const leaves: string[] = [];
  collectLeaves(parsed, leaves);
  return leaves.join("\n");
};

const html: Routine = (content) => htmlToText(decodeText(content));

const plain: Routine = (content) => decodeText(content);

const ROUTINES = new Map<string, Routine>([
  ["txt", plain],
  ["md", plain],
  ["markdown", plain],
  ["log", plain],
  ["csv", delimited(",")],
  ["tsv", delimited("\t")],
  ["json", json],
  ["html", html],
  ["htm", html],
  ["pdf", pdfToText],
  ["docx", docxToText],
  ["xlsx", xlsxToText],
]);

export interface TextExtractorOptions {
  logger?: Logger;
}

export function createTextExtractor(options?: TextExtractorOptions): TextExtractor {
  return {
    supports(typeHint) {
      return ROUTINES.has(typeHint.toLowerCase());
    },

    async extract(content, typeHint) {
      const routine = ROUTINES.get(typeHint.toLowerCase());
      if (!routine) {
        options?.logger?.debug({ typeHint }, "No extractor for type");
        return "";
      }
      try {
        return await routine(content);
      } catch (err) {
        options?.logger?.warn(
          { typeHint, error: describeError(err) },
          "Text extraction failed",
        );
        return "";
      }
    },
  };
}
