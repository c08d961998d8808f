import { readFile } from "node:fs/promises";
import { MarqueeError, safeErr } from "@splash-marquee/core";

const TAB_STOP = 8;

export function expandTabs(line: string, tabStop: number = TAB_STOP): string {
  if (!line.includes("\t")) return line;
  let out = "";
  for (const ch of line) {
    if (ch === "\t") {
      out += " ".repeat(tabStop - (out.length % tabStop));
    } else {
      out += ch;
    }
  }
  return out;
}

/**
 * Split splash text into lines. CRLF and LF both end a line, a final line
 * break does not start an extra empty line, and tabs become spaces.
 */
export function parseSplashText(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines.map((line) => expandTabs(line));
}

/**
 * @throws MarqueeError("INVALID_INPUT") when the file cannot be read
 */
export async function loadSplashFile(path: string): Promise<string[]> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err: unknown) {
    throw new MarqueeError(
      "INVALID_INPUT",
      `cannot read splash file "${path}": ${safeErr(err).message}`,
      { cause: err },
    );
  }
  return parseSplashText(text);
}
