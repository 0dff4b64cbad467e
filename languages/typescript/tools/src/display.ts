import { readFile } from "node:fs/promises";
import { diagnostic } from "@picocbor/runtime";

export interface DisplayOptions {
  /** Treat the input as hex text; whitespace is ignored. */
  hex?: boolean;
  indent?: number;
}

export function parseHex(text: string): Uint8Array {
  const digits = text.replace(/\s+/g, "");
  if (digits.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(digits)) {
    throw new Error("input is not a hex string");
  }
  const out = new Uint8Array(digits.length / 2);
  for (let i = 0; i < out.length; i++) out[i] = parseInt(digits.slice(i * 2, i * 2 + 2), 16);
  return out;
}

/** Diagnostic notation for every item in `bytes`, one per line. */
export function display(bytes: Uint8Array, options: DisplayOptions = {}): string {
  return diagnostic(bytes, { indent: options.indent });
}

export async function displayFile(path: string, options: DisplayOptions = {}): Promise<string> {
  const bytes = options.hex ? parseHex(await readFile(path, "utf-8")) : new Uint8Array(await readFile(path));
  return display(bytes, options);
}
