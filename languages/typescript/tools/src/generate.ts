import { mkdir, readFile, writeFile } from "node:fs/promises";
import { basename, dirname } from "node:path";
import { compile } from "@picocbor/codegen";

export interface GenerateOptions {
  schema: string;
  out: string;
  int64AsNumber?: boolean;
  runtimeImport?: string;
}

export interface GenerateResult {
  outputPath: string;
  source: string;
}

export async function generate(options: GenerateOptions): Promise<GenerateResult> {
  const input = await readFile(options.schema, "utf-8");
  const source = compile(input, {
    file: basename(options.schema),
    int64AsNumber: options.int64AsNumber,
    runtimeImport: options.runtimeImport,
  });

  await mkdir(dirname(options.out), { recursive: true });
  await writeFile(options.out, source);

  return { outputPath: options.out, source };
}
