import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { pathToFileURL } from "node:url";

export interface SchemaConfig {
  schema: string;
  out: string;
  int64AsNumber?: boolean;
  runtimeImport?: string;
}

export interface PicocborConfig {
  schemas: SchemaConfig[];
}

const CONFIG_FILES = ["picocbor.config.ts", "picocbor.config.js", "picocbor.config.mjs"];

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null;
}

function validate(value: unknown, file: string): PicocborConfig {
  if (!isRecord(value) || !Array.isArray(value.schemas)) {
    throw new Error(`${file}: default export must be an object with a "schemas" array`);
  }
  const schemas = value.schemas.map((s: unknown, i): SchemaConfig => {
    const where = `${file}: schemas[${i}]`;
    if (!isRecord(s) || typeof s.schema !== "string" || typeof s.out !== "string") {
      throw new Error(`${where} needs "schema" and "out" paths`);
    }
    if (s.int64AsNumber !== undefined && typeof s.int64AsNumber !== "boolean") {
      throw new Error(`${where}.int64AsNumber must be a boolean`);
    }
    if (s.runtimeImport !== undefined && typeof s.runtimeImport !== "string") {
      throw new Error(`${where}.runtimeImport must be a string`);
    }
    return { schema: s.schema, out: s.out, int64AsNumber: s.int64AsNumber, runtimeImport: s.runtimeImport };
  });
  return { schemas };
}

/** Load the first config file found in `cwd`; schema and output paths resolve against it. */
export async function loadConfig(cwd?: string): Promise<PicocborConfig> {
  const dir = cwd ?? process.cwd();

  for (const name of CONFIG_FILES) {
    const file = resolve(dir, name);
    if (existsSync(file)) {
      const mod: unknown = await import(pathToFileURL(file).href);
      const config = validate(isRecord(mod) ? mod.default : undefined, name);
      return {
        schemas: config.schemas.map((s) => ({ ...s, schema: resolve(dir, s.schema), out: resolve(dir, s.out) })),
      };
    }
  }

  throw new Error(`No config file found. Create one of: ${CONFIG_FILES.join(", ")}`);
}

export function defineConfig(config: PicocborConfig): PicocborConfig {
  return config;
}
