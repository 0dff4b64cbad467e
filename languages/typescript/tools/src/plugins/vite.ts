import { readFileSync } from "node:fs";
import { basename } from "node:path";
import { compile } from "@picocbor/codegen";

interface VitePlugin {
  name: string;
  transform(code: string, id: string): { code: string; map: null } | undefined;
}

export interface PicocborPluginOptions {
  int64AsNumber?: boolean;
  runtimeImport?: string;
}

export function picocborPlugin(opts?: PicocborPluginOptions): VitePlugin {
  return {
    name: "picocbor",
    transform(_code, id) {
      if (!id.endsWith(".pcb")) return;

      const code = compile(readFileSync(id, "utf-8"), {
        file: basename(id),
        int64AsNumber: opts?.int64AsNumber,
        runtimeImport: opts?.runtimeImport,
      });
      return { code, map: null };
    },
  };
}
