import { watch as fsWatch, type FSWatcher } from "node:fs";
import { dirname, join, resolve } from "node:path";
import type { PicocborConfig } from "./config.js";
import { generate } from "./generate.js";

export async function watch(config: PicocborConfig): Promise<FSWatcher[]> {
  for (const schema of config.schemas) {
    const r = await generate(schema);
    console.log(`generated ${r.outputPath}`);
  }

  const dirs = new Set(config.schemas.map((s) => dirname(resolve(s.schema))));
  const watchers: FSWatcher[] = [];

  for (const dir of dirs) {
    const watcher = fsWatch(dir, (_event, filename) => {
      if (!filename?.endsWith(".pcb")) return;

      const changed = join(dir, filename);
      for (const schema of config.schemas) {
        if (resolve(schema.schema) !== changed) continue;
        generate(schema).then(
          (r) => console.log(`generated ${r.outputPath}`),
          (err: unknown) => console.error(`error generating ${schema.out}: ${err instanceof Error ? err.message : String(err)}`),
        );
      }
    });
    watchers.push(watcher);
  }

  console.log(`watching ${dirs.size} director${dirs.size === 1 ? "y" : "ies"} for .pcb changes...`);
  return watchers;
}
