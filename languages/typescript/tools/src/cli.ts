#!/usr/bin/env node

import { resolve } from "node:path";
import { loadConfig } from "./config.js";
import { displayFile } from "./display.js";
import { generate } from "./generate.js";
import { watch as runWatch } from "./watch.js";

const args = process.argv.slice(2);
const command = args[0];

function printHelp() {
  console.log(`Usage: picocbor <command> [options]

Commands:
  generate [schema.pcb -o out.ts]   Generate TypeScript from schema(s)
  watch                             Watch schema files and regenerate on change
  display <file>                    Print CBOR data in diagnostic notation

Options:
  --int64-as-number                 Map u64/i64 to number instead of bigint
  --runtime-import <module>         Module the generated code imports the runtime from
  -o, --out <file>                  Output file path
  --hex                             display: read the file as hex text
  --indent <n>                      display: indent nested containers
  -h, --help                        Show this help`);
}

async function runGenerate() {
  const schemaArg = args[1];

  // A positional schema overrides the config file
  if (schemaArg && !schemaArg.startsWith("-")) {
    let out: string | undefined;
    let int64AsNumber = false;
    let runtimeImport: string | undefined;

    for (let i = 2; i < args.length; i++) {
      if (args[i] === "-o" || args[i] === "--out") {
        out = args[++i];
      } else if (args[i] === "--int64-as-number") {
        int64AsNumber = true;
      } else if (args[i] === "--runtime-import") {
        runtimeImport = args[++i];
      }
    }

    if (!out) {
      console.error("error: -o <output> is required");
      process.exit(1);
    }

    const result = await generate({ schema: resolve(schemaArg), out: resolve(out), int64AsNumber, runtimeImport });
    console.log(`generated ${result.outputPath}`);
    return;
  }

  const config = await loadConfig();
  for (const schema of config.schemas) {
    const result = await generate(schema);
    console.log(`generated ${result.outputPath}`);
  }
}

async function runDisplay() {
  const file = args[1];
  if (!file || file.startsWith("-")) {
    console.error("error: display needs an input file");
    process.exit(1);
  }
  let hex = false;
  let indent: number | undefined;
  for (let i = 2; i < args.length; i++) {
    if (args[i] === "--hex") {
      hex = true;
    } else if (args[i] === "--indent") {
      indent = Number(args[++i]);
      if (!Number.isInteger(indent) || indent < 0) {
        console.error("error: --indent takes a non-negative integer");
        process.exit(1);
      }
    }
  }
  console.log(await displayFile(resolve(file), { hex, indent }));
}

async function main() {
  if (!command || command === "-h" || command === "--help") {
    printHelp();
    return;
  }

  if (command === "generate") {
    await runGenerate();
  } else if (command === "watch") {
    const config = await loadConfig();
    await runWatch(config);
  } else if (command === "display") {
    await runDisplay();
  } else {
    console.error(`unknown command: ${command}`);
    printHelp();
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
