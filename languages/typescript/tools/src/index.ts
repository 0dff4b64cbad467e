export { generate } from "./generate.js";
export type { GenerateOptions, GenerateResult } from "./generate.js";

export { loadConfig, defineConfig } from "./config.js";
export type { PicocborConfig, SchemaConfig } from "./config.js";

export { watch } from "./watch.js";

export { display, displayFile, parseHex } from "./display.js";
export type { DisplayOptions } from "./display.js";

export { picocborPlugin } from "./plugins/vite.js";
export type { PicocborPluginOptions } from "./plugins/vite.js";
