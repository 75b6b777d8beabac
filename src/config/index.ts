export * from "./types";
export { DEFAULT_CONFIG, loadConfig, validateConfig } from "./loadConfig";
