export { runPacfetch, USAGE, type CliIo } from "./cli";
export * from "./config";
export * from "./lib/ascii";
export * from "./lib/format";
export * from "./lib/log-file";
export * from "./lib/stats";
