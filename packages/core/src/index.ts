export * from "./types";
export * from "./ansi";
export * from "./log";
export * from "./color";
export * from "./title";
export * from "./declarations";
export * from "./width";
export * from "./line";
export * from "./compositor";
export * from "./render";
