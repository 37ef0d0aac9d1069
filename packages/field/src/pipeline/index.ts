export * from "./builder";
export * from "./trace";
export * from "./types";
