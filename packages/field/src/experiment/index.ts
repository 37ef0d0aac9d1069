export * from "./exporter";
export * from "./runner";
