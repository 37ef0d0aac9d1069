export * from "./bresenham";
export * from "./operations";
export * from "./types";
