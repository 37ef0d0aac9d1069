export * from "./preset-field";
export * from "./random-field";
