export * from "./placer";
export * from "./strategies";
