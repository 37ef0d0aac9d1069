export * from "./random/rng";
export * from "./random/seeded-random";
export * from "./schemas/config";
export * from "./schemas/seed";
export * from "./schemas/snapshot";
export * from "./types/error";
export * from "./types/markers";
export * from "./types/result";
export * from "./types/simulation";
export * from "./utils/encoding";
