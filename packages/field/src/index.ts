/**
 * Lawn field generation and robot mower coverage simulation.
 *
 * @example
 * ```typescript
 * import { createSeed, InMemoryCycleExporter, runExperiment } from "@lawnsim/field";
 *
 * const exporter = new InMemoryCycleExporter();
 * const result = runExperiment(config, { seed: createSeed(12345), exporter });
 *
 * if (result.isOk()) {
 *   console.info(`${result.value.runs.length} runs, ${exporter.reports.length} cycles`);
 * }
 * ```
 */

// Core modules
export * from "./core";
// Generators
export * from "./generators";
// Pass Library
export * as passes from "./passes";
// Pipeline
export * from "./pipeline";
// Seeds
export * from "./seed";
// Serialization
export * from "./serialization/snapshot";
// Base station
export * from "./station";
// Simulation
export * from "./simulation";
// Experiments
export * from "./experiment";
// Utilities
export * from "./utils";
