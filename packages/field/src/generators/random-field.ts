import {
  resolveFieldDimensions,
  type SimulationConfig,
  type SimulationSeed,
} from "@lawnsim/contracts";
import { carveIsolatedArea, placeObstacles } from "../passes/area/passes";
import { finalizeField } from "../passes/common/finalize";
import { initializeField } from "../passes/common/initialize-field";
import { traceGuidelines } from "../passes/guidelines/pass";
import { PipelineBuilder } from "../pipeline/builder";
import type {
  EmptyArtifact,
  FieldArtifact,
  FieldGenerationConfig,
  Pipeline,
  PipelineResult,
} from "../pipeline/types";

export function createFieldPipeline(
  config: FieldGenerationConfig,
): Pipeline<EmptyArtifact, FieldArtifact> {
  return PipelineBuilder.create<EmptyArtifact>("random-field", config)
    .pipe(initializeField())
    .pipe(carveIsolatedArea())
    .pipe(placeObstacles())
    .pipe(traceGuidelines())
    .pipe(finalizeField())
    .build();
}

export interface GenerateFieldOptions {
  readonly trace?: boolean;
}

/**
 * Generate a random field: isolated area, obstacles and guideline network.
 *
 * @example
 * ```typescript
 * const result = generateField(config, createSeed(42));
 * if (result.success) console.log(renderFieldAscii(result.artifact.grid));
 * ```
 */
export function generateField(
  config: SimulationConfig,
  seed: SimulationSeed,
  options: GenerateFieldOptions = {},
): PipelineResult<FieldArtifact> {
  const pipeline = createFieldPipeline({
    dimensions: resolveFieldDimensions(config),
    environment: config.environment,
    trace: options.trace ?? false,
  });
  return pipeline.runSync({ type: "empty", id: "empty" }, seed);
}
