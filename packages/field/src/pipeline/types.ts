/**
 * Pipeline type definitions: artifacts flowing between passes, the pass
 * contract and the pipeline result.
 */

import type {
  EnvironmentConfig,
  FieldDimensions,
  SeededRandom,
  SimulationError,
  SimulationSeed,
} from "@lawnsim/contracts";
import type { Point } from "../core/geometry/types";
import type { GridModel } from "../core/grid/grid-model";
import type { TraceCollector, TraceEvent } from "./trace";

// =============================================================================
// ARTIFACTS
// =============================================================================

export interface Artifact<T extends string = string> {
  readonly type: T;
  readonly id: string;
}

export interface EmptyArtifact extends Artifact<"empty"> {}

export type IsolatedAreaShape = "rectangle" | "circle" | "preset";

export interface IsolatedArea {
  readonly shape: IsolatedAreaShape;
  /** Field corner the area was carved from. */
  readonly corner: Point;
  readonly cells: readonly Point[];
  /** Boundary cells eligible to become openings, in advancing order. */
  readonly enclosure: readonly Point[];
  readonly openings: readonly Point[];
  /** Opening used as the base station's reference corner, if any. */
  readonly referenceTassel: Point | null;
}

export type ObstacleShape = "square" | "circle";

export interface ObstacleCluster {
  readonly id: number;
  readonly shape: ObstacleShape;
  readonly cells: readonly Point[];
  /** Free cells ringing the cluster, used to route guidelines. */
  readonly anchors: readonly Point[];
}

/**
 * Mutable working state shared by the generation passes
 */
export interface FieldStateArtifact extends Artifact<"field-state"> {
  readonly grid: GridModel;
  readonly isolatedArea: IsolatedArea | null;
  readonly clusters: readonly ObstacleCluster[];
}

/**
 * Finished field, ready for base-station placement and simulation
 */
export interface FieldArtifact extends Artifact<"field"> {
  readonly grid: GridModel;
  readonly isolatedArea: IsolatedArea | null;
  readonly clusters: readonly ObstacleCluster[];
  readonly referenceTassel: Point | null;
  readonly centerTassel: Point;
  readonly largestCluster: readonly Point[];
  readonly checksum: string;
  readonly seed: SimulationSeed | null;
}

// =============================================================================
// CONTEXT
// =============================================================================

export interface FieldGenerationConfig {
  readonly dimensions: FieldDimensions;
  readonly environment: EnvironmentConfig;
  /** Record trace events. Default: false */
  readonly trace?: boolean;
}

/**
 * One independent random stream per stage
 */
export interface RNGStreams {
  readonly area: SeededRandom;
  readonly obstacles: SeededRandom;
  readonly station: SeededRandom;
  readonly robot: SeededRandom;
}

export type RNGStreamName = keyof RNGStreams;

/**
 * The subset of streams a pass declared
 */
export type StreamSet<TStreams extends RNGStreamName> = {
  readonly [K in TStreams]: SeededRandom;
};

export interface PassContext<TStreams extends RNGStreamName = never> {
  /** Only the streams the pass declared. */
  readonly streams: StreamSet<TStreams>;
  readonly config: FieldGenerationConfig;
  readonly trace: TraceCollector;
  readonly seed: SimulationSeed;
}

export type FullPassContext = PassContext<RNGStreamName>;

// =============================================================================
// PASSES
// =============================================================================

export interface Pass<
  TIn extends Artifact,
  TOut extends Artifact,
  TStreams extends RNGStreamName = never,
> {
  readonly id: string;
  readonly inputType: TIn["type"];
  readonly outputType: TOut["type"];
  readonly requiredStreams: readonly TStreams[];
  run(input: TIn, ctx: PassContext<TStreams>): TOut;
}

// =============================================================================
// PIPELINE
// =============================================================================

export type PipelineResult<T extends Artifact> =
  | {
      readonly success: true;
      readonly artifact: T;
      readonly trace: readonly TraceEvent[];
      readonly durationMs: number;
    }
  | {
      readonly success: false;
      readonly error: SimulationError;
      readonly trace: readonly TraceEvent[];
      readonly durationMs: number;
    };

export interface Pipeline<TStart extends Artifact, TEnd extends Artifact> {
  readonly id: string;
  readonly passIds: readonly string[];
  runSync(input: TStart, seed: SimulationSeed): PipelineResult<TEnd>;
}
