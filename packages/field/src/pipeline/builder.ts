/**
 * Type-safe pipeline builder.
 *
 * Each `pipe` checks at compile time that the pass accepts the artifact the
 * previous one produced.
 */

import {
  SeededRandom,
  SimulationError,
  type SimulationSeed,
} from "@lawnsim/contracts";
import { createTraceCollector } from "./trace";
import type {
  Artifact,
  FieldGenerationConfig,
  FullPassContext,
  Pass,
  Pipeline,
  PipelineResult,
  RNGStreamName,
  RNGStreams,
} from "./types";

type Runner<TStart, TCurrent> = (input: TStart, ctx: FullPassContext) => TCurrent;

/**
 * Create RNG streams from seed so each stage has isolated randomness
 */
export function createRNGStreams(seed: SimulationSeed): RNGStreams {
  return {
    area: new SeededRandom(seed.area),
    obstacles: new SeededRandom(seed.obstacles),
    station: new SeededRandom(seed.station),
    robot: new SeededRandom(seed.robot),
  };
}

/**
 * Raised inside the pass loop so the result can name the failing pass
 */
class PassFailure extends Error {
  constructor(
    readonly passId: string,
    readonly step: number,
    readonly original: unknown,
  ) {
    super(original instanceof Error ? original.message : String(original));
  }
}

function toGenerationError(error: unknown): SimulationError {
  if (error instanceof PassFailure) {
    const details: Record<string, unknown> = {
      passId: error.passId,
      step: error.step,
    };
    if (SimulationError.isSimulationError(error.original)) {
      details.cause = error.original.toJSON();
    }
    return SimulationError.generationFailed(
      `Pipeline failed at step ${error.step} (pass: ${error.passId}): ${error.message}`,
      details,
    );
  }
  return SimulationError.generationFailed(
    error instanceof Error ? error.message : String(error),
  );
}

export class PipelineBuilder<TStart extends Artifact, TCurrent extends Artifact> {
  private constructor(
    private readonly id: string,
    private readonly config: FieldGenerationConfig,
    private readonly runner: Runner<TStart, TCurrent>,
    private readonly passIds: readonly string[],
  ) {}

  static create<TStart extends Artifact>(
    id: string,
    config: FieldGenerationConfig,
  ): PipelineBuilder<TStart, TStart> {
    return new PipelineBuilder<TStart, TStart>(id, config, (input) => input, []);
  }

  pipe<TNext extends Artifact, TStreams extends RNGStreamName = never>(
    pass: Pass<TCurrent, TNext, TStreams>,
  ): PipelineBuilder<TStart, TNext> {
    const previous = this.runner;
    const step = this.passIds.length;

    const runner: Runner<TStart, TNext> = (input, ctx) => {
      const current = previous(input, ctx);
      ctx.trace.start(pass.id, pass.requiredStreams);
      const stepStart = performance.now();

      let next: TNext;
      try {
        next = pass.run(current, ctx);
      } catch (error) {
        if (error instanceof PassFailure) throw error;
        throw new PassFailure(pass.id, step, error);
      }

      ctx.trace.end(pass.id, performance.now() - stepStart);
      return next;
    };

    return new PipelineBuilder<TStart, TNext>(this.id, this.config, runner, [
      ...this.passIds,
      pass.id,
    ]);
  }

  build(): Pipeline<TStart, TCurrent> {
    const { id, config, runner, passIds } = this;

    return {
      id,
      passIds,
      runSync(input: TStart, seed: SimulationSeed): PipelineResult<TCurrent> {
        const startTime = performance.now();
        const trace = createTraceCollector(config.trace ?? false);
        const ctx: FullPassContext = {
          streams: createRNGStreams(seed),
          config,
          trace,
          seed,
        };

        try {
          const artifact = runner(input, ctx);
          return {
            success: true,
            artifact,
            trace: trace.getEvents(),
            durationMs: performance.now() - startTime,
          };
        } catch (error) {
          return {
            success: false,
            error: toGenerationError(error),
            trace: trace.getEvents(),
            durationMs: performance.now() - startTime,
          };
        }
      },
    };
  }
}
