/**
 * Batch runner: maps × base-station strategies × repetitions.
 *
 * Every map is generated from its own derived seed. Each strategy places a
 * station on a clone of the map, and each repetition mows a clone of that.
 * Failures skip the affected branch and are logged and listed on the summary.
 */

import {
  type CycleExporter,
  Err,
  Ok,
  parseSimulationConfig,
  Result,
  SeededRandom,
  type SimulationConfig,
  SimulationError,
  type SimulationErrorCode,
  type SimulationLogger,
  type SimulationSeed,
} from "@lawnsim/contracts";
import type { Point } from "../core/geometry/types";
import { generateField } from "../generators/random-field";
import type { FieldArtifact } from "../pipeline/types";
import { deriveSeed } from "../seed";
import { type CoverageSummary, createCoverageSimulator } from "../simulation/coverage-simulator";
import { parseCuttingMode } from "../simulation/cutting-mode";
import { placeBaseStation } from "../station/placer";
import {
  createStationStrategy,
  STATION_STRATEGIES,
  type StationStrategyName,
} from "../station/strategies";

export interface ExperimentOptions {
  readonly seed: SimulationSeed;
  readonly exporter?: CycleExporter;
  /** Default: console */
  readonly logger?: SimulationLogger;
  /** Default: every strategy */
  readonly strategies?: readonly StationStrategyName[];
  readonly trace?: boolean;
}

export interface SkippedBranch {
  readonly mapIndex: number;
  readonly strategy: StationStrategyName | null;
  readonly repetition: number | null;
  readonly code: SimulationErrorCode;
  readonly reason: string;
}

export interface RunOutcome {
  readonly mapIndex: number;
  readonly strategy: StationStrategyName;
  readonly repetition: number;
  readonly station: Point;
  readonly summary: CoverageSummary;
}

export interface ExperimentSummary {
  readonly maps: readonly FieldArtifact[];
  readonly runs: readonly RunOutcome[];
  readonly skipped: readonly SkippedBranch[];
}

const PREFIX = "[Experiment]";

/**
 * Run a whole experiment.
 * @returns Err only when the configuration itself is unusable
 */
export function runExperiment(
  input: unknown,
  options: ExperimentOptions,
): Result<ExperimentSummary, SimulationError> {
  const parsed = parseSimulationConfig(input);
  if (parsed.isErr()) return Err(parsed.error);
  const config = parsed.value;

  const mode = parseCuttingMode(config.robot.cuttingMode);
  if (mode.isErr()) return Err(mode.error);

  const logger = options.logger ?? console;
  const strategies = options.strategies ?? STATION_STRATEGIES;
  const maps: FieldArtifact[] = [];
  const runs: RunOutcome[] = [];
  const skipped: SkippedBranch[] = [];

  const skip = (branch: Omit<SkippedBranch, "code" | "reason">, error: SimulationError) => {
    skipped.push({ ...branch, code: error.code, reason: error.message });
    logger.warn(`${PREFIX} Skipping ${describeBranch(branch)}: ${error.message}`);
  };

  for (let mapIndex = 0; mapIndex < config.simulator.maps; mapIndex++) {
    const mapSeed = deriveSeed(options.seed, mapIndex);
    const generated = generateField(config, mapSeed, { trace: options.trace });
    if (!generated.success) {
      skip({ mapIndex, strategy: null, repetition: null }, generated.error);
      continue;
    }
    const field = generated.artifact;
    maps.push(field);
    logger.info(`${PREFIX} Map ${mapIndex} generated (${field.checksum})`);

    strategies.forEach((strategy, strategyIndex) => {
      const stationSeed = deriveSeed(mapSeed, strategyIndex);
      const stationGrid = field.grid.clone();
      const placement = placeBaseStation(
        stationGrid,
        createStationStrategy(strategy, new SeededRandom(stationSeed.station)),
        field,
      );
      if (!placement) {
        skip(
          { mapIndex, strategy, repetition: null },
          SimulationError.baseStationUnavailable(strategy),
        );
        return;
      }

      for (let repetition = 0; repetition < config.simulator.repetitions; repetition++) {
        const outcome = runRepetition(config, {
          stationGrid,
          station: placement.position,
          seed: deriveSeed(stationSeed, repetition),
          mapIndex,
          strategy,
          repetition,
          exporter: options.exporter,
        });
        if (outcome.isErr()) {
          skip({ mapIndex, strategy, repetition }, outcome.error);
        } else {
          runs.push(outcome.value);
        }
      }
    });
  }

  logger.info(`${PREFIX} Finished: ${runs.length} runs, ${skipped.length} skipped`);
  return Ok({ maps, runs, skipped });
}

interface RepetitionInput {
  readonly stationGrid: FieldArtifact["grid"];
  readonly station: Point;
  readonly seed: SimulationSeed;
  readonly mapIndex: number;
  readonly strategy: StationStrategyName;
  readonly repetition: number;
  readonly exporter: CycleExporter | undefined;
}

function runRepetition(
  config: SimulationConfig,
  input: RepetitionInput,
): Result<RunOutcome, SimulationError> {
  const created = createCoverageSimulator(input.stationGrid.clone(), input.station, config, {
    rng: new SeededRandom(input.seed.robot),
    exporter: input.exporter,
    labels: {
      mapIndex: input.mapIndex,
      repetition: input.repetition,
      strategy: input.strategy,
    },
  });

  return created.flatMap((simulator) =>
    Result.fromThrowable(
      () => ({
        mapIndex: input.mapIndex,
        strategy: input.strategy,
        repetition: input.repetition,
        station: input.station,
        summary: simulator.run(),
      }),
      (error) => {
        if (SimulationError.isSimulationError(error)) return error;
        throw error;
      },
    ),
  );
}

function describeBranch(branch: Omit<SkippedBranch, "code" | "reason">): string {
  const parts = [`map ${branch.mapIndex}`];
  if (branch.strategy) parts.push(`strategy ${branch.strategy}`);
  if (branch.repetition !== null) parts.push(`repetition ${branch.repetition}`);
  return parts.join(", ");
}
