import {
  type CycleExporter,
  type CycleReport,
  Err,
  MarkerKind,
  Markers,
  OBSTACLE_KINDS,
  Ok,
  type Result,
  type SeededRandom,
  type SimulationConfig,
  SimulationError,
  resolveRobotBudget,
} from "@lawnsim/contracts";
import { reverse, translate } from "../core/geometry/operations";
import type { Direction, Point } from "../core/geometry/types";
import type { GridModel } from "../core/grid/grid-model";
import { type BounceStrategy, createBounceStrategy } from "./bounce";
import { type CycleLabels, buildCycleReport } from "./coverage-report";
import { type CuttingMode, parseCuttingMode } from "./cutting-mode";
import { type MovementStrategy, createMovementStrategy } from "./movement";
import { backoffSteps, cutAround, cuttingRadius, mowingTime } from "./mowing";
import { Robot, type RobotSpec } from "./robot";

export const SimulationState = {
  FirstMove: "first-move",
  Moving: "moving",
  Bouncing: "bouncing",
  Recharging: "recharging",
  Done: "done",
} as const;

export type SimulationState = (typeof SimulationState)[keyof typeof SimulationState];

export interface CoverageSimulatorOptions {
  readonly grid: GridModel;
  readonly start: Point;
  readonly rng: SeededRandom;
  readonly mode: CuttingMode;
  /** `autonomy` is the usable seconds per charge. */
  readonly robot: RobotSpec;
  readonly tasselDim: number;
  readonly runSeconds: number;
  readonly rechargeSeconds?: number;
  readonly exporter?: CycleExporter;
  readonly labels?: Partial<CycleLabels>;
}

export interface CoverageSummary {
  readonly cycles: number;
  readonly ticks: number;
  readonly reports: readonly CycleReport[];
  /** Coverage after the last cycle, 0 when none completed. */
  readonly coverage: number;
}

/**
 * Put grass on every cell that holds no obstacle
 * @returns number of tassels seeded
 */
export function seedGrass(grid: GridModel): number {
  let seeded = 0;
  grid.forEachCell((p, markers) => {
    if (markers.some((m) => OBSTACLE_KINDS.includes(m.kind))) return;
    if (grid.place(Markers.grass(), p.x, p.y)) seeded++;
  });
  return seeded;
}

/**
 * Robot coverage state machine.
 *
 * FirstMove tries the movement strategy's directions without replacement.
 * Moving steps along the heading until a move is refused, which hands over
 * to Bouncing: back off, then let the bounce strategy pick a new heading.
 * Every entered or retreated tassel costs one mowing time. When autonomy
 * runs out the cycle is reported and the robot recharges in place, until
 * the run budget is spent.
 */
export class CoverageSimulator {
  readonly robot: Robot;
  private readonly grid: GridModel;
  private readonly movement: MovementStrategy;
  private readonly bounce: BounceStrategy;
  private readonly stepTime: number;
  private readonly radius: number;
  private readonly backoff: number;
  private readonly maxAutonomy: number;
  private readonly rechargeSeconds: number;
  private readonly labels: CycleLabels;
  private readonly exporter: CycleExporter | undefined;
  private readonly reports: CycleReport[] = [];

  private _state: SimulationState = SimulationState.FirstMove;
  private remainingRun: number;
  private cycleAutonomy: number;
  private cycle = 1;
  private ticks = 0;

  constructor(options: CoverageSimulatorOptions) {
    this.grid = options.grid;
    this.movement = createMovementStrategy(options.mode.movement, options.rng);
    this.bounce = createBounceStrategy(options.mode.bounce, options.rng);

    const mowing = {
      tasselDim: options.tasselDim,
      cuttingDiameter: options.robot.cuttingDiameter,
      speed: options.robot.speed,
    };
    this.stepTime = mowingTime(mowing);
    this.radius = cuttingRadius(mowing);
    this.backoff = backoffSteps(mowing);

    this.maxAutonomy = options.robot.autonomy;
    this.rechargeSeconds = options.rechargeSeconds ?? 0;
    this.remainingRun = options.runSeconds;
    this.cycleAutonomy = Math.min(this.maxAutonomy, this.remainingRun);
    this.labels = {
      mapIndex: options.labels?.mapIndex ?? 0,
      repetition: options.labels?.repetition ?? 0,
      strategy: options.labels?.strategy ?? "",
    };
    this.exporter = options.exporter;

    seedGrass(this.grid);
    this.robot = new Robot(options.start, { ...options.robot, autonomy: this.cycleAutonomy });
    if (this.cycleAutonomy <= 0) this._state = SimulationState.Done;
  }

  get state(): SimulationState {
    return this._state;
  }

  get currentCycle(): number {
    return this.cycle;
  }

  /**
   * Advance one tick.
   * @returns false once the run is over
   * @throws SimulationError when the first move finds no open direction
   */
  step(): boolean {
    switch (this._state) {
      case SimulationState.FirstMove:
        this.firstMove();
        break;
      case SimulationState.Moving:
        this.advance();
        break;
      case SimulationState.Bouncing:
        this.bounceBack();
        break;
      case SimulationState.Recharging:
        this.recharge();
        break;
      case SimulationState.Done:
        return false;
    }
    this.ticks++;
    return this.state !== SimulationState.Done;
  }

  /**
   * Tick until the run budget is spent
   */
  run(): CoverageSummary {
    while (this.step()) {
      // every state change happens inside step()
    }
    return this.summary();
  }

  summary(): CoverageSummary {
    const last = this.reports[this.reports.length - 1];
    return {
      cycles: this.reports.length,
      ticks: this.ticks,
      reports: [...this.reports],
      coverage: last?.coverage ?? 0,
    };
  }

  /**
   * A forward move is accepted when the target is on the field and passable,
   * neither it nor the cell beyond it holds an obstacle, and it was not
   * visited this cycle unless it lies on a guideline. Re-entering a
   * guideline tassel does not cut it again.
   */
  canEnter(target: Point, direction: Direction): boolean {
    if (this.grid.isImpassable(target)) return false;
    if (this.grid.containsAny(translate(target, direction), OBSTACLE_KINDS)) return false;
    return !this.robot.hasVisited(target) || this.grid.has(target, MarkerKind.GuideLine);
  }

  /**
   * The first move only needs a passable, unvisited neighbour; the cell
   * beyond it is not checked.
   */
  canStart(target: Point): boolean {
    return !this.grid.isImpassable(target) && !this.robot.hasVisited(target);
  }

  private firstMove(): void {
    for (const direction of this.movement.firstMoveOrder()) {
      const target = translate(this.robot.position, direction);
      if (this.canStart(target)) {
        this.robot.face(direction);
        this._state = SimulationState.Moving;
        this.enter(target);
        return;
      }
    }
    throw SimulationError.robotStartUnreachable(this.robot.position);
  }

  private advance(): void {
    const target = translate(this.robot.position, this.robot.heading);
    if (this.canEnter(target, this.robot.heading)) {
      this.enter(target);
    } else {
      this._state = SimulationState.Bouncing;
    }
  }

  private bounceBack(): void {
    const back = reverse(this.robot.heading);
    let taken = 0;
    while (taken < this.backoff && this._state === SimulationState.Bouncing) {
      const p = translate(this.robot.position, back);
      if (this.grid.isImpassable(p)) break;
      this.robot.moveTo(p);
      taken++;
      this.charge();
    }
    if (taken === 0) this.charge();
    if (this._state !== SimulationState.Bouncing) return;

    const decision = this.bounce.redirect({
      robot: this.robot,
      canEnter: (target, direction) => this.canEnter(target, direction),
    });
    this.robot.face(decision.heading, decision.angle);
    this._state = SimulationState.Moving;
    if (decision.sidestep) this.enter(decision.sidestep);
  }

  private recharge(): void {
    const report = buildCycleReport(
      this.grid,
      this.labels,
      this.cycle,
      this.cycleAutonomy - this.robot.autonomy,
    );
    this.reports.push(report);
    this.exporter?.exportCycle(report);

    this.remainingRun -= this.cycleAutonomy + this.rechargeSeconds;
    if (this.remainingRun <= 0) {
      this._state = SimulationState.Done;
      return;
    }

    this.cycle++;
    this.cycleAutonomy = Math.min(this.maxAutonomy, this.remainingRun);
    this.robot.autonomy = this.cycleAutonomy;
    this.robot.clearVisited();
    this._state = SimulationState.Moving;
  }

  /** Move onto a tassel and cut around it, unless it was already visited this cycle. */
  private enter(target: Point): void {
    const fresh = !this.robot.hasVisited(target);
    this.robot.moveTo(target);
    if (fresh) cutAround(this.grid, target, this.radius);
    this.charge();
  }

  private charge(): void {
    this.robot.spend(this.stepTime);
    if (this.robot.autonomy <= 0) this._state = SimulationState.Recharging;
  }
}

export interface SimulationSetup {
  readonly rng: SeededRandom;
  readonly exporter?: CycleExporter;
  readonly labels?: Partial<CycleLabels>;
}

/**
 * Build a simulator for a configuration, parsing its cutting mode and budgets
 */
export function createCoverageSimulator(
  grid: GridModel,
  start: Point,
  config: SimulationConfig,
  setup: SimulationSetup,
): Result<CoverageSimulator, SimulationError> {
  const mode = parseCuttingMode(config.robot.cuttingMode);
  if (mode.isErr()) return Err(mode.error);

  const budget = resolveRobotBudget(config);
  return Ok(
    new CoverageSimulator({
      grid,
      start,
      rng: setup.rng,
      mode: mode.value,
      robot: {
        speed: config.robot.speed,
        cuttingDiameter: config.robot.cuttingDiameter,
        autonomy: budget.autonomySeconds,
      },
      tasselDim: config.simulator.tasselDim,
      runSeconds: budget.runSeconds,
      rechargeSeconds: budget.rechargeSeconds,
      exporter: setup.exporter,
      labels: setup.labels,
    }),
  );
}
