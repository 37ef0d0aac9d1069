import { z } from "zod";
import { SimulationError } from "../types/error";
import { Err, Ok, type Result } from "../types/result";

const Length = z.number().nonnegative({ error: "Lengths must be non-negative" });
const PositiveLength = z.number().positive({ error: "Must be greater than zero" });
const Count = z.number().int().min(0, { error: "Counts must be non-negative" });

const IsolatedAreaSchema = z.object({
  shape: z.enum(["rectangle", "circle"]),
  minWidth: Length.default(0),
  maxWidth: Length.default(0),
  minLength: Length.default(0),
  maxLength: Length.default(0),
  minRadius: Length.default(0),
  maxRadius: Length.default(0),
});

const SquaresSchema = z.object({
  count: Count,
  minWidth: PositiveLength,
  maxWidth: PositiveLength,
  minHeight: PositiveLength,
  maxHeight: PositiveLength,
});

const CirclesSchema = z.object({
  count: Count,
  minRadius: PositiveLength,
  maxRadius: PositiveLength,
});

export const EnvironmentConfigSchema = z.object({
  width: PositiveLength,
  length: PositiveLength,
  isolatedArea: IsolatedAreaSchema,
  squares: SquaresSchema,
  circles: CirclesSchema,
});

export const RobotConfigSchema = z.object({
  speed: PositiveLength,
  /** Minutes of work per charge. */
  autonomy: PositiveLength,
  autonomyReserve: z
    .number()
    .min(0)
    .max(0.9, { error: "At most 90% of autonomy can be held back" })
    .default(0.1),
  cuttingDiameter: PositiveLength,
  cuttingMode: z
    .string()
    .regex(/^[a-z]+-[a-z-]+$/, { error: 'Cutting mode must read "<movement>-<bounce>"' }),
  rechargeMinutes: Length.default(0),
});

export const SimulatorConfigSchema = z.object({
  tasselDim: PositiveLength,
  runMinutes: PositiveLength,
  repetitions: z.number().int().min(1),
  maps: z.number().int().min(1),
});

type Range = readonly [label: string, min: number, max: number];

export const SimulationConfigSchema = z
  .object({
    environment: EnvironmentConfigSchema,
    robot: RobotConfigSchema,
    simulator: SimulatorConfigSchema,
  })
  .superRefine((data, ctx) => {
    const { environment: env } = data;
    const area = env.isolatedArea;

    const ranges: Array<{ path: (string | number)[]; range: Range }> = [
      { path: ["environment", "isolatedArea"], range: ["width", area.minWidth, area.maxWidth] },
      { path: ["environment", "isolatedArea"], range: ["length", area.minLength, area.maxLength] },
      { path: ["environment", "isolatedArea"], range: ["radius", area.minRadius, area.maxRadius] },
      { path: ["environment", "squares"], range: ["width", env.squares.minWidth, env.squares.maxWidth] },
      { path: ["environment", "squares"], range: ["height", env.squares.minHeight, env.squares.maxHeight] },
      { path: ["environment", "circles"], range: ["radius", env.circles.minRadius, env.circles.maxRadius] },
    ];
    for (const { path, range } of ranges) {
      const [label, min, max] = range;
      if (min > max) {
        ctx.addIssue({
          code: "custom",
          message: `Minimum ${label} must be <= maximum ${label}`,
          path,
        });
      }
    }

    if (area.shape === "rectangle") {
      if (area.minWidth <= 0 || area.minLength <= 0) {
        ctx.addIssue({
          code: "custom",
          message: "Rectangular isolated area needs a positive width and length",
          path: ["environment", "isolatedArea"],
        });
      }
      if (area.maxWidth >= env.width || area.maxLength >= env.length) {
        ctx.addIssue({
          code: "custom",
          message: "Isolated area must be smaller than the field",
          path: ["environment", "isolatedArea"],
        });
      }
    } else {
      if (area.minRadius <= 0) {
        ctx.addIssue({
          code: "custom",
          message: "Circular isolated area needs a positive radius",
          path: ["environment", "isolatedArea"],
        });
      }
      if (area.maxRadius >= Math.min(env.width, env.length)) {
        ctx.addIssue({
          code: "custom",
          message: "Isolated area must be smaller than the field",
          path: ["environment", "isolatedArea"],
        });
      }
    }

    if (data.robot.cuttingDiameter > Math.min(env.width, env.length)) {
      ctx.addIssue({
        code: "custom",
        message: "Cutting diameter exceeds field dimensions",
        path: ["robot", "cuttingDiameter"],
      });
    }
  });

export type SimulationConfig = z.infer<typeof SimulationConfigSchema>;
export type SimulationConfigInput = z.input<typeof SimulationConfigSchema>;
export type EnvironmentConfig = SimulationConfig["environment"];
export type RobotConfig = SimulationConfig["robot"];
export type SimulatorConfig = SimulationConfig["simulator"];

export function parseSimulationConfig(
  input: unknown,
): Result<SimulationConfig, SimulationError> {
  const parsed = SimulationConfigSchema.safeParse(input);
  if (!parsed.success) {
    return Err(
      SimulationError.configInvalid("Invalid simulation configuration", {
        issues: parsed.error.issues,
      }),
    );
  }
  return Ok(parsed.data);
}

export interface FieldDimensions {
  readonly gridWidth: number;
  readonly gridHeight: number;
  readonly tasselDim: number;
  readonly tasselArea: number;
}

export function resolveFieldDimensions(config: SimulationConfig): FieldDimensions {
  const { tasselDim } = config.simulator;
  return {
    gridWidth: Math.ceil(config.environment.width / tasselDim),
    gridHeight: Math.ceil(config.environment.length / tasselDim),
    tasselDim,
    tasselArea: tasselDim * tasselDim,
  };
}

export interface RobotBudget {
  /** Seconds of mowing per charge, reserve already held back. */
  readonly autonomySeconds: number;
  readonly runSeconds: number;
  readonly rechargeSeconds: number;
}

export function resolveRobotBudget(config: SimulationConfig): RobotBudget {
  const { robot, simulator } = config;
  return {
    autonomySeconds: robot.autonomy * 60 * (1 - robot.autonomyReserve),
    runSeconds: simulator.runMinutes * 60,
    rechargeSeconds: robot.rechargeMinutes * 60,
  };
}
