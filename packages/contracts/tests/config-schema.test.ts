import { describe, expect, it } from "vitest";
import {
  parseSimulationConfig,
  resolveFieldDimensions,
  resolveRobotBudget,
  SimulationConfigSchema,
  type SimulationConfigInput,
} from "../src";

function validConfig(): SimulationConfigInput {
  return {
    environment: {
      width: 20,
      length: 15,
      isolatedArea: {
        shape: "rectangle",
        minWidth: 3,
        maxWidth: 5,
        minLength: 3,
        maxLength: 5,
      },
      squares: { count: 2, minWidth: 1, maxWidth: 3, minHeight: 1, maxHeight: 3 },
      circles: { count: 1, minRadius: 1, maxRadius: 2 },
    },
    robot: {
      speed: 0.5,
      autonomy: 10,
      cuttingDiameter: 1,
      cuttingMode: "random-deflect",
    },
    simulator: { tasselDim: 0.5, runMinutes: 60, repetitions: 2, maps: 1 },
  };
}

describe("SimulationConfigSchema", () => {
  it("accepts a complete configuration and fills defaults", () => {
    const res = SimulationConfigSchema.safeParse(validConfig());
    expect(res.success).toBe(true);
    if (!res.success) return;
    expect(res.data.robot.autonomyReserve).toBe(0.1);
    expect(res.data.robot.rechargeMinutes).toBe(0);
    expect(res.data.environment.isolatedArea.minRadius).toBe(0);
  });

  it("rejects an inverted range", () => {
    const config = validConfig();
    config.environment.squares.minWidth = 4;
    const res = SimulationConfigSchema.safeParse(config);
    expect(res.success).toBe(false);
    if (res.success) return;
    expect(res.error.issues.map((issue) => issue.message)).toContain(
      "Minimum width must be <= maximum width",
    );
  });

  it("rejects an isolated area as large as the field", () => {
    const config = validConfig();
    config.environment.isolatedArea.maxWidth = 20;
    const res = SimulationConfigSchema.safeParse(config);
    expect(res.success).toBe(false);
  });

  it("requires a radius for a circular isolated area", () => {
    const config = validConfig();
    config.environment.isolatedArea = { shape: "circle" };
    const res = SimulationConfigSchema.safeParse(config);
    expect(res.success).toBe(false);
    if (res.success) return;
    expect(res.error.issues[0]?.message).toBe(
      "Circular isolated area needs a positive radius",
    );
  });

  it("rejects a malformed cutting mode", () => {
    const config = validConfig();
    config.robot.cuttingMode = "random";
    expect(SimulationConfigSchema.safeParse(config).success).toBe(false);
  });
});

describe("parseSimulationConfig", () => {
  it("wraps validation failures in CONFIG_INVALID", () => {
    const result = parseSimulationConfig({ environment: {} });
    expect(result.isErr()).toBe(true);
    expect(result.error.code).toBe("CONFIG_INVALID");
    expect(result.error.details?.issues).toBeDefined();
  });

  it("returns the parsed configuration", () => {
    const result = parseSimulationConfig(validConfig());
    expect(result.isOk()).toBe(true);
    expect(result.value.simulator.maps).toBe(1);
  });
});

describe("derived dimensions", () => {
  it("rounds the grid up to whole tassels", () => {
    const config = parseSimulationConfig(validConfig()).getOrThrow();
    const dims = resolveFieldDimensions(config);
    expect(dims.gridWidth).toBe(40);
    expect(dims.gridHeight).toBe(30);
    expect(dims.tasselArea).toBe(0.25);

    const odd = parseSimulationConfig({
      ...validConfig(),
      simulator: { tasselDim: 4, runMinutes: 60, repetitions: 1, maps: 1 },
    }).getOrThrow();
    expect(resolveFieldDimensions(odd).gridWidth).toBe(5);
    expect(resolveFieldDimensions(odd).gridHeight).toBe(4);
  });

  it("holds back the autonomy reserve", () => {
    const input = validConfig();
    const config = parseSimulationConfig({
      ...input,
      robot: { ...input.robot, autonomyReserve: 0.5, rechargeMinutes: 2 },
    }).getOrThrow();
    expect(resolveRobotBudget(config)).toEqual({
      autonomySeconds: 300,
      runSeconds: 3600,
      rechargeSeconds: 120,
    });
  });
});
