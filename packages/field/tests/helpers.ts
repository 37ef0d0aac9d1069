import {
  parseSimulationConfig,
  type SimulationConfig,
  type SimulationConfigInput,
} from "@lawnsim/contracts";

export function configInput(): SimulationConfigInput {
  return {
    environment: {
      width: 24,
      length: 18,
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
      speed: 1,
      autonomy: 2,
      autonomyReserve: 0,
      cuttingDiameter: 1,
      cuttingMode: "random-deflect",
    },
    simulator: { tasselDim: 1, runMinutes: 5, repetitions: 2, maps: 2 },
  };
}

export function testConfig(
  patch: (input: SimulationConfigInput) => SimulationConfigInput = (input) => input,
): SimulationConfig {
  return parseSimulationConfig(patch(configInput())).getOrThrow();
}

export function withCuttingMode(cuttingMode: string): SimulationConfig {
  return testConfig((input) => ({ ...input, robot: { ...input.robot, cuttingMode } }));
}
