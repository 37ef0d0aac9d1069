/**
 * Seed creation, derivation and share codes.
 */

import {
  crc32,
  EncodedSeedSchema,
  Err,
  fromBase64Url,
  Ok,
  type Result,
  SeededRandom,
  SeedPartsSchema,
  SimulationError,
  type SimulationSeed,
  SimulationSeedSchema,
  toBase64Url,
} from "@lawnsim/contracts";

export const SEED_VERSION = "1.0.0";

/**
 * Expand a primary value into one sub-seed per stage
 */
export function createSeed(input: number): SimulationSeed {
  const primary = Math.trunc(Math.abs(input)) >>> 0;
  const rng = new SeededRandom(primary);
  return {
    primary,
    area: rng.nextUint32(),
    obstacles: rng.nextUint32(),
    station: rng.nextUint32(),
    robot: rng.nextUint32(),
    version: SEED_VERSION,
  };
}

/**
 * DJB2 hash of the string, expanded with createSeed
 */
export function createSeedFromString(input: string): SimulationSeed {
  let hash = 5381;
  for (let i = 0; i < input.length; i++) {
    hash = ((hash << 5) + hash + input.charCodeAt(i)) >>> 0;
  }
  return createSeed(hash);
}

/**
 * Seed of an experiment branch (map, repetition, strategy...).
 * The same indices always give the same child.
 */
export function deriveSeed(seed: SimulationSeed, ...indices: number[]): SimulationSeed {
  let h = seed.primary;
  for (const index of indices) {
    h = (h ^ Math.imul((index >>> 0) + 1, 0x9e3779b9)) >>> 0;
    h = Math.imul(h ^ (h >>> 16), 0x85ebca6b) >>> 0;
    h = Math.imul(h ^ (h >>> 13), 0xc2b2ae35) >>> 0;
    h = (h ^ (h >>> 16)) >>> 0;
  }
  return createSeed(h);
}

const seedParts = (seed: SimulationSeed): number[] => [
  seed.primary,
  seed.area,
  seed.obstacles,
  seed.station,
  seed.robot,
];

/**
 * Compact, tamper-evident code for sharing a seed
 */
export function encodeSeed(seed: SimulationSeed): Result<string, SimulationError> {
  const validation = SimulationSeedSchema.safeParse(seed);
  if (!validation.success) {
    return Err(
      SimulationError.seedInvalid("Invalid seed structure", {
        issues: validation.error.issues,
      }),
    );
  }
  const parts = seedParts(seed);
  return Ok(toBase64Url([...parts, crc32(parts.join("|"))].join("|")));
}

export function decodeSeed(encoded: string): Result<SimulationSeed, SimulationError> {
  if (!EncodedSeedSchema.safeParse(encoded).success) {
    return Err(SimulationError.seedInvalid("Invalid encoded seed format"));
  }

  let text: string;
  try {
    text = fromBase64Url(encoded);
  } catch (error) {
    return Err(
      SimulationError.seedInvalid("Base64 decoding failed", {
        reason: error instanceof Error ? error.message : String(error),
      }),
    );
  }

  const parsed = SeedPartsSchema.safeParse(text.split("|").map(Number));
  if (!parsed.success) {
    return Err(
      SimulationError.seedInvalid("Invalid seed parts", {
        issues: parsed.error.issues,
      }),
    );
  }

  const [primary, area, obstacles, station, robot, checksum] = parsed.data;
  const expected = crc32([primary, area, obstacles, station, robot].join("|"));
  if (expected !== checksum) {
    return Err(
      SimulationError.seedInvalid("Seed integrity check failed", {
        expectedCrc: expected,
        receivedCrc: checksum,
      }),
    );
  }

  return Ok({ primary, area, obstacles, station, robot, version: SEED_VERSION });
}
