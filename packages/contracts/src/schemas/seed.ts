import { z } from "zod";

const UINT32_MAX = 0xffffffff;
const Uint32Schema = z
  .number()
  .int()
  .min(0, { error: "Seed values must be non-negative integers" })
  .max(UINT32_MAX, { error: "Seed values must fit in uint32" });

export const SimulationSeedSchema = z.object({
  primary: Uint32Schema,
  area: Uint32Schema,
  obstacles: Uint32Schema,
  station: Uint32Schema,
  robot: Uint32Schema,
  version: z
    .string()
    .regex(/^\d+\.\d+\.\d+$/, { error: "Invalid version format" }),
});

export const EncodedSeedSchema = z
  .base64url()
  .min(1, { error: "Encoded seed cannot be empty" });

export const SeedPartsSchema = z.tuple([
  Uint32Schema, // primary
  Uint32Schema, // area
  Uint32Schema, // obstacles
  Uint32Schema, // station
  Uint32Schema, // robot
  Uint32Schema, // crc
]);
