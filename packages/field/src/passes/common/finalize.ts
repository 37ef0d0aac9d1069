import type { SimulationSeed } from "@lawnsim/contracts";
import type { FieldArtifact, FieldStateArtifact, Pass } from "../../pipeline/types";
import { fieldChecksum } from "../../serialization/snapshot";

/**
 * Freeze the working state into a field artifact
 */
export function buildFieldArtifact(
  state: FieldStateArtifact,
  seed: SimulationSeed | null,
): FieldArtifact {
  const { grid } = state;
  return {
    type: "field",
    id: "field",
    grid,
    isolatedArea: state.isolatedArea,
    clusters: state.clusters,
    referenceTassel: state.isolatedArea?.referenceTassel ?? null,
    centerTassel: {
      x: Math.floor(grid.width / 2),
      y: Math.floor(grid.height / 2),
    },
    largestCluster: grid.largestCluster()?.cells ?? [],
    checksum: fieldChecksum(grid),
    seed,
  };
}

export function finalizeField(): Pass<FieldStateArtifact, FieldArtifact> {
  const passId = "field.finalize";

  return {
    id: passId,
    inputType: "field-state",
    outputType: "field",
    requiredStreams: [],
    run(input, ctx) {
      const artifact = buildFieldArtifact(input, ctx.seed);

      ctx.trace.decision(
        passId,
        "Field checksum",
        [],
        artifact.checksum,
        `${artifact.clusters.length} clusters, largest has ${artifact.largestCluster.length} cells`,
      );

      return artifact;
    },
  };
}
