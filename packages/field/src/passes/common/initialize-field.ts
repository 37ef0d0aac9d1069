import { GridModel } from "../../core/grid/grid-model";
import type { EmptyArtifact, FieldStateArtifact, Pass } from "../../pipeline/types";

export function initializeField(): Pass<EmptyArtifact, FieldStateArtifact> {
  const passId = "field.initialize";

  return {
    id: passId,
    inputType: "empty",
    outputType: "field-state",
    requiredStreams: [],
    run(_input, ctx) {
      const { gridWidth, gridHeight } = ctx.config.dimensions;
      const grid = new GridModel(gridWidth, gridHeight);

      ctx.trace.decision(
        passId,
        "Field size",
        [],
        { gridWidth, gridHeight },
        `Created ${gridWidth}x${gridHeight} tassels of ${ctx.config.dimensions.tasselDim} units`,
      );

      return {
        type: "field-state",
        id: "field-state",
        grid,
        isolatedArea: null,
        clusters: [],
      };
    },
  };
}
