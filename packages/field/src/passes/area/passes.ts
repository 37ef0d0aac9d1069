/**
 * Area generation passes: the isolated area first, then obstacle clusters.
 */

import type { FieldStateArtifact, ObstacleCluster, Pass } from "../../pipeline/types";
import { carveCircularArea, carveRectangularArea } from "./isolated-area";
import { placeCircleObstacle, placeSquareObstacle } from "./obstacles";
import { sampleSize, toCellRadius, toCells } from "./sizing";

export function carveIsolatedArea(): Pass<FieldStateArtifact, FieldStateArtifact, "area"> {
  const passId = "area.isolated-area";

  return {
    id: passId,
    inputType: "field-state",
    outputType: "field-state",
    requiredStreams: ["area"],
    run(input, ctx) {
      const rng = ctx.streams.area;
      const { tasselDim } = ctx.config.dimensions;
      const spec = ctx.config.environment.isolatedArea;

      const area =
        spec.shape === "rectangle"
          ? carveRectangularArea(input.grid, rng, {
              widthCells: toCells(sampleSize(rng, spec.minWidth, spec.maxWidth), tasselDim),
              lengthCells: toCells(sampleSize(rng, spec.minLength, spec.maxLength), tasselDim),
            })
          : carveCircularArea(input.grid, rng, {
              radiusCells: Math.max(
                1,
                toCellRadius(sampleSize(rng, spec.minRadius, spec.maxRadius), tasselDim),
              ),
            });

      ctx.trace.decision(
        passId,
        "Isolated area corner",
        [],
        area.corner,
        `${area.shape} of ${area.cells.length} cells with ${area.openings.length} openings`,
      );
      if (area.enclosure.length === 0) {
        ctx.trace.warning(passId, "Isolated area has no enclosure tassels; no openings cut");
      }

      return { ...input, isolatedArea: area };
    },
  };
}

export function placeObstacles(): Pass<FieldStateArtifact, FieldStateArtifact, "obstacles"> {
  const passId = "area.obstacles";

  return {
    id: passId,
    inputType: "field-state",
    outputType: "field-state",
    requiredStreams: ["obstacles"],
    run(input, ctx) {
      const rng = ctx.streams.obstacles;
      const { tasselDim } = ctx.config.dimensions;
      const { squares, circles } = ctx.config.environment;
      const clusters: ObstacleCluster[] = [...input.clusters];

      for (let i = 0; i < squares.count; i++) {
        const cluster = placeSquareObstacle(input.grid, rng, {
          widthCells: toCells(sampleSize(rng, squares.minWidth, squares.maxWidth), tasselDim),
          heightCells: toCells(sampleSize(rng, squares.minHeight, squares.maxHeight), tasselDim),
        });
        if (cluster) {
          clusters.push(cluster);
        } else {
          ctx.trace.warning(passId, `Square obstacle ${i} skipped: no free anchor`);
        }
      }

      for (let i = 0; i < circles.count; i++) {
        const cluster = placeCircleObstacle(input.grid, rng, {
          radius: sampleSize(rng, circles.minRadius, circles.maxRadius),
          tasselDim,
        });
        if (cluster) {
          clusters.push(cluster);
        } else {
          ctx.trace.warning(passId, `Circle obstacle ${i} skipped: no sample points or no free anchor`);
        }
      }

      ctx.trace.decision(
        passId,
        "Obstacle clusters",
        [squares.count, circles.count],
        clusters.length,
        `${clusters.length} of ${squares.count + circles.count} obstacles placed`,
      );

      return { ...input, clusters };
    },
  };
}
