import type { TraceCollector } from "../../pipeline/trace";
import type { FieldStateArtifact, Pass } from "../../pipeline/types";
import { type ClusterConnection, connectClusterToPerimeter, outlineCluster } from "./connect-clusters";
import { perimeterCells, tracePerimeter } from "./perimeter";

export interface GuidelineReport {
  readonly perimeterCells: number;
  readonly connections: readonly ClusterConnection[];
}

/**
 * Perimeter trace, then one shortest connection and a ring per cluster
 */
export function routeGuidelines(
  state: FieldStateArtifact,
  trace?: TraceCollector,
  passId = "guidelines.route",
): GuidelineReport {
  const { grid } = state;
  const traced = tracePerimeter(grid);
  const perimeter = perimeterCells(grid);
  const connections: ClusterConnection[] = [];

  for (const cluster of state.clusters) {
    const connection = connectClusterToPerimeter(grid, cluster, perimeter);
    if (connection) {
      connections.push(connection);
    } else {
      trace?.decision(
        passId,
        `Connect cluster ${cluster.id}`,
        [],
        null,
        "Cluster already touches the border or has no free anchor",
      );
    }
    outlineCluster(grid, cluster);
  }

  return { perimeterCells: traced.length, connections };
}

export function traceGuidelines(): Pass<FieldStateArtifact, FieldStateArtifact> {
  const passId = "guidelines.route";

  return {
    id: passId,
    inputType: "field-state",
    outputType: "field-state",
    requiredStreams: [],
    run(input, ctx) {
      const report = routeGuidelines(input, ctx.trace, passId);
      ctx.trace.decision(
        passId,
        "Guideline network",
        [],
        report.connections.length,
        `${report.perimeterCells} perimeter cells, ${report.connections.length} cluster connections`,
      );
      return input;
    },
  };
}
