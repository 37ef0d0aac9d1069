/**
 * Versioned JSON snapshots of a field. Only non-empty cells are listed, in
 * row-major order, with their markers in placement order.
 */

import {
  Err,
  GridSnapshotSchema,
  Ok,
  Result,
  type GridSnapshot,
  type ResourceMarker,
  SimulationError,
  SNAPSHOT_VERSION,
} from "@lawnsim/contracts";
import { GridModel } from "../core/grid/grid-model";
import { fnv64HashString } from "../core/hash/fnv64";

export function serializeGrid(grid: GridModel): GridSnapshot {
  const cells: GridSnapshot["cells"] = [];
  grid.forEachCell((p, markers) => {
    if (markers.length === 0) return;
    cells.push({ x: p.x, y: p.y, markers: markers.map((m) => ({ ...m })) });
  });
  return { version: SNAPSHOT_VERSION, width: grid.width, height: grid.height, cells };
}

/**
 * Rebuild a field from a snapshot object or its JSON text
 */
export function deserializeGrid(input: unknown): Result<GridModel, SimulationError> {
  const raw =
    typeof input === "string"
      ? Result.fromThrowable(
          (): unknown => JSON.parse(input),
          (e) =>
            SimulationError.snapshotInvalid("Snapshot is not valid JSON", {
              reason: e instanceof Error ? e.message : String(e),
            }),
        )
      : Ok<unknown, SimulationError>(input);

  return raw.flatMap((value): Result<GridModel, SimulationError> => {
    const parsed = GridSnapshotSchema.safeParse(value);
    if (!parsed.success) {
      return Err(
        SimulationError.snapshotInvalid("Invalid grid snapshot", {
          issues: parsed.error.issues,
        }),
      );
    }
    return rebuild(parsed.data);
  });
}

function rebuild(snapshot: GridSnapshot): Result<GridModel, SimulationError> {
  const grid = new GridModel(snapshot.width, snapshot.height);
  for (const cell of snapshot.cells) {
    for (const marker of cell.markers) {
      const copy: ResourceMarker = { ...marker };
      if (!grid.place(copy, cell.x, cell.y)) {
        return Err(
          SimulationError.snapshotInvalid(
            `Marker ${marker.kind} cannot sit at (${cell.x}, ${cell.y})`,
            { x: cell.x, y: cell.y, kind: marker.kind },
          ),
        );
      }
    }
  }
  return Ok(grid);
}

export const CHECKSUM_VERSION = 1;

/**
 * Deterministic fingerprint of every marker on the field
 */
export function fieldChecksum(grid: GridModel): string {
  return `v${CHECKSUM_VERSION}:${fnv64HashString(JSON.stringify(serializeGrid(grid)))}`;
}
