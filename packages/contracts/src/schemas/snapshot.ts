import { z } from "zod";
import { MarkerKind } from "../types/markers";

export const SNAPSHOT_VERSION = 1;

const ClusterId = z.number().int().min(0);

export const ResourceMarkerSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal(MarkerKind.GrassTassel),
    cutCount: z.number().int().min(0),
  }),
  z.object({ kind: z.literal(MarkerKind.IsolatedArea) }),
  z.object({ kind: z.literal(MarkerKind.Opening) }),
  z.object({
    kind: z.literal(MarkerKind.SquaredBlockedArea),
    clusterId: ClusterId,
  }),
  z.object({
    kind: z.literal(MarkerKind.CircledBlockedArea),
    clusterId: ClusterId,
    radius: z.number().nonnegative(),
  }),
  z.object({ kind: z.literal(MarkerKind.GuideLine) }),
  z.object({ kind: z.literal(MarkerKind.BaseStation) }),
]);

export const CellSnapshotSchema = z.object({
  x: z.number().int().min(0),
  y: z.number().int().min(0),
  markers: z.array(ResourceMarkerSchema).min(1),
});

export const GridSnapshotSchema = z
  .object({
    version: z.literal(SNAPSHOT_VERSION),
    width: z.number().int().min(1),
    height: z.number().int().min(1),
    cells: z.array(CellSnapshotSchema),
  })
  .superRefine((data, ctx) => {
    const seen = new Set<number>();
    data.cells.forEach((cell, index) => {
      if (cell.x >= data.width || cell.y >= data.height) {
        ctx.addIssue({
          code: "custom",
          message: `Cell (${cell.x}, ${cell.y}) lies outside a ${data.width}x${data.height} grid`,
          path: ["cells", index],
        });
      }
      const key = cell.y * data.width + cell.x;
      if (seen.has(key)) {
        ctx.addIssue({
          code: "custom",
          message: `Cell (${cell.x}, ${cell.y}) is listed twice`,
          path: ["cells", index],
        });
      }
      seen.add(key);
    });
  });

export type GridSnapshot = z.infer<typeof GridSnapshotSchema>;
export type CellSnapshot = z.infer<typeof CellSnapshotSchema>;
