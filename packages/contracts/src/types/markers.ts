/**
 * Marker kinds a field cell can hold. Const-object pattern so the values
 * survive into runtime and serialize as readable strings.
 */
export const MarkerKind = {
  GrassTassel: "grass-tassel",
  IsolatedArea: "isolated-area",
  Opening: "opening",
  SquaredBlockedArea: "squared-blocked-area",
  CircledBlockedArea: "circled-blocked-area",
  GuideLine: "guideline",
  BaseStation: "base-station",
} as const;

export type MarkerKind = (typeof MarkerKind)[keyof typeof MarkerKind];

export const MARKER_KINDS: readonly MarkerKind[] = Object.values(MarkerKind);

export interface GrassTasselMarker {
  readonly kind: typeof MarkerKind.GrassTassel;
  cutCount: number;
}

export interface IsolatedAreaMarker {
  readonly kind: typeof MarkerKind.IsolatedArea;
}

export interface OpeningMarker {
  readonly kind: typeof MarkerKind.Opening;
}

export interface SquaredBlockedAreaMarker {
  readonly kind: typeof MarkerKind.SquaredBlockedArea;
  readonly clusterId: number;
}

export interface CircledBlockedAreaMarker {
  readonly kind: typeof MarkerKind.CircledBlockedArea;
  readonly clusterId: number;
  readonly radius: number;
}

export interface GuideLineMarker {
  readonly kind: typeof MarkerKind.GuideLine;
}

export interface BaseStationMarker {
  readonly kind: typeof MarkerKind.BaseStation;
}

export type ResourceMarker =
  | GrassTasselMarker
  | IsolatedAreaMarker
  | OpeningMarker
  | SquaredBlockedAreaMarker
  | CircledBlockedAreaMarker
  | GuideLineMarker
  | BaseStationMarker;

export type ObstacleMarker = SquaredBlockedAreaMarker | CircledBlockedAreaMarker;

/** Kinds that block a cell on their own. */
export const OBSTACLE_KINDS: readonly MarkerKind[] = [
  MarkerKind.SquaredBlockedArea,
  MarkerKind.CircledBlockedArea,
];

export function isObstacleMarker(marker: ResourceMarker): marker is ObstacleMarker {
  return (
    marker.kind === MarkerKind.SquaredBlockedArea ||
    marker.kind === MarkerKind.CircledBlockedArea
  );
}

export const Markers = {
  grass: (cutCount = 0): GrassTasselMarker => ({
    kind: MarkerKind.GrassTassel,
    cutCount,
  }),
  isolatedArea: (): IsolatedAreaMarker => ({ kind: MarkerKind.IsolatedArea }),
  opening: (): OpeningMarker => ({ kind: MarkerKind.Opening }),
  square: (clusterId: number): SquaredBlockedAreaMarker => ({
    kind: MarkerKind.SquaredBlockedArea,
    clusterId,
  }),
  circle: (clusterId: number, radius: number): CircledBlockedAreaMarker => ({
    kind: MarkerKind.CircledBlockedArea,
    clusterId,
    radius,
  }),
  guideLine: (): GuideLineMarker => ({ kind: MarkerKind.GuideLine }),
  baseStation: (): BaseStationMarker => ({ kind: MarkerKind.BaseStation }),
} as const;
