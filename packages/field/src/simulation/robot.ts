import { angleOf, pointKey } from "../core/geometry/operations";
import { COMPASS_8, type Direction, type Point } from "../core/geometry/types";

export interface RobotSpec {
  readonly speed: number;
  readonly cuttingDiameter: number;
  /** Seconds of work per charge. */
  readonly autonomy: number;
}

/**
 * Mower state carried across the cycles of one run
 */
export class Robot {
  position: Point;
  heading: Direction = COMPASS_8[0];
  /** Real-valued heading in radians, used by the angular bounce. */
  angle = 0;
  autonomy: number;
  readonly speed: number;
  readonly cuttingDiameter: number;
  private readonly visited = new Set<string>();

  constructor(start: Point, spec: RobotSpec) {
    this.position = start;
    this.speed = spec.speed;
    this.cuttingDiameter = spec.cuttingDiameter;
    this.autonomy = spec.autonomy;
    this.visited.add(pointKey(start));
  }

  moveTo(p: Point): void {
    this.position = p;
    this.visited.add(pointKey(p));
  }

  face(d: Direction, angle = angleOf(d)): void {
    this.heading = d;
    this.angle = angle;
  }

  hasVisited(p: Point): boolean {
    return this.visited.has(pointKey(p));
  }

  /**
   * Forget the history except the current cell
   */
  clearVisited(): void {
    this.visited.clear();
    this.visited.add(pointKey(this.position));
  }

  get visitedCount(): number {
    return this.visited.size;
  }

  /**
   * Autonomy never drops below zero
   */
  spend(seconds: number): void {
    this.autonomy = Math.max(0, this.autonomy - seconds);
  }
}
