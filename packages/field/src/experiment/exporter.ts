import type { CycleExporter, CycleReport } from "@lawnsim/contracts";

/**
 * Keeps every cycle report in memory, in arrival order.
 */
export class InMemoryCycleExporter implements CycleExporter {
  private readonly collected: CycleReport[] = [];

  exportCycle(report: CycleReport): void {
    this.collected.push(report);
  }

  get reports(): readonly CycleReport[] {
    return this.collected;
  }

  /** Reports of one map / strategy / repetition run. */
  forRun(mapIndex: number, strategy: string, repetition: number): CycleReport[] {
    return this.collected.filter(
      (r) => r.mapIndex === mapIndex && r.strategy === strategy && r.repetition === repetition,
    );
  }

  clear(): void {
    this.collected.length = 0;
  }
}
