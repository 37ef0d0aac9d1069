/**
 * Trace collection for generation passes.
 */

export type TraceEventType = "start" | "end" | "decision" | "warning";

export interface TraceEvent {
  readonly timestamp: number;
  readonly passId: string;
  readonly eventType: TraceEventType;
  readonly data?: unknown;
}

export interface TraceCollector {
  readonly enabled: boolean;
  start(passId: string, streams?: readonly string[]): void;
  end(passId: string, durationMs: number): void;
  decision(
    passId: string,
    question: string,
    options: readonly unknown[],
    chosen: unknown,
    reason: string,
  ): void;
  warning(passId: string, message: string): void;
  getEvents(): readonly TraceEvent[];
}

export class DefaultTraceCollector implements TraceCollector {
  readonly enabled: boolean;
  private readonly events: TraceEvent[] = [];
  private readonly startTime = performance.now();

  constructor(enabled = false) {
    this.enabled = enabled;
  }

  private emit(passId: string, eventType: TraceEventType, data?: unknown): void {
    if (!this.enabled) return;
    this.events.push({
      timestamp: performance.now() - this.startTime,
      passId,
      eventType,
      data,
    });
  }

  start(passId: string, streams: readonly string[] = []): void {
    this.emit(passId, "start", { streams });
  }

  end(passId: string, durationMs: number): void {
    this.emit(passId, "end", { durationMs });
  }

  decision(
    passId: string,
    question: string,
    options: readonly unknown[],
    chosen: unknown,
    reason: string,
  ): void {
    this.emit(passId, "decision", { question, options, chosen, reason });
  }

  warning(passId: string, message: string): void {
    this.emit(passId, "warning", { message });
  }

  getEvents(): readonly TraceEvent[] {
    return this.events;
  }
}

/**
 * Collector that records nothing
 */
export class NoOpTraceCollector implements TraceCollector {
  readonly enabled = false;

  start(_passId: string, _streams?: readonly string[]): void {}
  end(_passId: string, _durationMs: number): void {}
  decision(
    _passId: string,
    _question: string,
    _options: readonly unknown[],
    _chosen: unknown,
    _reason: string,
  ): void {}
  warning(_passId: string, _message: string): void {}
  getEvents(): readonly TraceEvent[] {
    return [];
  }
}

export function createTraceCollector(enabled: boolean): TraceCollector {
  return enabled ? new DefaultTraceCollector(true) : new NoOpTraceCollector();
}
