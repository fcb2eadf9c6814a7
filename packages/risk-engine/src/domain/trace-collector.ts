import type { CheckEvaluation, CheckTrace } from "@deepxcheck/core";

export interface TraceCollector {
  record(evaluation: CheckEvaluation): void;
  build(): CheckTrace | undefined;
}

class NoopTraceCollector implements TraceCollector {
  record(_evaluation: CheckEvaluation): void {}

  build(): undefined {
    return undefined;
  }
}

class RecordingTraceCollector implements TraceCollector {
  private readonly evaluations: CheckEvaluation[] = [];

  record(evaluation: CheckEvaluation): void {
    this.evaluations.push(evaluation);
  }

  build(): CheckTrace {
    return {
      schemaVersion: "1",
      evaluations: [...this.evaluations],
    };
  }
}

const noopCollectorSingleton = new NoopTraceCollector();

export const createTraceCollector = (enabled: boolean): TraceCollector =>
  enabled ? new RecordingTraceCollector() : noopCollectorSingleton;
