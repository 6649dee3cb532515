export type MetricLabels = Record<string, string>;

export interface RequestObservation {
  method: string;
  route: string;
  status: number;
  durationMs: number;
}

/**
 * Sink for operational metrics.
 *
 * Passed explicitly to whatever records observations; there is no process-wide
 * registry. An exporter (Prometheus or otherwise) implements this interface.
 */
export interface MetricsRecorder {
  recordRequest(observation: RequestObservation): void;
  incrementCounter(name: string, labels?: MetricLabels): void;
}

export const noopMetricsRecorder: MetricsRecorder = {
  recordRequest: () => undefined,
  incrementCounter: () => undefined,
};
