import { MetricLabels, MetricsRecorder, RequestObservation } from './MetricsRecorder';

function counterKey(name: string, labels: MetricLabels = {}): string {
  const rendered = Object.keys(labels)
    .sort()
    .map((key) => `${key}="${labels[key] ?? ''}"`)
    .join(',');
  return rendered === '' ? name : `${name}{${rendered}}`;
}

/**
 * Metrics recorder that keeps everything in process memory
 */
export class InMemoryMetricsRecorder implements MetricsRecorder {
  private readonly counters = new Map<string, number>();
  private readonly observations: RequestObservation[] = [];

  recordRequest(observation: RequestObservation): void {
    this.observations.push({ ...observation });
    this.incrementCounter('http_requests_total', {
      method: observation.method,
      route: observation.route,
      status: String(observation.status),
    });
  }

  incrementCounter(name: string, labels?: MetricLabels): void {
    const key = counterKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + 1);
  }

  counterValue(name: string, labels?: MetricLabels): number {
    return this.counters.get(counterKey(name, labels)) ?? 0;
  }

  /**
   * Snapshot of the observations recorded so far
   */
  requests(): RequestObservation[] {
    return [...this.observations];
  }

  reset(): void {
    this.counters.clear();
    this.observations.length = 0;
  }
}
