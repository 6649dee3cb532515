export * from './MetricsRecorder';
export { InMemoryMetricsRecorder } from './InMemoryMetricsRecorder';
