export type MetricValue = number | boolean | string;

export type Severity = "info" | "warning" | "critical";

export interface Snapshot {
  probe: string;
  timestamp: number;
  available: boolean;
  metrics: Readonly<Record<string, MetricValue>>;
  error?: string;
}

export interface ProbeAlert {
  metric: string;
  severity: Severity;
  message: string;
  source: string;
}

export interface CommandResult {
  success: boolean;
  message: string;
}

/**
 * A pluggable unit producing a status snapshot for one subsystem.
 *
 * `status()` may reject or hang; the aggregator bounds it with a timeout.
 * `alerts()` and `summaryLine()` are synchronous and derive only from the
 * snapshot they are given.
 */
export interface Probe {
  readonly id: string;
  status(): Promise<Snapshot>;
  alerts(snapshot: Snapshot): ProbeAlert[];
  summaryLine(snapshot: Snapshot): string;
  execute?(command: string): Promise<CommandResult>;
  close?(): Promise<void>;
}

export function createSnapshot(
  probe: string,
  metrics: Record<string, MetricValue>,
  timestamp: number = Date.now()
): Snapshot {
  return Object.freeze({
    probe,
    timestamp,
    available: true,
    metrics: Object.freeze({ ...metrics }),
  });
}

export function unavailableSnapshot(
  probe: string,
  error: string,
  timestamp: number = Date.now()
): Snapshot {
  return Object.freeze({
    probe,
    timestamp,
    available: false,
    metrics: Object.freeze({}),
    error,
  });
}

export function numberMetric(snapshot: Snapshot, name: string): number | undefined {
  const value = snapshot.metrics[name];
  return typeof value === "number" ? value : undefined;
}

export function booleanMetric(snapshot: Snapshot, name: string): boolean | undefined {
  const value = snapshot.metrics[name];
  return typeof value === "boolean" ? value : undefined;
}
