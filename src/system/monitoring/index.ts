/**
 * Monitoring Module
 *
 * In-memory metrics for deliveries, job runs and eligibility decisions. Samples
 * older than the retention window are pruned whenever a new one is recorded.
 */

export type DeliveryOutcome = 'sent' | 'failed' | 'skipped';

export type MetricName = `delivery_${DeliveryOutcome}` | 'job_duration' | 'gate_decision';

export interface Metric {
  name: MetricName;
  value: number;
  timestamp: Date;
  tags?: Record<string, string>;
}

export interface HealthCheckResult {
  healthy: boolean;
  checks: Record<string, boolean>;
  message?: string;
  timestamp: Date;
}

export interface MonitoringOptions {
  retentionPeriod?: number; // days
  /** Success rate below this (percentage) fails the health check */
  minDeliverySuccessRate?: number;
  clock?: () => Date;
}

const DAY_MS = 86_400_000;

function sum(values: number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

export class MetricsCollector {
  private readonly series = new Map<MetricName, Metric[]>();
  private readonly retentionMs: number;
  private readonly minDeliverySuccessRate: number;
  private readonly clock: () => Date;

  constructor(options: MonitoringOptions = {}) {
    this.retentionMs = (options.retentionPeriod ?? 7) * DAY_MS;
    this.minDeliverySuccessRate = options.minDeliverySuccessRate ?? 80;
    this.clock = options.clock ?? (() => new Date());
  }

  recordDelivery(job: string, destinationId: string, outcome: DeliveryOutcome): void {
    this.push(`delivery_${outcome}`, 1, { job, destinationId });
  }

  recordJobDuration(job: string, durationMs: number, success: boolean): void {
    this.push('job_duration', durationMs, { job, success: String(success) });
  }

  recordGateDecision(destinationId: string, eligible: boolean): void {
    this.push('gate_decision', eligible ? 1 : 0, { destinationId });
  }

  /** Samples within [startTime, endTime], oldest first. */
  getMetrics(startTime: Date, endTime: Date, name?: MetricName): Metric[] {
    const names = name ? [name] : Array.from(this.series.keys());
    const from = startTime.getTime();
    const to = endTime.getTime();

    return names
      .flatMap(key => this.series.get(key) ?? [])
      .filter(metric => metric.timestamp.getTime() >= from && metric.timestamp.getTime() <= to)
      .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  }

  countDeliveries(outcome: DeliveryOutcome, startTime: Date, endTime: Date, job?: string): number {
    return this.forJob(this.getMetrics(startTime, endTime, `delivery_${outcome}`), job).length;
  }

  /**
   * Sent over attempted (sent + failed), as a percentage. Skips are not
   * attempts. 100 when nothing was attempted.
   */
  calculateDeliverySuccessRate(startTime: Date, endTime: Date, job?: string): number {
    const sent = this.countDeliveries('sent', startTime, endTime, job);
    const attempted = sent + this.countDeliveries('failed', startTime, endTime, job);
    return attempted === 0 ? 100 : (sent / attempted) * 100;
  }

  calculateAverageJobDuration(startTime: Date, endTime: Date, job?: string): number {
    const durations = this.forJob(this.getMetrics(startTime, endTime, 'job_duration'), job).map(metric => metric.value);
    return durations.length === 0 ? 0 : sum(durations) / durations.length;
  }

  /** Unhealthy when the last 24h of deliveries fall below the success-rate floor. */
  healthCheck(): HealthCheckResult {
    const now = this.clock();
    const successRate = this.calculateDeliverySuccessRate(new Date(now.getTime() - DAY_MS), now);
    const checks = { delivery_success_rate: successRate >= this.minDeliverySuccessRate };
    const healthy = Object.values(checks).every(Boolean);

    return {
      healthy,
      checks,
      message: healthy
        ? 'All systems operational'
        : `Delivery success rate ${successRate.toFixed(1)}% over the last 24h`,
      timestamp: now
    };
  }

  private forJob(metrics: Metric[], job?: string): Metric[] {
    return job ? metrics.filter(metric => metric.tags?.job === job) : metrics;
  }

  private push(name: MetricName, value: number, tags: Record<string, string>): void {
    const timestamp = this.clock();
    const cutoff = timestamp.getTime() - this.retentionMs;

    for (const [key, samples] of this.series) {
      this.series.set(key, samples.filter(metric => metric.timestamp.getTime() > cutoff));
    }

    const samples = this.series.get(name) ?? [];
    samples.push({ name, value, timestamp, tags });
    this.series.set(name, samples);
  }
}
