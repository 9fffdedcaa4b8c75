import { CloudWatchClient, MetricDatum, PutMetricDataCommand, StandardUnit } from '@aws-sdk/client-cloudwatch';
import { Config } from './config';

// Makes easier to understand the data structure defining this way...
type CWMetricsEntryValues = number;
type CWMetricsEntryCount = number;
type CWMetricsKeyName = string;
type CWMetricEntries = Map<CWMetricsEntryValues, CWMetricsEntryCount>;
type CWMetrics = Map<CWMetricsKeyName, CWMetricEntries>;

export class Metrics {
  protected cloudwatch: CloudWatchClient;
  protected serviceName: string;
  protected metrics: CWMetrics;

  protected getMetricType(metric: string): StandardUnit {
    if (metric.endsWith('.wallclock')) return 'Milliseconds';
    return 'Count';
  }

  protected getCreateEntry(key: string): CWMetricEntries {
    let entry = this.metrics.get(key);
    if (entry === undefined) {
      entry = new Map();
      this.metrics.set(key, entry);
    }
    return entry;
  }

  protected countEntry(key: string, inc = 1) {
    const valEntries = this.getCreateEntry(key);

    const mx = valEntries.size > 0 ? Math.max(...valEntries.keys()) : 0;
    valEntries.clear();
    valEntries.set(mx + inc, 1);
  }

  protected addEntry(key: string, value: number) {
    const entry = this.getCreateEntry(key);
    entry.set(value, (entry.get(value) ?? 0) + 1);
  }

  protected constructor(serviceName: string, cloudwatch?: CloudWatchClient) {
    this.cloudwatch = cloudwatch ?? new CloudWatchClient({ region: Config.Instance.awsRegion });
    this.serviceName = serviceName;
    this.metrics = new Map();
  }

  msTimer() {
    const start = Date.now();
    return () => {
      return Date.now() - start;
    };
  }

  // Current counter value, mostly for logging and tests
  getCount(key: string): number {
    const entry = this.metrics.get(key);
    if (entry === undefined || entry.size === 0) return 0;
    return Math.max(...entry.keys());
  }

  async sendMetrics() {
    if (!Config.Instance.enableMetrics || this.metrics.size < 1) {
      return;
    }

    const timestamp = new Date();
    const metricData: MetricDatum[] = [];

    this.metrics.forEach((vals, name) => {
      const dt: MetricDatum = {
        Counts: [],
        MetricName: name,
        Timestamp: timestamp,
        Unit: this.getMetricType(name),
        Values: [],
      };

      vals.forEach((count, val) => {
        dt.Counts?.push(count);
        dt.Values?.push(val);
      });

      metricData.push(dt);
    });

    await this.cloudwatch.send(
      new PutMetricDataCommand({
        MetricData: metricData,
        Namespace: `${Config.Instance.environment}-${this.serviceName}`,
      }),
    );
    this.metrics.clear();
  }
}

export class WebhookMetrics extends Metrics {
  constructor(cloudwatch?: CloudWatchClient) {
    super('webhook', cloudwatch);
  }

  request() {
    this.countEntry('webhook.requests');
  }

  alertProcessed() {
    this.countEntry('alerts.processed');
  }

  alertDroppedDisabled() {
    this.countEntry('alerts.dropped.disabled');
  }

  alertMalformed() {
    this.countEntry('alerts.malformed');
  }

  backendCall(ms: number) {
    this.addEntry('backend.calls.wallclock', ms);
  }

  async trackBackendCall<T>(fn: () => Promise<T>): Promise<T> {
    const timer = this.msTimer();
    try {
      return await fn();
    } finally {
      this.backendCall(timer());
    }
  }

  backendFailure(retryable: boolean) {
    this.countEntry(retryable ? 'backend.failures.transient' : 'backend.failures.permanent');
  }

  incidentOpened() {
    this.countEntry('incidents.opened');
  }

  incidentClosed() {
    this.countEntry('incidents.closed');
  }

  componentTransition() {
    this.countEntry('components.transitions');
  }
}
