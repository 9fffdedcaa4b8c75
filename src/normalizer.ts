import { MalformedPayloadError } from "./errors";
import { WebhookMetrics } from "./metrics";
import { AlertEvent } from "./types";
import { getBoolean, isRecord, splitServiceNames } from "./utils";

export const LABEL_ENABLED = "status_page_alert";
export const LABEL_SERVICES = "status_page_component";
export const LABEL_CRITICAL = "status_page_critical_target";

// Alertmanager webhook body, after shape validation
export interface NotificationBatch {
  receiver?: string;
  status?: string;
  alerts: unknown[];
}

// Parse the raw request body; anything that is not a batch of alerts is a malformed shape
export function parseNotificationBody(body: string | undefined | null): NotificationBatch {
  if (!body) {
    throw new MalformedPayloadError("Empty request body");
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    throw new MalformedPayloadError(
      `Request body is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  if (!isRecord(parsed)) {
    throw new MalformedPayloadError("Request body is not a JSON object");
  }
  if (!Array.isArray(parsed.alerts)) {
    throw new MalformedPayloadError('Request body has no "alerts" array');
  }

  return {
    receiver: typeof parsed.receiver === "string" ? parsed.receiver : undefined,
    status: typeof parsed.status === "string" ? parsed.status : undefined,
    alerts: parsed.alerts,
  };
}

export interface NormalizerStats {
  dropped: number;
  malformed: number;
}

// One instance per batch: the stats describe the batch it normalized
export class AlertNormalizer {
  readonly stats: NormalizerStats = { dropped: 0, malformed: 0 };

  constructor(private readonly metrics?: WebhookMetrics) {}

  // Lazily turn a batch into events; irrelevant records are dropped, malformed ones counted
  *normalize(batch: NotificationBatch): Generator<AlertEvent> {
    for (const [index, record] of batch.alerts.entries()) {
      const event = this.normalizeRecord(record, index);
      if (event) yield event;
    }
  }

  normalizeRecord(record: unknown, index = 0): AlertEvent | undefined {
    if (!isRecord(record) || !isRecord(record.labels)) {
      this.malformed(index, "record has no label mapping");
      return undefined;
    }

    const labels = record.labels;
    const alertName = this.labelString(labels.alertname);
    const instance = this.labelString(labels.instance);

    if (!getBoolean(this.labelValue(labels[LABEL_ENABLED]), false)) {
      console.info(`Alert '${alertName ?? "unknown"}' for instance '${instance ?? "unknown"}' is not a status page alert, ignoring`);
      this.stats.dropped++;
      this.metrics?.alertDroppedDisabled();
      return undefined;
    }

    const serviceLabel = this.labelString(labels[LABEL_SERVICES]);
    const serviceNames = serviceLabel ? splitServiceNames(serviceLabel) : [];
    if (!serviceLabel || serviceNames.length === 0) {
      this.malformed(index, `missing ${LABEL_SERVICES} label`, alertName, instance);
      return undefined;
    }
    if (!alertName || !instance) {
      this.malformed(index, "missing alertname or instance label", alertName, instance);
      return undefined;
    }

    const firing = this.extractFiring(record.status);
    if (firing === undefined) {
      this.malformed(index, `unknown status '${String(record.status)}'`, alertName, instance);
      return undefined;
    }

    return {
      alertName,
      targetInstance: instance,
      firing,
      serviceNames,
      serviceLabel: serviceLabel.trim(),
      critical: getBoolean(this.labelValue(labels[LABEL_CRITICAL]), false),
    };
  }

  private extractFiring(status: unknown): boolean | undefined {
    if (typeof status !== "string") return undefined;
    const normalized = status.trim().toLowerCase();
    if (normalized === "firing") return true;
    if (normalized === "resolved") return false;
    return undefined;
  }

  private labelString(value: unknown): string | undefined {
    if (typeof value !== "string") return undefined;
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }

  private labelValue(value: unknown): string | boolean | number | undefined {
    if (typeof value === "string" || typeof value === "boolean" || typeof value === "number") return value;
    return undefined;
  }

  private malformed(index: number, reason: string, alertName?: string, instance?: string) {
    console.warn("Dropping malformed alert record", { index, reason, alertName, instance });
    this.stats.malformed++;
    this.metrics?.alertMalformed();
  }
}
