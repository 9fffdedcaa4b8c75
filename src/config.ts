import { getBoolean, getNumber } from './utils';

export class Config {
  private static _instance: Config | undefined;

  readonly awsRegion: string;
  readonly environment: string;
  readonly cachetApiUrl: string;
  readonly cachetApiToken: string | undefined;
  readonly cachetSecretId: string | undefined;
  readonly webhookUsername: string | undefined;
  readonly webhookPassword: string | undefined;
  readonly port: number;
  readonly settingsFile: string;
  readonly backendTimeoutMs: number;
  readonly backendMaxRetries: number;
  readonly backendRetryBaseMs: number;
  readonly backendRequestsPerSecond: number;
  readonly enableMetrics: boolean;

  // Cachet status codes, mapped from the engine's logical states at the client boundary
  readonly statusHealthy: number;
  readonly statusPartial: number;
  readonly statusDown: number;
  readonly incidentInvestigating: number;
  readonly incidentFixed: number;

  protected constructor() {
    this.awsRegion = process.env.AWS_REGION || 'us-east-1';
    this.environment = process.env.ENVIRONMENT || 'status-bridge';
    this.cachetApiUrl = (process.env.CACHET_API_URL || '').replace(/\/+$/, '');
    this.cachetApiToken = process.env.CACHET_API_TOKEN || undefined;
    this.cachetSecretId = process.env.CACHET_SECRET_ID || undefined;
    this.webhookUsername = process.env.WEBHOOK_USERNAME || undefined;
    this.webhookPassword = process.env.WEBHOOK_PASSWORD || undefined;
    this.port = getNumber(process.env.PORT, 5000, 1);
    this.settingsFile = process.env.STATUS_BRIDGE_CONFIG || 'config.json';

    this.backendTimeoutMs = getNumber(process.env.BACKEND_TIMEOUT_MS, 10000, 1);
    this.backendMaxRetries = getNumber(process.env.BACKEND_MAX_RETRIES, 3);
    this.backendRetryBaseMs = getNumber(process.env.BACKEND_RETRY_BASE_MS, 200);
    this.backendRequestsPerSecond = getNumber(process.env.BACKEND_REQUESTS_PER_SECOND, 10, 1);
    this.enableMetrics = getBoolean(process.env.ENABLE_METRICS);

    this.statusHealthy = getNumber(process.env.CACHET_STATUS_HEALTHY, 1);
    this.statusPartial = getNumber(process.env.CACHET_STATUS_PARTIAL, 3);
    this.statusDown = getNumber(process.env.CACHET_STATUS_DOWN, 4);
    this.incidentInvestigating = getNumber(process.env.CACHET_INCIDENT_INVESTIGATING, 1);
    this.incidentFixed = getNumber(process.env.CACHET_INCIDENT_FIXED, 4);
  }

  static get Instance(): Config {
    return this._instance || (this._instance = new this());
  }

  static resetConfig() {
    this._instance = undefined;
  }
}
