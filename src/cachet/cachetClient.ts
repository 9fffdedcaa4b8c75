import { Config } from "../config";
import { BackendPermanentError, BackendTransientError, errorMessage } from "../errors";
import { AggregateHealth, TargetHealth } from "../types";
import { BACKEND_CIRCUIT_BREAKER_CONFIG, CircuitBreaker, CircuitBreakerConfig, CircuitOpenError } from "../utils/circuitBreaker";
import { RateLimiter } from "../utils/rateLimiter";
import { isRecord, sleep } from "../utils";
import { CachetCredentials, TokenProvider } from "./credentials";
import { fromCachetStatus, IncidentStatus, toCachetIncidentStatus, toCachetStatus } from "./statusCodes";
import {
  CachetComponent,
  CachetComponentGroup,
  CachetIncident,
  ComponentInput,
  ComponentUpdate,
  IncidentInput,
  StatusPageBackend,
} from "./types";

export interface CachetClientOptions {
  baseUrl: string;
  tokenProvider: TokenProvider;
  timeoutMs?: number;
  maxRetries?: number;
  retryBaseMs?: number;
  requestsPerSecond?: number;
  perPage?: number;
  circuitBreaker?: CircuitBreakerConfig;
}

type Query = Record<string, string | number>;

interface RequestOptions {
  query?: Query;
  body?: unknown;
}

// Cachet open incident statuses: scheduled, investigating, identified, watching
const OPEN_INCIDENT_FILTER = "0,1,2,3";
const MAX_PAGES = 500;

export class CachetClient implements StatusPageBackend {
  private readonly baseUrl: string;
  private readonly tokenProvider: TokenProvider;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryBaseMs: number;
  private readonly perPage: number;
  private readonly rateLimiter: RateLimiter;
  private readonly circuitBreaker: CircuitBreaker;
  private readonly componentIds = new Map<string, number>();

  constructor(options: CachetClientOptions) {
    if (!options.baseUrl) throw new Error("CACHET_API_URL not set");
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.tokenProvider = options.tokenProvider;
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.maxRetries = options.maxRetries ?? 3;
    this.retryBaseMs = options.retryBaseMs ?? 200;
    this.perPage = options.perPage ?? 50;
    this.rateLimiter = new RateLimiter(options.requestsPerSecond ?? 10);
    this.circuitBreaker = new CircuitBreaker({
      ...(options.circuitBreaker ?? BACKEND_CIRCUIT_BREAKER_CONFIG),
      isFailure: (error) => !(error instanceof BackendPermanentError),
    });
  }

  static fromConfig(perPage = 50): CachetClient {
    const config = Config.Instance;
    return new CachetClient({
      baseUrl: config.cachetApiUrl,
      tokenProvider: new CachetCredentials().asProvider(),
      timeoutMs: config.backendTimeoutMs,
      maxRetries: config.backendMaxRetries,
      retryBaseMs: config.backendRetryBaseMs,
      requestsPerSecond: config.backendRequestsPerSecond,
      perPage,
    });
  }

  // Components

  async listComponents(): Promise<CachetComponent[]> {
    const components = (await this.listAll("/components")).map(parseComponent);
    this.componentIds.clear();
    for (const component of components) {
      this.componentIds.set(component.name, component.id);
    }
    return components;
  }

  async getComponent(id: number): Promise<CachetComponent> {
    const payload = await this.request("GET", `/components/${id}`);
    return parseComponent(dataOf(payload));
  }

  // Resolves by name from a cache, refreshing the full listing on a miss
  async findComponentIdByName(name: string): Promise<number | undefined> {
    const cached = this.componentIds.get(name);
    if (cached !== undefined) return cached;

    await this.listComponents();
    const id = this.componentIds.get(name);
    if (id === undefined) {
      console.warn(`Component '${name}' not found in Cachet`);
    }
    return id;
  }

  async createComponent(input: ComponentInput): Promise<number> {
    const payload = await this.request("POST", "/components", {
      body: {
        name: input.name,
        status: toCachetStatus(input.status),
        enabled: input.enabled,
        description: input.description ?? "",
        meta: input.meta,
        component_group_id: input.groupId,
      },
    });
    const id = parseId(recordOf(dataOf(payload)).id);
    this.componentIds.set(input.name, id);
    return id;
  }

  async updateComponent(id: number, update: ComponentUpdate): Promise<void> {
    await this.request("PUT", `/components/${id}`, {
      body: {
        status: update.status === undefined ? undefined : toCachetStatus(update.status),
        enabled: update.enabled,
        description: update.description,
        meta: update.meta,
        component_group_id: update.groupId,
      },
    });
  }

  async updateComponentStatus(id: number, status: AggregateHealth | TargetHealth): Promise<void> {
    await this.updateComponent(id, { status });
  }

  async deleteComponent(id: number): Promise<void> {
    await this.request("DELETE", `/components/${id}`);
    for (const [name, cachedId] of this.componentIds) {
      if (cachedId === id) this.componentIds.delete(name);
    }
  }

  // Component groups

  async listComponentGroups(): Promise<CachetComponentGroup[]> {
    return (await this.listAll("/component-groups")).map((raw) => {
      const record = recordOf(raw);
      const attributes = isRecord(record.attributes) ? record.attributes : record;
      return { id: parseId(record.id), name: stringOr(attributes.name, "") };
    });
  }

  async createComponentGroup(name: string): Promise<number> {
    const payload = await this.request("POST", "/component-groups", {
      body: { name, visible: 1 },
    });
    return parseId(recordOf(dataOf(payload)).id);
  }

  async deleteComponentGroup(id: number): Promise<void> {
    await this.request("DELETE", `/component-groups/${id}`);
  }

  // Incidents

  async listOpenIncidents(): Promise<CachetIncident[]> {
    const fixed = toCachetIncidentStatus("FIXED");
    const incidents = (await this.listAll("/incidents", { "filter[status]": OPEN_INCIDENT_FILTER })).map(parseIncident);
    return incidents.filter((incident) => incident.statusCode !== fixed);
  }

  async createIncident(input: IncidentInput): Promise<number> {
    const payload = await this.request("POST", "/incidents", {
      body: {
        name: input.name,
        message: input.message,
        status: toCachetIncidentStatus("INVESTIGATING"),
        visible: 1,
        component_id: input.componentId,
        component_status: toCachetStatus("DOWN"),
      },
    });
    return parseId(recordOf(dataOf(payload)).id);
  }

  // Posts an incident update carrying the message (when given), then sets the incident status
  async updateIncident(id: number, status: IncidentStatus, message?: string): Promise<void> {
    const code = toCachetIncidentStatus(status);
    if (message) {
      await this.request("POST", `/incidents/${id}/updates`, {
        body: { status: code, message, visible: 1 },
      });
    }
    await this.request("PUT", `/incidents/${id}`, { body: { status: code } });
  }

  // Transport

  private async listAll(path: string, query: Query = {}): Promise<unknown[]> {
    const items: unknown[] = [];
    for (let page = 1; page <= MAX_PAGES; page++) {
      const payload = await this.request("GET", path, {
        query: { ...query, per_page: this.perPage, page },
      });
      const data = dataOf(payload);
      if (!Array.isArray(data)) {
        throw new BackendPermanentError(`Cachet ${path} listing is not an array`);
      }
      items.push(...data);

      const links = isRecord(payload) && isRecord(payload.links) ? payload.links : undefined;
      if (!links?.next || data.length === 0) {
        return items;
      }
    }
    console.warn(`Stopped paginating ${path} after ${MAX_PAGES} pages`);
    return items;
  }

  private async request(method: string, path: string, options: RequestOptions = {}): Promise<unknown> {
    try {
      return await this.circuitBreaker.execute(() =>
        this.withRetry(method, path, () => this.rateLimiter.execute(() => this.send(method, path, options))),
      );
    } catch (error) {
      if (error instanceof CircuitOpenError) {
        throw new BackendTransientError(`Cachet ${method} ${path} skipped: ${error.message}`);
      }
      throw error;
    }
  }

  private async withRetry<T>(method: string, path: string, fn: () => Promise<T>): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        if (!(error instanceof BackendTransientError) || attempt >= this.maxRetries) {
          throw error;
        }
        // Exponential backoff: base, 2*base, 4*base...
        const delay = this.retryBaseMs * Math.pow(2, attempt);
        console.warn(`Cachet ${method} ${path} failed, retrying (${attempt + 1}/${this.maxRetries})`, {
          error: error.message,
          delayMs: delay,
        });
        await sleep(delay);
      }
    }
  }

  private async send(method: string, path: string, options: RequestOptions): Promise<unknown> {
    let token: string;
    try {
      token = await this.tokenProvider();
    } catch (error) {
      throw new BackendTransientError(`Could not resolve Cachet API token: ${errorMessage(error)}`);
    }

    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      url.searchParams.set(key, String(value));
    }

    const headers: Record<string, string> = {
      Authorization: `Bearer ${token}`,
      Accept: "application/json",
    };
    if (options.body !== undefined) {
      headers["Content-Type"] = "application/json";
    }

    let resp: Response;
    try {
      resp = await fetch(url, {
        method,
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      // Network failures and timeouts alike
      throw new BackendTransientError(`Cachet ${method} ${path} failed: ${errorMessage(error)}`);
    }

    // Security: Don't log full response body which might contain sensitive data
    const errorInfo = `${resp.status} ${resp.statusText}`;
    if (resp.status === 429 || resp.status >= 500) {
      throw new BackendTransientError(`Cachet ${method} ${path}: ${errorInfo}`, resp.status);
    }
    if (!resp.ok) {
      throw new BackendPermanentError(`Cachet ${method} ${path}: ${errorInfo}`, resp.status);
    }

    const text = await resp.text();
    if (!text) return undefined;
    try {
      return JSON.parse(text);
    } catch {
      throw new BackendPermanentError(`Cachet ${method} ${path}: response is not JSON`, resp.status);
    }
  }
}

function dataOf(payload: unknown): unknown {
  if (!isRecord(payload) || !("data" in payload)) {
    throw new BackendPermanentError("Cachet response has no data field");
  }
  return payload.data;
}

function recordOf(value: unknown): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new BackendPermanentError("Unexpected entry in Cachet response");
  }
  return value;
}

function parseId(value: unknown): number {
  const id = typeof value === "number" ? value : typeof value === "string" ? Number(value) : NaN;
  if (!Number.isInteger(id)) {
    throw new BackendPermanentError(`Unexpected id in Cachet response: ${String(value)}`);
  }
  return id;
}

function stringOr(value: unknown, fallback: string): string {
  return typeof value === "string" ? value : fallback;
}

// Cachet returns enum fields either as a bare code or as { value, ... }
function codeOf(value: unknown, fallback: number): number {
  if (isRecord(value)) return codeOf(value.value, fallback);
  const code = typeof value === "number" ? value : typeof value === "string" ? Number(value) : NaN;
  return Number.isFinite(code) ? code : fallback;
}

function optionalId(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  const id = Number(value);
  return Number.isInteger(id) ? id : null;
}

export function parseComponent(raw: unknown): CachetComponent {
  const record = recordOf(raw);
  const attributes = isRecord(record.attributes) ? record.attributes : record;
  const statusCode = codeOf(attributes.status, Config.Instance.statusHealthy);

  return {
    id: parseId(record.id),
    name: stringOr(attributes.name, ""),
    status: fromCachetStatus(statusCode),
    statusCode,
    enabled: typeof attributes.enabled === "boolean" ? attributes.enabled : attributes.enabled !== 0,
    description: stringOr(attributes.description, ""),
    meta: isRecord(attributes.meta) ? attributes.meta : null,
    groupId: optionalId(attributes.component_group_id ?? attributes.group_id),
  };
}

export function parseIncident(raw: unknown): CachetIncident {
  const record = recordOf(raw);
  const attributes = isRecord(record.attributes) ? record.attributes : record;

  return {
    id: parseId(record.id),
    name: stringOr(attributes.name, ""),
    statusCode: codeOf(attributes.status, 0),
    componentId: optionalId(attributes.component_id),
  };
}
