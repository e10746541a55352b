import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import { BackendError } from '../errors';
import { CreateOptions, IBackend } from '../interfaces';
import { ClientOptions, OktaConfig, ResourceRecord } from '../types';
import { isRecord } from '../utils/records';
import { Route, RouteTable } from './RouteTable';

export const USER_AGENT = 'envsync/1.0.0';

/**
 * Server-assigned fields removed from records before they are written back
 */
export const READ_ONLY_FIELDS: readonly string[] = [
  'id',
  'created',
  'lastUpdated',
  'lastMembershipUpdated',
  'activated',
  'statusChanged',
  'passwordChanged',
  'lastLogin',
  '_links',
  '_embedded'
];

export interface OktaClientOptions extends ClientOptions {
  /** Replaces the HTTP transport, used by tests */
  adapter?: AxiosRequestConfig['adapter'];
}

const DEFAULT_OPTIONS: ClientOptions = {
  timeout: 30000,
  maxRetries: 3,
  retryDelay: 1000
};

// Guards against a server that keeps returning the same next link
const MAX_PAGES = 10000;

/**
 * Management API client implementing the backend the orchestrators drive
 */
export class OktaClient implements IBackend {
  private apiClient!: AxiosInstance;
  private config: Pick<OktaConfig, 'orgUrl' | 'token'>;
  private options: OktaClientOptions;
  private routes: RouteTable;

  constructor(
    config: Pick<OktaConfig, 'orgUrl' | 'token'>,
    options: Partial<OktaClientOptions> = {},
    routes: RouteTable = RouteTable.loadDefault()
  ) {
    this.config = config;
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.routes = routes;
    this.setupApiClient();
  }

  /**
   * List every record of a resource type, following `rel="next"` pagination links
   */
  async list(resourceType: string, command: string, params: Record<string, string> = {}): Promise<ResourceRecord[]> {
    const route = this.requireRoute(this.routes.retrieval(resourceType, command), resourceType, command);
    const records: ResourceRecord[] = [];
    const visited = new Set<string>();

    let url: string | undefined = this.fillPath(route, params, resourceType, command);
    let query: Record<string, string> | undefined = route.query;

    while (url !== undefined) {
      if (visited.has(url) || visited.size >= MAX_PAGES) {
        throw new BackendError(`Pagination of ${resourceType} ${command} does not terminate`, {
          resourceType,
          command
        });
      }
      visited.add(url);

      const response = await this.send(resourceType, command, { method: route.method, url, params: query });
      records.push(...this.extractItems(response.data, route, resourceType, command));

      url = this.nextLink(response);
      query = undefined;
    }

    return records;
  }

  async get(resourceType: string, command: string): Promise<ResourceRecord> {
    const route = this.requireRoute(this.routes.retrieval(resourceType, command), resourceType, command);
    const response = await this.send(resourceType, command, {
      method: route.method,
      url: this.fillPath(route, {}, resourceType, command),
      params: route.query
    });

    if (!isRecord(response.data)) {
      throw new BackendError(`Unexpected response for ${resourceType} ${command}: expected an object`, {
        resourceType,
        command,
        status: response.status
      });
    }
    return response.data;
  }

  /**
   * Create a record from a persisted one; server-assigned fields are not sent
   */
  async create(resourceType: string, record: ResourceRecord, options: CreateOptions = {}): Promise<ResourceRecord> {
    const command = options.command ? `create:${options.command}` : 'create';
    const route = this.requireRoute(this.routes.creation(resourceType, options.command), resourceType, command);
    const identifier = typeof record.id === 'string' ? record.id : undefined;

    const response = await this.send(
      resourceType,
      command,
      {
        method: route.method,
        url: this.fillPath(route, options.params ?? {}, resourceType, command),
        params: route.query,
        data: OktaClient.writablePayload(record)
      },
      identifier
    );

    return isRecord(response.data) ? response.data : {};
  }

  async associate(
    resourceType: string,
    command: string,
    endpoints: Record<string, string>,
    payload?: ResourceRecord
  ): Promise<void> {
    const route = this.requireRoute(this.routes.association(resourceType, command), resourceType, command);
    await this.send(resourceType, command, {
      method: route.method,
      url: this.fillPath(route, endpoints, resourceType, command),
      params: route.query,
      data: payload === undefined ? undefined : OktaClient.writablePayload(payload)
    });
  }

  /**
   * Copy of a record without the fields the server assigns
   */
  static writablePayload(record: ResourceRecord): ResourceRecord {
    const payload: ResourceRecord = {};
    for (const [field, value] of Object.entries(record)) {
      if (!READ_ONLY_FIELDS.includes(field)) {
        payload[field] = value;
      }
    }
    return payload;
  }

  /**
   * Setup axios client with API token authentication
   */
  private setupApiClient(): void {
    this.apiClient = axios.create({
      baseURL: this.config.orgUrl.replace(/\/+$/, ''),
      timeout: this.options.timeout,
      adapter: this.options.adapter,
      headers: {
        Authorization: `SSWS ${this.config.token}`,
        Accept: 'application/json',
        'Content-Type': 'application/json',
        'User-Agent': USER_AGENT
      }
    });
  }

  private async send(
    resourceType: string,
    command: string,
    request: AxiosRequestConfig,
    identifier?: string
  ): Promise<AxiosResponse<unknown>> {
    try {
      return await this.retryApiCall(() => this.apiClient.request<unknown>(request));
    } catch (error) {
      throw this.createError(resourceType, command, error, identifier);
    }
  }

  /**
   * Retry API calls with exponential backoff
   */
  private async retryApiCall<T>(apiCall: () => Promise<AxiosResponse<T>>): Promise<AxiosResponse<T>> {
    const { maxRetries, retryDelay } = this.options;

    for (let attempt = 0; ; attempt++) {
      try {
        return await apiCall();
      } catch (error) {
        // Client errors other than rate limiting are not retried
        const status = axios.isAxiosError(error) ? error.response?.status : undefined;
        if (status !== undefined && status >= 400 && status < 500 && status !== 429) {
          throw error;
        }

        if (attempt >= maxRetries) {
          throw error;
        }

        await this.sleep(retryDelay * Math.pow(2, attempt));
      }
    }
  }

  private requireRoute(route: Route | undefined, resourceType: string, command: string): Route {
    if (!route) {
      throw new BackendError(`No API route for ${resourceType} ${command}`, { resourceType, command });
    }
    return route;
  }

  /**
   * Substitute `{name}` placeholders with encoded parameter values
   */
  private fillPath(route: Route, params: Record<string, string>, resourceType: string, command: string): string {
    return route.path.replace(/\{(\w+)\}/g, (_match, name: string) => {
      const value = params[name];
      if (value === undefined) {
        throw new BackendError(`Missing parameter ${name} for ${resourceType} ${command}`, { resourceType, command });
      }
      return encodeURIComponent(value);
    });
  }

  private extractItems(data: unknown, route: Route, resourceType: string, command: string): ResourceRecord[] {
    const items = route.itemsField !== undefined && isRecord(data) ? data[route.itemsField] : data;
    if (!Array.isArray(items)) {
      throw new BackendError(`Unexpected response for ${resourceType} ${command}: expected a list`, {
        resourceType,
        command
      });
    }
    return items.filter(isRecord);
  }

  /**
   * Target of the `rel="next"` entry of the Link header, if any
   */
  private nextLink(response: AxiosResponse<unknown>): string | undefined {
    const header = response.headers['link'];
    const values = typeof header === 'string' ? [header] : Array.isArray(header) ? header : [];

    for (const value of values) {
      for (const part of String(value).split(',')) {
        const match = /<([^>]+)>\s*;\s*rel="?next"?/.exec(part.trim());
        if (match) {
          return match[1];
        }
      }
    }
    return undefined;
  }

  /**
   * Create a standardized backend error
   */
  private createError(resourceType: string, command: string, error: unknown, identifier?: string): BackendError {
    if (error instanceof BackendError) {
      return error;
    }

    let message = `${resourceType} ${command} failed`;
    let status: number | undefined;

    if (axios.isAxiosError(error)) {
      status = error.response?.status;
      const statusText = error.response?.statusText;
      const body: unknown = error.response?.data;

      if (status !== undefined) {
        message += statusText ? ` (HTTP ${status}: ${statusText})` : ` (HTTP ${status})`;
      } else {
        message += `: ${error.message}`;
      }

      if (isRecord(body) && typeof body.errorSummary === 'string') {
        message += ` - ${body.errorSummary}`;
      }
    } else if (error instanceof Error) {
      message += `: ${error.message}`;
    }

    return new BackendError(message, { resourceType, command, status, identifier }, error);
  }

  private sleep(ms: number): Promise<void> {
    if (ms <= 0) {
      return Promise.resolve();
    }
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}
