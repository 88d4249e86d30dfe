import { LogCategory } from '../../logging/log-levels';
import type { CheckerLogger } from '../../logging/checker-logger.service';
import { DEFAULT_TIMEOUT_MS, SCIM_MEDIA_TYPE } from '../common/scim-constants';
import { ScimTransportError, describeError } from '../common/scim-errors';
import type {
  PatchRequest,
  ResourcePayload,
  ResourceType,
  ScimMessage,
  ScimQueryParams,
  SearchRequest,
} from '../models/scim-models';
import type { ScimClient } from './scim-client.interface';
import { parseScimResponse } from './scim-response.parser';

/** The subset of the fetch API the client relies on. */
export interface FetchRequestInit {
  method: string;
  headers: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export interface FetchResponse {
  status: number;
  text(): Promise<string>;
}

export type FetchFn = (input: string, init: FetchRequestInit) => Promise<FetchResponse>;

export interface HttpScimClientOptions {
  /** Service provider base URL, e.g. `https://idp.example.com/scim/v2`. */
  baseUrl: string;
  /** Bearer token sent in the Authorization header. */
  token?: string;
  /** Per-request timeout. */
  timeoutMs?: number;
  /** Replaces the global fetch (tests, proxies). */
  fetchFn?: FetchFn;
  logger?: CheckerLogger;
}

type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/** Join a base URL and a path without doubling or dropping the slash. */
export function buildUrl(baseUrl: string, path: string, params?: ScimQueryParams): string {
  const trimmedBase = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;
  const normalisedPath = path.startsWith('/') ? path : `/${path}`;
  const search = new URLSearchParams();
  if (params) {
    Object.entries(params).forEach(([k, v]) => {
      if (v === undefined || v === null || v === '') return;
      search.set(k, String(v));
    });
  }
  const qs = search.toString();
  return `${trimmedBase}${normalisedPath}${qs ? `?${qs}` : ''}`;
}

/** `/Users` + `abc` → `/Users/abc` (the id is URL-encoded). */
export function resourcePath(resourceType: ResourceType, id?: string): string {
  const endpoint = resourceType.endpoint.startsWith('/') ? resourceType.endpoint : `/${resourceType.endpoint}`;
  return id === undefined ? endpoint : `${endpoint}/${encodeURIComponent(id)}`;
}

/** fetch() rejects with "fetch failed" and hides the socket error in `cause`. */
function describeTransportFailure(err: unknown, timeoutMs: number): string {
  if (err instanceof Error && err.name === 'TimeoutError') {
    return `Request timed out after ${timeoutMs}ms`;
  }
  if (err instanceof Error && err.cause !== undefined) {
    return `${describeError(err)} (${describeError(err.cause)})`;
  }
  return describeError(err);
}

/**
 * HttpScimClient — {@link ScimClient} over fetch.
 *
 * Network failures, timeouts and unreadable bodies raise ScimTransportError;
 * every body is then classified by parseScimResponse().
 */
export class HttpScimClient implements ScimClient {
  readonly baseUrl: string;
  private readonly token?: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;
  private readonly logger?: CheckerLogger;

  constructor(options: HttpScimClientOptions) {
    this.baseUrl = options.baseUrl;
    this.token = options.token;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
    this.logger = options.logger;
  }

  query(path: string, params?: ScimQueryParams): Promise<ScimMessage> {
    return this.request('GET', buildUrl(this.baseUrl, path, params));
  }

  create(resourceType: ResourceType, payload: ResourcePayload): Promise<ScimMessage> {
    return this.request('POST', buildUrl(this.baseUrl, resourcePath(resourceType)), payload);
  }

  update(resourceType: ResourceType, id: string, payload: ResourcePayload): Promise<ScimMessage> {
    return this.request('PUT', buildUrl(this.baseUrl, resourcePath(resourceType, id)), payload);
  }

  patch(resourceType: ResourceType, id: string, request: PatchRequest): Promise<ScimMessage> {
    return this.request('PATCH', buildUrl(this.baseUrl, resourcePath(resourceType, id)), request, true);
  }

  delete(resourceType: ResourceType, id: string): Promise<ScimMessage> {
    return this.request('DELETE', buildUrl(this.baseUrl, resourcePath(resourceType, id)), undefined, true);
  }

  search(resourceType: ResourceType, request: SearchRequest): Promise<ScimMessage> {
    return this.request('POST', buildUrl(this.baseUrl, `${resourcePath(resourceType)}/.search`), request);
  }

  private headers(hasBody: boolean): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: `${SCIM_MEDIA_TYPE}, application/json`,
    };
    if (hasBody) {
      headers['Content-Type'] = SCIM_MEDIA_TYPE;
    }
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }
    return headers;
  }

  private async request(method: HttpMethod, url: string, body?: object, allowEmpty = false): Promise<ScimMessage> {
    const startedAt = Date.now();
    this.logger?.trace(LogCategory.HTTP, `${method} ${url}`, body ? { body } : undefined);

    let response: FetchResponse;
    let rawBody: string;
    try {
      response = await this.fetchFn(url, {
        method,
        headers: this.headers(body !== undefined),
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      rawBody = await response.text();
    } catch (err) {
      const reason = describeTransportFailure(err, this.timeoutMs);
      this.logger?.debug(LogCategory.HTTP, `${method} ${url} failed`, { reason });
      throw new ScimTransportError(`${method} ${url} failed: ${reason}`, url, { cause: err });
    }

    this.logger?.debug(LogCategory.HTTP, `${method} ${url} → ${response.status}`, {
      durationMs: Date.now() - startedAt,
    });
    this.logger?.trace(LogCategory.HTTP, 'Response body', { body: rawBody });

    return parseScimResponse(response.status, rawBody, { allowEmpty });
  }
}
