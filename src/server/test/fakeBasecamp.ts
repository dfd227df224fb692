/**
 * In-process stand-in for the Basecamp v1 API, plugged into axios through its
 * `adapter` option. Routes are keyed by absolute URL (plus `?page=N` for todo
 * listings); unknown routes answer 404.
 */

import {
  AxiosError,
  type AxiosAdapter,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from 'axios';

export const FAKE_BASECAMP_URL = 'https://basecamp.test/999';
export const FAKE_API_BASE = `${FAKE_BASECAMP_URL}/api/v1`;

export interface FakeRoute {
  status?: number;
  body?: unknown;
  /** Fail without a response, like a refused connection */
  networkError?: boolean;
  /** Never answer; only an abort signal ends the request */
  hang?: boolean;
}

export interface RecordedRequest {
  key: string;
  userAgent: string | undefined;
  auth: { username: string; password: string } | undefined;
}

export interface FakeTodo {
  id: number | string;
  [field: string]: unknown;
}

export function todoDetailUrl(projectId: number | string, todoId: number | string): string {
  return `${FAKE_API_BASE}/projects/${projectId}/todos/${todoId}.json`;
}

export function todoPageKey(projectId: number | string, page: number): string {
  return `${FAKE_API_BASE}/projects/${projectId}/todos.json?page=${page}`;
}

export class FakeBasecamp {
  readonly requests: RecordedRequest[] = [];
  private readonly routes = new Map<string, FakeRoute>();
  private inFlight = 0;
  maxInFlight = 0;
  /** Delay before every answer, so concurrent requests overlap */
  latencyMs = 0;

  route(key: string, route: FakeRoute): this {
    this.routes.set(key, route);
    return this;
  }

  projects(list: unknown, status = 200): this {
    return this.route(`${FAKE_API_BASE}/projects.json`, { status, body: list });
  }

  /**
   * Register the given listing pages (1-based, in order) and a detail route
   * for every todo on them. Add a trailing `[]` to end the listing.
   */
  todoPages(projectId: number | string, pages: FakeTodo[][]): this {
    pages.forEach((todos, index) => {
      this.route(todoPageKey(projectId, index + 1), {
        body: todos.map((todo) => ({ id: todo.id, url: todoDetailUrl(projectId, todo.id) })),
      });
      for (const todo of todos) {
        this.route(todoDetailUrl(projectId, todo.id), { body: todo });
      }
    });
    return this;
  }

  requestedKeys(): string[] {
    return this.requests.map((request) => request.key);
  }

  readonly adapter: AxiosAdapter = async (config) => {
    const key = keyFor(config);
    const userAgent = config.headers.get('User-Agent');
    this.requests.push({
      key,
      userAgent: typeof userAgent === 'string' ? userAgent : undefined,
      auth: config.auth,
    });

    const route = this.routes.get(key) ?? { status: 404, body: { error: 'Not Found' } };

    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (route.hang) {
        return await new Promise<AxiosResponse>((_, reject) => {
          config.signal?.addEventListener?.('abort', () => {
            reject(new AxiosError('canceled', AxiosError.ERR_CANCELED, config));
          });
        });
      }
      if (this.latencyMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.latencyMs));
      }
      return respond(route, config);
    } finally {
      this.inFlight -= 1;
    }
  };
}

function keyFor(config: InternalAxiosRequestConfig): string {
  const url = config.url ?? '';
  const absolute = /^https?:\/\//.test(url) ? url : `${config.baseURL ?? ''}${url}`;
  const page: unknown = config.params?.page;
  return page === undefined ? absolute : `${absolute}?page=${String(page)}`;
}

function respond(route: FakeRoute, config: InternalAxiosRequestConfig): AxiosResponse {
  if (route.networkError) {
    throw new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED', config);
  }
  const status = route.status ?? 200;
  const response: AxiosResponse = {
    data: route.body,
    status,
    statusText: String(status),
    headers: {},
    config,
  };
  if (status >= 200 && status < 300) {
    return response;
  }
  throw new AxiosError(
    `Request failed with status code ${status}`,
    status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
    config,
    null,
    response
  );
}

/**
 * A well-formed todo detail record
 */
export function makeTodo(id: number, overrides: Record<string, unknown> = {}): FakeTodo {
  return {
    id,
    creator: { name: 'Bo', avatar_url: 'https://avatars.test/bo.png' },
    content: `<p>Todo ${id}</p>`,
    app_url: `https://basecamp.test/999/projects/1/todos/${id}`,
    updated_at: '2023-01-02T03:04:05.000000+00:00',
    comments: [],
    ...overrides,
  };
}
