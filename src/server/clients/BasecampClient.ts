/**
 * BasecampClient - Client for the Basecamp v1 JSON API
 *
 * Lists projects and the todos of a project. Todo listings are paginated
 * (`?page=N`, an empty page ends the listing) and every listing entry is
 * expanded with one extra request to its own detail URL.
 *
 * No request is retried: any failure aborts the whole call.
 */

import axios, { AxiosInstance, CreateAxiosDefaults } from 'axios';
import { createHttpClient } from '../config/httpClient.js';
import { RemoteHttpError } from '../types/errors.js';
import {
  parseRecord,
  projectListSchema,
  taskItemSummaryPageSchema,
  type ProjectRef,
  type RawTaskItemDetail,
} from '../validation/basecampSchemas.js';
import { basecampRequestsTotal } from '../utils/metrics.js';
import { createChildLogger, type Logger } from '../utils/logger.js';

/**
 * Basecamp client configuration
 */
export interface BasecampClientConfig {
  url: string;
  username: string;
  password: string;
  /** Application name sent in the User-Agent header */
  userAgentApp?: string;
  timeoutMs?: number;
}

export interface BasecampClientOptions {
  /** Extra axios defaults, e.g. a custom `adapter` */
  http?: CreateAxiosDefaults;
  logger?: Logger;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

type BasecampOperation = 'list_projects' | 'list_todos_page' | 'get_todo';

const DEFAULT_USER_AGENT_APP = 'BasecampConnector';

/**
 * BasecampClient - authenticated accessor for projects and todos
 */
export class BasecampClient {
  private readonly http: AxiosInstance;
  private readonly logger: Logger;
  readonly baseUrl: string;

  constructor(config: BasecampClientConfig, options: BasecampClientOptions = {}) {
    this.baseUrl = `${config.url.replace(/\/$/, '')}/api/v1`;
    this.logger = options.logger ?? createChildLogger({ component: 'BasecampClient' });
    this.http = createHttpClient({
      ...options.http,
      ...(config.timeoutMs !== undefined && { timeout: config.timeoutMs }),
      baseURL: this.baseUrl,
      auth: { username: config.username, password: config.password },
      headers: {
        'User-Agent': `${config.userAgentApp ?? DEFAULT_USER_AGENT_APP} (${config.username})`,
        Accept: 'application/json',
      },
    });
  }

  /**
   * List all projects visible to the configured user
   *
   * @throws {RemoteHttpError} On any non-success response or transport failure
   * @throws {MalformedRecordError} If the payload is not a project list
   */
  async listProjects(options: RequestOptions = {}): Promise<ProjectRef[]> {
    const payload = await this.get('/projects.json', 'list_projects', options);
    return parseRecord(projectListSchema, payload, 'Project list');
  }

  /**
   * List every todo of a project with its full detail record (comments included).
   *
   * Pages are fetched from 1 upwards; each entry's detail is fetched before the
   * next page is requested. The first empty page ends the listing.
   *
   * @throws {RemoteHttpError} If any page or detail request fails; nothing is returned in that case
   */
  async listTaskItems(project: Pick<ProjectRef, 'id'>, options: RequestOptions = {}): Promise<RawTaskItemDetail[]> {
    const path = `/projects/${encodeURIComponent(String(project.id))}/todos.json`;
    const details: RawTaskItemDetail[] = [];
    let page = 1;

    while (true) {
      const payload = await this.get(path, 'list_todos_page', { ...options, params: { page } });
      const summaries = parseRecord(taskItemSummaryPageSchema, payload, 'Todo page', {
        projectId: String(project.id),
        page,
      });

      for (const summary of summaries) {
        details.push(await this.get(summary.url, 'get_todo', options));
      }

      if (summaries.length === 0) {
        break;
      }

      this.logger.debug({ projectId: project.id, page, count: summaries.length }, 'Fetched todo page');
      page += 1;
    }

    return details;
  }

  private async get(
    url: string,
    operation: BasecampOperation,
    options: RequestOptions & { params?: Record<string, unknown> }
  ): Promise<unknown> {
    try {
      const response = await this.http.get<unknown>(url, {
        params: options.params,
        signal: options.signal,
      });
      basecampRequestsTotal.inc({ operation, outcome: 'success' });
      return response.data;
    } catch (error) {
      basecampRequestsTotal.inc({ operation, outcome: 'error' });
      throw toRemoteHttpError(error, url);
    }
  }
}

function toRemoteHttpError(error: unknown, url: string): RemoteHttpError {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const message = status !== undefined
      ? `GET ${url} failed with status ${status}`
      : `GET ${url} failed: ${error.message}`;
    return new RemoteHttpError(message, { method: 'GET', url, status }, error);
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new RemoteHttpError(`GET ${url} failed: ${reason}`, { method: 'GET', url }, error);
}
