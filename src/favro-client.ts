import axios, { AxiosAdapter, AxiosError, AxiosInstance, AxiosRequestConfig } from 'axios';
import axiosRetry from 'axios-retry';
import { default as PQueue } from 'p-queue';
import { z } from 'zod';
import { CLI_VERSION, config, registerSecret, safeLog } from './config.js';
import { logger } from './logging/index.js';
import { setupLoggingMiddleware } from './middleware/logging-middleware.js';
import {
  BoardSchema,
  CardSchema,
  ColumnSchema,
  OrganizationSchema,
  PageSchema,
  TagSchema,
  UserSchema,
  type Board,
  type Card,
  type Column,
  type Organization,
  type Tag,
  type User,
} from './schemas.js';
import type { BoardListOptions, CardFilter, EntityFetcher } from './resolvers/types.js';

// ============================================
// ERROR TYPES
// ============================================

export enum FavroErrorType {
  AUTH_ERROR = 'AUTH_ERROR',
  RATE_LIMITED = 'RATE_LIMITED',
  NOT_FOUND = 'NOT_FOUND',
  TIMEOUT = 'TIMEOUT',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  API_ERROR = 'API_ERROR',
  NETWORK_ERROR = 'NETWORK_ERROR',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

export class FavroError extends Error {
  constructor(
    public type: FavroErrorType,
    message: string,
    public status?: number,
    public details?: unknown,
    public hint?: string
  ) {
    super(message);
    this.name = 'FavroError';
  }

  toJSON() {
    return {
      type: this.type,
      message: this.message,
      status: this.status,
      details: this.details,
      hint: this.hint,
    };
  }
}

// ============================================
// PARAMS
// ============================================

export interface FavroCredentials {
  email: string;
  token: string;
}

export interface FavroClientOptions {
  organizationId?: string;
  apiUrl?: string;
  timeoutMs?: number;
  maxConcurrentRequests?: number;
  retries?: number;
  // Replaces the HTTP transport; used by tests
  adapter?: AxiosAdapter;
}

export interface CreateCardParams {
  name: string;
  widgetCommonId?: string;
  columnId?: string;
  detailedDescription?: string;
}

export interface UpdateCardParams {
  name?: string;
  detailedDescription?: string;
  widgetCommonId?: string;
  columnId?: string;
  addAssignmentIds?: string[];
  removeAssignmentIds?: string[];
  addTagIds?: string[];
  removeTagIds?: string[];
}

export interface CreateColumnParams {
  widgetCommonId: string;
  name: string;
  position?: number;
}

export interface UpdateColumnParams {
  name?: string;
  position?: number;
}

/** Everything commands need from the service. */
export interface FavroApi extends EntityFetcher {
  readonly organizationId: string | undefined;
  createCard(params: CreateCardParams): Promise<Card>;
  updateCard(cardId: string, params: UpdateCardParams): Promise<Card>;
  deleteCard(cardId: string, everywhere?: boolean): Promise<void>;
  createColumn(params: CreateColumnParams): Promise<Column>;
  updateColumn(columnId: string, params: UpdateColumnParams): Promise<Column>;
  deleteColumn(columnId: string): Promise<void>;
}

const BACKEND_HEADER = 'x-favro-backend-identifier';

// Writes are sent once: a retried POST after a 502 or timeout can create a duplicate
const SAFE_METHODS = new Set(['get', 'head', 'options']);

// ============================================
// FAVRO CLIENT WITH RETRY/BACKOFF/CONCURRENCY
// ============================================

export class FavroClient implements FavroApi {
  readonly organizationId: string | undefined;
  private client: AxiosInstance;
  private queue: PQueue;
  private timeoutMs: number;
  // Pagination state lives on one backend; later requests must say which
  private backendIdentifier: string | undefined;

  constructor(credentials: FavroCredentials, options: FavroClientOptions = {}) {
    this.organizationId = options.organizationId;
    this.timeoutMs = options.timeoutMs ?? config.FAVRO_REQUEST_TIMEOUT_MS;
    const concurrency = options.maxConcurrentRequests ?? config.FAVRO_MAX_CONCURRENT_REQUESTS;

    registerSecret(credentials.token);

    this.client = axios.create({
      baseURL: options.apiUrl ?? config.FAVRO_API_URL,
      auth: { username: credentials.email, password: credentials.token },
      headers: {
        'Content-Type': 'application/json',
        'User-Agent': `favro-cli/${CLI_VERSION}`,
        ...(options.organizationId ? { organizationId: options.organizationId } : {}),
      },
      timeout: this.timeoutMs,
      adapter: options.adapter,
    });

    // Exponential backoff, honouring Retry-After
    axiosRetry(this.client, {
      retries: options.retries ?? 3,
      retryDelay: (retryCount, error) => {
        const retryAfter = error.response?.headers['retry-after'];
        if (retryAfter) {
          const seconds = parseInt(String(retryAfter), 10);
          if (!isNaN(seconds)) {
            safeLog.warn(`Rate limited. Waiting ${seconds}s as per Retry-After header.`);
            return seconds * 1000;
          }
        }

        const baseDelay = 1000;
        const exponentialDelay = baseDelay * Math.pow(2, retryCount - 1);
        const jitter = Math.random() * 500;
        return exponentialDelay + jitter;
      },
      retryCondition: (error: AxiosError) => {
        const status = error.response?.status;

        // A rejected 429 was never processed; anything else may have been
        if (status === 429) {
          logger.warning('Retrying request due to status 429', { url: error.config?.url }, 'favro-client');
          return true;
        }

        if (!SAFE_METHODS.has(error.config?.method?.toLowerCase() ?? '')) {
          return false;
        }

        if (status === undefined) {
          return true; // Network error
        }

        if (status === 408 || (status >= 500 && status < 600)) {
          logger.warning(`Retrying request due to status ${status}`, { url: error.config?.url }, 'favro-client');
          return true;
        }

        return false;
      },
      onRetry: (retryCount, error, requestConfig) => {
        logger.warning(
          `Retry attempt ${retryCount} for ${requestConfig.method?.toUpperCase()} ${requestConfig.url}`,
          { message: error.message },
          'favro-client'
        );
      },
    });

    setupLoggingMiddleware(this.client);

    this.client.interceptors.request.use((requestConfig) => {
      if (this.backendIdentifier) {
        requestConfig.headers.set('X-Favro-Backend-Identifier', this.backendIdentifier);
      }
      return requestConfig;
    });

    this.client.interceptors.response.use(
      (response) => {
        const backend = response.headers[BACKEND_HEADER];
        if (typeof backend === 'string' && backend) {
          this.backendIdentifier = backend;
        }
        return response;
      },
      (error: unknown) => {
        // Retried requests come back through this chain already mapped
        if (error instanceof FavroError) throw error;
        if (!axios.isAxiosError(error)) {
          throw new FavroError(
            FavroErrorType.UNKNOWN_ERROR,
            error instanceof Error ? error.message : String(error),
            undefined,
            undefined,
            'Run again with --verbose to see the request log'
          );
        }
        throw this.handleAxiosError(error);
      }
    );

    this.queue = new PQueue({ concurrency });

    logger.debug('FavroClient initialized', {
      organization_id: this.organizationId ?? null,
      max_concurrent: concurrency,
      timeout: this.timeoutMs,
    }, 'favro-client');
  }

  private handleAxiosError(error: AxiosError): FavroError {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new FavroError(
        FavroErrorType.TIMEOUT,
        `Request timeout after ${this.timeoutMs}ms`,
        undefined,
        { code: error.code },
        'Try again, or raise FAVRO_REQUEST_TIMEOUT_MS'
      );
    }

    if (!error.response) {
      return new FavroError(
        FavroErrorType.NETWORK_ERROR,
        error.message || 'Network error occurred',
        undefined,
        { code: error.code },
        'Check your internet connection and FAVRO_API_URL'
      );
    }

    const status = error.response.status;
    const data = error.response.data;

    const errorMap: Record<number, [FavroErrorType, string, string]> = {
      400: [FavroErrorType.VALIDATION_ERROR, 'Bad request', 'Check the command arguments for correctness'],
      401: [FavroErrorType.AUTH_ERROR, 'Authentication failed', "Run 'favro login' again; the email or API token was rejected"],
      403: [FavroErrorType.AUTH_ERROR, 'Insufficient permissions', 'Your account cannot access this organization or resource'],
      404: [FavroErrorType.NOT_FOUND, 'Resource not found', 'Check the IDs passed to the command'],
      422: [FavroErrorType.VALIDATION_ERROR, 'Validation error', 'Check the command arguments for correctness'],
    };

    if (errorMap[status]) {
      const [type, message, hint] = errorMap[status];
      return new FavroError(type, apiMessage(data) ?? message, status, data, hint);
    }

    if (status === 429) {
      const retryAfter = error.response.headers['retry-after'] || 'unknown';
      return new FavroError(
        FavroErrorType.RATE_LIMITED,
        'Rate limit exceeded',
        status,
        { ...(typeof data === 'object' && data !== null ? data : {}), retry_after: retryAfter },
        'The organization hit its hourly request limit. Wait and try again.'
      );
    }

    if (status >= 500 && status < 600) {
      return new FavroError(
        FavroErrorType.API_ERROR,
        'Favro server error',
        status,
        data,
        'The Favro API is experiencing issues. Try again later.'
      );
    }

    return new FavroError(
      FavroErrorType.API_ERROR,
      error.message || 'API request failed',
      status,
      data,
      undefined
    );
  }

  private queued<T>(fn: () => Promise<T>): Promise<T> {
    return this.queue.add(fn, { throwOnTimeout: true });
  }

  private parse<S extends z.ZodTypeAny>(schema: S, data: unknown, path: string): z.output<S> {
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new FavroError(
        FavroErrorType.VALIDATION_ERROR,
        `Unexpected response from ${path}`,
        undefined,
        result.error.issues,
        'The service returned data this client does not understand'
      );
    }
    return result.data;
  }

  private request(requestConfig: AxiosRequestConfig): Promise<unknown> {
    return this.queued(async () => {
      const response = await this.client.request<unknown>(requestConfig);
      return response.data;
    });
  }

  private async getOne<S extends z.ZodTypeAny>(path: string, schema: S): Promise<z.output<S> | null> {
    try {
      return this.parse(schema, await this.request({ method: 'GET', url: path }), path);
    } catch (error) {
      if (error instanceof FavroError && error.type === FavroErrorType.NOT_FOUND) {
        return null;
      }
      throw error;
    }
  }

  // Follows `pages`, handing the first response's requestId back on each page
  private async paginate<S extends z.ZodTypeAny>(
    path: string,
    params: Record<string, string | boolean | undefined>,
    schema: S
  ): Promise<z.output<S>[]> {
    const entities: z.output<S>[] = [];
    let requestId: string | undefined;
    let page = 0;
    let pages = 1;

    do {
      const pageParams = requestId ? { ...params, requestId, page } : params;
      const envelope = this.parse(PageSchema, await this.request({ method: 'GET', url: path, params: pageParams }), path);

      for (const entity of envelope.entities) {
        entities.push(this.parse(schema, entity, path));
      }

      requestId = envelope.requestId;
      pages = envelope.pages;
      page++;
    } while (requestId && page < pages);

    logger.debug(`Fetched ${path}`, { count: entities.length, pages }, 'favro-client');
    return entities;
  }

  // Organizations
  async fetchOrganizations(): Promise<Organization[]> {
    return this.paginate('/organizations', {}, OrganizationSchema);
  }

  async fetchOrganization(organizationId: string): Promise<Organization | null> {
    return this.getOne(`/organizations/${encodeURIComponent(organizationId)}`, OrganizationSchema);
  }

  // Boards and backlogs
  async fetchBoards(options: BoardListOptions = {}): Promise<Board[]> {
    return this.paginate('/widgets', {
      collectionId: options.collectionId,
      archived: options.includeArchived ? true : undefined,
    }, BoardSchema);
  }

  async fetchBoard(widgetCommonId: string): Promise<Board | null> {
    return this.getOne(`/widgets/${encodeURIComponent(widgetCommonId)}`, BoardSchema);
  }

  // Columns
  async fetchColumns(widgetCommonId: string): Promise<Column[]> {
    return this.paginate('/columns', { widgetCommonId }, ColumnSchema);
  }

  async fetchColumn(columnId: string): Promise<Column | null> {
    return this.getOne(`/columns/${encodeURIComponent(columnId)}`, ColumnSchema);
  }

  async createColumn(params: CreateColumnParams): Promise<Column> {
    const data = await this.request({ method: 'POST', url: '/columns', data: params });
    return this.parse(ColumnSchema, data, '/columns');
  }

  async updateColumn(columnId: string, params: UpdateColumnParams): Promise<Column> {
    const path = `/columns/${encodeURIComponent(columnId)}`;
    return this.parse(ColumnSchema, await this.request({ method: 'PUT', url: path, data: params }), path);
  }

  async deleteColumn(columnId: string): Promise<void> {
    await this.request({ method: 'DELETE', url: `/columns/${encodeURIComponent(columnId)}` });
  }

  // Cards
  async fetchCards(filter: CardFilter): Promise<Card[]> {
    return this.paginate('/cards', {
      widgetCommonId: filter.boardId,
      columnId: filter.columnId,
      collectionId: filter.collectionId,
    }, CardSchema);
  }

  async fetchCard(cardId: string): Promise<Card | null> {
    return this.getOne(`/cards/${encodeURIComponent(cardId)}`, CardSchema);
  }

  async createCard(params: CreateCardParams): Promise<Card> {
    return this.parse(CardSchema, await this.request({ method: 'POST', url: '/cards', data: params }), '/cards');
  }

  async updateCard(cardId: string, params: UpdateCardParams): Promise<Card> {
    const path = `/cards/${encodeURIComponent(cardId)}`;
    return this.parse(CardSchema, await this.request({ method: 'PUT', url: path, data: params }), path);
  }

  async deleteCard(cardId: string, everywhere = false): Promise<void> {
    await this.request({
      method: 'DELETE',
      url: `/cards/${encodeURIComponent(cardId)}`,
      params: everywhere ? { everywhere: true } : undefined,
    });
  }

  // Tags
  async fetchTags(): Promise<Tag[]> {
    return this.paginate('/tags', {}, TagSchema);
  }

  async fetchTag(tagId: string): Promise<Tag | null> {
    return this.getOne(`/tags/${encodeURIComponent(tagId)}`, TagSchema);
  }

  // Users
  async fetchUsers(): Promise<User[]> {
    return this.paginate('/users', {}, UserSchema);
  }

  async fetchUser(userId: string): Promise<User | null> {
    return this.getOne(`/users/${encodeURIComponent(userId)}`, UserSchema);
  }

  getQueueStatus() {
    return {
      pending: this.queue.pending,
      size: this.queue.size,
      concurrency: this.queue.concurrency,
    };
  }
}

// Favro error bodies carry a `message` field
function apiMessage(data: unknown): string | undefined {
  if (typeof data === 'object' && data !== null && 'message' in data && typeof data.message === 'string') {
    return data.message;
  }
  return undefined;
}
