import { HttpService } from '@nestjs/axios';
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AxiosRequestConfig, isAxiosError } from 'axios';
import CircuitBreaker from 'opossum';
import { firstValueFrom } from 'rxjs';
import { CircuitBreakerService } from '../../../core/circuit-breaker/circuit-breaker.service';
import { ProcessingLimitsService } from '../../../core/limits/processing-limits.service';
import { RateLimiterService } from '../../../core/limits/rate-limiter.service';
import { logger } from '../../../core/logger/logger.config';
import {
  backoffDelayMs,
  delay,
  delayWithJitter,
  parseRetryAfter,
} from '../../../core/utils/delay.util';
import {
  EntityConstructor,
  GraphQLResponseError,
  JsonObject,
  Member,
  MemberfulError,
  RetryExhaustedError,
  Subscription,
  TransportError,
  ValidationError,
  decodeEntity,
  isJsonObject,
} from '../../../domain/memberful';
import { ApiRequest, Page, SubscriptionFilters } from './memberful-api.types';

export const MEMBERFUL_API_BREAKER = 'memberful-api';
export const CLIENT_VERSION = '0.1.0';

const GRAPHQL_ENDPOINT = '/api/graphql';
const DEFAULT_PER_PAGE = 100;

@Injectable()
export class MemberfulApiClientService {
  private readonly logger = logger();
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private circuitBreaker: CircuitBreaker<[ApiRequest], unknown> | null = null;

  constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService,
    private readonly circuitBreakerService: CircuitBreakerService,
    private readonly limitsService: ProcessingLimitsService,
    private readonly rateLimiter: RateLimiterService,
  ) {
    this.baseUrl = this.configService
      .get<string>('MEMBERFUL_BASE_URL', 'https://api.memberful.com')
      .replace(/\/+$/, '');
    this.apiKey = this.configService.get<string>('MEMBERFUL_API_KEY', '');
  }

  async getMembers(page = 1, perPage = DEFAULT_PER_PAGE): Promise<Page<Member>> {
    const body = await this.fire({
      method: 'GET',
      endpoint: '/v1/members',
      params: { page, per_page: perPage },
    });
    return toPage(Member, body, 'members', page, perPage);
  }

  async getMember(id: number | string): Promise<Member> {
    const body = await this.fire({
      method: 'GET',
      endpoint: `/v1/members/${encodeURIComponent(String(id))}`,
    });
    return decodeEntity(Member, unwrap(body, 'member'));
  }

  async getSubscriptions(filters: SubscriptionFilters = {}): Promise<Page<Subscription>> {
    const page = filters.page ?? 1;
    const perPage = filters.perPage ?? DEFAULT_PER_PAGE;
    const params: Record<string, string | number> = { page, per_page: perPage };
    if (filters.memberId !== undefined) {
      params.member_id = filters.memberId;
    }

    const body = await this.fire({ method: 'GET', endpoint: '/v1/subscriptions', params });
    return toPage(Subscription, body, 'subscriptions', page, perPage);
  }

  getAllMembers(): Promise<Member[]> {
    return this.collectAll('members', (page) => this.getMembers(page));
  }

  getAllSubscriptions(memberId?: number | string): Promise<Subscription[]> {
    return this.collectAll('subscriptions', (page) =>
      this.getSubscriptions({ memberId, page }),
    );
  }

  /**
   * Run a read-only GraphQL query against `/api/graphql`.
   *
   * Without `decode` the raw `data` object is returned.
   */
  query(document: string, variables?: JsonObject): Promise<JsonObject>;
  query<T>(
    document: string,
    variables: JsonObject,
    decode: (data: JsonObject) => T,
  ): Promise<T>;
  async query<T>(
    document: string,
    variables: JsonObject = {},
    decode?: (data: JsonObject) => T,
  ): Promise<T | JsonObject> {
    if (isMutation(document)) {
      this.logger.error(
        { endpoint: GRAPHQL_ENDPOINT },
        'SECURITY: Only queries are allowed to the Memberful API',
      );
      throw new TransportError(
        'Only GraphQL queries are allowed; this client does not send mutations',
        null,
        GRAPHQL_ENDPOINT,
      );
    }

    const body = await this.fire({
      method: 'POST',
      endpoint: GRAPHQL_ENDPOINT,
      data: { query: document, variables },
    });

    if (!isJsonObject(body)) {
      throw new ValidationError('GraphQLResponse', [
        { path: '', messages: ['expected a JSON object'] },
      ]);
    }

    const { errors } = body;
    if (Array.isArray(errors) && errors.length > 0) {
      throw new GraphQLResponseError(errors.map(errorMessage));
    }

    const data = isJsonObject(body.data) ? body.data : {};
    return decode ? decode(data) : data;
  }

  private async collectAll<T>(
    resource: string,
    fetchPage: (page: number) => Promise<Page<T>>,
  ): Promise<T[]> {
    const { maxPages, pageDelayMs } = this.limitsService.getPagingLimits();
    const items: T[] = [];

    for (let page = 1; page <= maxPages; page++) {
      const result = await fetchPage(page);
      items.push(...result.items);

      if (result.items.length === 0 || result.currentPage >= result.totalPages) {
        return items;
      }

      if (page < maxPages) {
        await delay(pageDelayMs);
      }
    }

    this.logger.warn(
      { resource, maxPages, collected: items.length },
      'MAX_PAGES reached, stopping pagination',
    );
    return items;
  }

  private getCircuitBreaker(): CircuitBreaker<[ApiRequest], unknown> {
    if (!this.circuitBreaker) {
      this.circuitBreaker = this.circuitBreakerService.createCircuitBreaker(
        (request: ApiRequest) => this.requestWithRetry(request),
        {
          name: MEMBERFUL_API_BREAKER,
          errorFilter: isClientError,
        },
      );
    }
    return this.circuitBreaker;
  }

  private async fire(request: ApiRequest): Promise<unknown> {
    try {
      return await this.getCircuitBreaker().fire(request);
    } catch (error: unknown) {
      if (error instanceof MemberfulError) {
        throw error;
      }
      // breaker open or breaker timeout
      const message = error instanceof Error ? error.message : String(error);
      throw new TransportError(
        `Memberful API unavailable: ${message}`,
        null,
        request.endpoint,
        { cause: error },
      );
    }
  }

  /**
   * Retries transient failures with backoff outside the HTTP timeout
   */
  private async requestWithRetry(request: ApiRequest): Promise<unknown> {
    const { maxRetries, backoffBaseMs } = this.limitsService.getRetryPolicy();

    for (let attempt = 0; ; attempt++) {
      try {
        return await this.makeRequest(request);
      } catch (error: unknown) {
        if (!isTransient(error)) {
          throw error;
        }

        if (attempt >= maxRetries) {
          this.logger.error(
            {
              endpoint: request.endpoint,
              method: request.method,
              statusCode: error.statusCode,
              attempts: attempt + 1,
              retriesExhausted: true,
            },
            'Memberful API request failed - max retries exhausted',
          );
          throw new RetryExhaustedError(request.endpoint, attempt + 1, error);
        }

        const retryAfter = retryAfterMs(error);
        const backoffDelay = backoffDelayMs(attempt, backoffBaseMs);
        const waitTime =
          retryAfter === null ? backoffDelay : Math.max(retryAfter, backoffDelay);

        this.logger.warn(
          {
            endpoint: request.endpoint,
            method: request.method,
            statusCode: error.statusCode,
            attempt,
            retryAfter,
            backoffDelay,
            waitTime,
            nextAttempt: attempt + 1,
            maxRetries,
          },
          'Transient Memberful API failure, retrying with backoff',
        );

        await delayWithJitter(waitTime, 30);
      }
    }
  }

  private async makeRequest(request: ApiRequest): Promise<unknown> {
    const { method, endpoint } = request;

    if (!this.apiKey) {
      throw new TransportError('MEMBERFUL_API_KEY is not configured', null, endpoint);
    }

    await this.rateLimiter.acquire();

    const requestConfig: AxiosRequestConfig = {
      method,
      url: `${this.baseUrl}${endpoint}`,
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        'Content-Type': 'application/json',
        'User-Agent': `memberful-client/${CLIENT_VERSION}`,
      },
      timeout: this.limitsService.getApiCallTimeout(),
      ...(request.params && { params: request.params }),
      ...(request.data && { data: request.data }),
    };

    this.logger.debug(
      { method, url: requestConfig.url, hasParams: !!request.params },
      'Making HTTP request',
    );

    try {
      const response = await firstValueFrom(
        this.httpService.request<unknown>(requestConfig),
      );
      this.rateLimiter.onSuccess();
      return response.data;
    } catch (error: unknown) {
      throw this.toTransportError(error, request);
    }
  }

  private toTransportError(error: unknown, request: ApiRequest): TransportError {
    const { method, endpoint } = request;

    if (!isAxiosError(error)) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error({ endpoint, method, error: message }, 'Memberful API request failed');
      return new TransportError(`Memberful API request failed: ${message}`, null, endpoint, {
        cause: error,
      });
    }

    const statusCode = error.response?.status ?? null;
    const errorData: unknown = error.response?.data;

    if (statusCode === 429) {
      this.rateLimiter.onRateLimitDetected();
    } else {
      this.logger.error(
        { endpoint, method, statusCode, errorMessage: error.message, memberfulError: errorData },
        'Memberful API request failed',
      );
    }

    return new TransportError(statusMessage(statusCode), statusCode, endpoint, {
      cause: error,
      details: errorData,
    });
  }
}

function statusMessage(statusCode: number | null): string {
  if (statusCode === null) {
    return 'Memberful API unreachable. No response received.';
  }
  if (statusCode === 400) {
    return 'Invalid request to Memberful API. Check parameters and API key.';
  }
  if (statusCode === 401) {
    return 'Unauthorized. Invalid or missing Memberful API key.';
  }
  if (statusCode === 403) {
    return 'Forbidden. API key does not have required permissions.';
  }
  if (statusCode === 404) {
    return 'Resource not found in Memberful API.';
  }
  if (statusCode === 429) {
    return 'Rate limit exceeded. Too many requests to Memberful API.';
  }
  if (statusCode >= 500) {
    return 'Memberful API server error. Please try again later.';
  }
  return `Memberful API error (HTTP ${statusCode})`;
}

/**
 * No response at all, 429 or 5xx
 */
function isTransient(error: unknown): error is TransportError {
  if (!(error instanceof TransportError)) {
    return false;
  }
  const { statusCode, cause } = error;
  if (statusCode === null) {
    return isAxiosError(cause) && !cause.response;
  }
  return statusCode === 429 || statusCode >= 500;
}

/**
 * 4xx responses are the caller's fault and do not trip the breaker
 */
function isClientError(error: unknown): boolean {
  return (
    error instanceof TransportError &&
    error.statusCode !== null &&
    error.statusCode >= 400 &&
    error.statusCode < 500 &&
    error.statusCode !== 429
  );
}

function retryAfterMs(error: TransportError): number | null {
  const { cause } = error;
  if (!isAxiosError(cause)) {
    return null;
  }
  const header: unknown = cause.response?.headers?.['retry-after'];
  return typeof header === 'string' || typeof header === 'number'
    ? parseRetryAfter(header)
    : null;
}

function isMutation(document: string): boolean {
  const withoutComments = document.replace(/#[^\n]*/g, '');
  return /(^|\})\s*mutation\b/.test(withoutComments);
}

function errorMessage(error: unknown): string {
  if (isJsonObject(error) && typeof error.message === 'string') {
    return error.message;
  }
  return JSON.stringify(error) ?? String(error);
}

/**
 * Single-resource responses are either bare or wrapped under the resource key
 */
function unwrap(body: unknown, key: string): unknown {
  return isJsonObject(body) && isJsonObject(body[key]) ? body[key] : body;
}

function toPage<T extends object>(
  entityClass: EntityConstructor<T>,
  body: unknown,
  key: string,
  page: number,
  perPage: number,
): Page<T> {
  if (!isJsonObject(body)) {
    throw new ValidationError(`${entityClass.name}Page`, [
      { path: '', messages: ['expected a JSON object'] },
    ]);
  }

  const rawItems = body[key] ?? body.data;
  if (!Array.isArray(rawItems)) {
    throw new ValidationError(`${entityClass.name}Page`, [
      { path: key, messages: ['expected an array'] },
    ]);
  }

  const items = rawItems.map((item: unknown) => decodeEntity(entityClass, item));
  const currentPage = readCount(body, 'current_page') ?? page;
  const pageSize = readCount(body, 'per_page') ?? perPage;

  return {
    items,
    totalCount:
      readCount(body, 'total_count') ?? (currentPage - 1) * pageSize + items.length,
    // a full page without totals implies there may be another one
    totalPages:
      readCount(body, 'total_pages') ??
      (items.length >= pageSize ? currentPage + 1 : currentPage),
    currentPage,
    perPage: pageSize,
  };
}

function readCount(body: JsonObject, key: string): number | null {
  const value = body[key];
  return typeof value === 'number' && Number.isInteger(value) && value >= 0
    ? value
    : null;
}
