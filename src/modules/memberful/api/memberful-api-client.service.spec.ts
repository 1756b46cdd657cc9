import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { AxiosError, AxiosHeaders, AxiosResponse } from 'axios';
import { of, throwError } from 'rxjs';
import { CircuitBreakerService } from '../../../core/circuit-breaker/circuit-breaker.service';
import { ProcessingLimitsService } from '../../../core/limits/processing-limits.service';
import { RateLimiterService } from '../../../core/limits/rate-limiter.service';
import { memberJson, subscriptionJson } from '../../../domain/memberful/__fixtures__/payloads';
import {
  GraphQLResponseError,
  Member,
  RetryExhaustedError,
  Subscription,
  TransportError,
  ValidationError,
  decodeEntity,
} from '../../../domain/memberful';
import { MEMBERFUL_API_BREAKER, MemberfulApiClientService } from './memberful-api-client.service';

const ok = (data: unknown): AxiosResponse<unknown> => ({
  data,
  status: 200,
  statusText: 'OK',
  headers: {},
  config: { headers: new AxiosHeaders() },
});

const httpError = (status: number, data: unknown = {}, headers: Record<string, string> = {}) =>
  new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', undefined, undefined, {
    data,
    status,
    statusText: 'Error',
    headers,
    config: { headers: new AxiosHeaders() },
  });

const networkError = () => new AxiosError('socket hang up', 'ECONNRESET');

const BASE_CONFIG = {
  MEMBERFUL_BASE_URL: 'https://memberful.test/',
  MEMBERFUL_API_KEY: 'test-api-key',
  MEMBERFUL_API_MAX_RETRIES: 2,
  MEMBERFUL_API_RETRY_BACKOFF_BASE_MS: 1,
  MEMBERFUL_API_REQUESTS_PER_SECOND: 1000,
  MEMBERFUL_API_PAGE_DELAY_MS: 0,
  MAX_PAGES: 3,
  API_CALL_TIMEOUT: 1000,
};

describe('MemberfulApiClientService', () => {
  let moduleRef: TestingModule;
  let client: MemberfulApiClientService;
  let request: jest.Mock;

  const createClient = async (overrides: Record<string, unknown> = {}) => {
    request = jest.fn();
    moduleRef = await Test.createTestingModule({
      providers: [
        MemberfulApiClientService,
        RateLimiterService,
        CircuitBreakerService,
        ProcessingLimitsService,
        { provide: HttpService, useValue: { request } },
        { provide: ConfigService, useValue: new ConfigService({ ...BASE_CONFIG, ...overrides }) },
      ],
    }).compile();
    client = moduleRef.get(MemberfulApiClientService);
  };

  beforeEach(async () => {
    await createClient();
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  describe('getMembers', () => {
    it('requests a page and decodes the members', async () => {
      request.mockReturnValueOnce(
        of(
          ok({
            members: [memberJson()],
            total_count: 1,
            total_pages: 1,
            current_page: 1,
            per_page: 100,
          }),
        ),
      );

      const page = await client.getMembers();

      expect(page.items).toHaveLength(1);
      expect(page.items[0]).toBeInstanceOf(Member);
      expect(page.items[0].email).toBe('ada@example.com');
      expect(page).toMatchObject({ totalCount: 1, totalPages: 1, currentPage: 1, perPage: 100 });
      expect(request).toHaveBeenCalledWith(
        expect.objectContaining({
          method: 'GET',
          url: 'https://memberful.test/v1/members',
          params: { page: 1, per_page: 100 },
          timeout: 1000,
          headers: expect.objectContaining({
            Authorization: 'Bearer test-api-key',
            'User-Agent': 'memberful-client/0.1.0',
          }),
        }),
      );
    });

    it('falls back to the requested page when totals are missing', async () => {
      request.mockReturnValueOnce(of(ok({ members: [memberJson()] })));

      const page = await client.getMembers(3, 2);

      expect(page).toMatchObject({ totalCount: 5, totalPages: 3, currentPage: 3, perPage: 2 });
    });

    it('does not retry a response that fails validation', async () => {
      request.mockReturnValue(of(ok({ members: [{ id: 'not-a-number' }] })));

      await expect(client.getMembers()).rejects.toThrow(ValidationError);
      expect(request).toHaveBeenCalledTimes(1);
    });
  });

  describe('getMember', () => {
    it.each([
      ['wrapped', { member: memberJson() }],
      ['bare', memberJson()],
    ])('decodes a %s member', async (_label, body) => {
      request.mockReturnValueOnce(of(ok(body)));

      const member = await client.getMember(42);

      expect(member.id).toBe(42);
      expect(request).toHaveBeenCalledWith(
        expect.objectContaining({ url: 'https://memberful.test/v1/members/42' }),
      );
    });
  });

  describe('getSubscriptions', () => {
    it('filters by member and decodes standalone subscriptions', async () => {
      request.mockReturnValueOnce(
        of(ok({ subscriptions: [subscriptionJson()], total_pages: 1, current_page: 1 })),
      );

      const page = await client.getSubscriptions({ memberId: 42 });

      expect(page.items[0]).toBeInstanceOf(Subscription);
      expect(page.items[0].plan.name).toBe('Monthly');
      expect(request).toHaveBeenCalledWith(
        expect.objectContaining({ params: { page: 1, per_page: 100, member_id: 42 } }),
      );
    });
  });

  describe('pagination', () => {
    it('collects pages until the last one', async () => {
      request
        .mockReturnValueOnce(
          of(ok({ members: [memberJson({ id: 1 })], total_pages: 2, current_page: 1 })),
        )
        .mockReturnValueOnce(
          of(ok({ members: [memberJson({ id: 2 })], total_pages: 2, current_page: 2 })),
        );

      const members = await client.getAllMembers();

      expect(members.map((member) => member.id)).toEqual([1, 2]);
      expect(request).toHaveBeenCalledTimes(2);
    });

    it('stops at an empty page', async () => {
      request
        .mockReturnValueOnce(of(ok({ subscriptions: [subscriptionJson()], total_pages: 5 })))
        .mockReturnValueOnce(of(ok({ subscriptions: [], total_pages: 5 })));

      const subscriptions = await client.getAllSubscriptions(42);

      expect(subscriptions).toHaveLength(1);
      expect(request).toHaveBeenCalledTimes(2);
    });

    it('stops at MAX_PAGES', async () => {
      request.mockImplementation(() =>
        of(ok({ members: [memberJson()], total_pages: 10, current_page: 1 })),
      );

      const members = await client.getAllMembers();

      expect(members).toHaveLength(3);
      expect(request).toHaveBeenCalledTimes(3);
    });
  });

  describe('retries', () => {
    it('retries a 5xx response', async () => {
      request
        .mockReturnValueOnce(throwError(() => httpError(503)))
        .mockReturnValueOnce(of(ok({ members: [] })));

      const page = await client.getMembers();

      expect(page.items).toEqual([]);
      expect(request).toHaveBeenCalledTimes(2);
    });

    it('retries a request that got no response', async () => {
      request
        .mockReturnValueOnce(throwError(() => networkError()))
        .mockReturnValueOnce(of(ok({ members: [] })));

      await expect(client.getMembers()).resolves.toMatchObject({ items: [] });
      expect(request).toHaveBeenCalledTimes(2);
    });

    it('retries a 429 response', async () => {
      request
        .mockReturnValueOnce(throwError(() => httpError(429, {}, { 'retry-after': '0' })))
        .mockReturnValueOnce(of(ok({ members: [] })));

      await expect(client.getMembers()).resolves.toMatchObject({ items: [] });
      expect(request).toHaveBeenCalledTimes(2);
    });

    it('gives up after the configured retries', async () => {
      request.mockImplementation(() => throwError(() => httpError(502)));

      const error = await client.getMembers().catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(RetryExhaustedError);
      expect(error instanceof RetryExhaustedError && error.attempts).toBe(3);
      expect(error instanceof RetryExhaustedError && error.cause).toBeInstanceOf(TransportError);
      expect(request).toHaveBeenCalledTimes(3);
    });

    it('does not retry other client errors', async () => {
      request.mockReturnValue(throwError(() => httpError(404, { error: 'missing' })));

      const error = await client.getMember(7).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toMatchObject({
        statusCode: 404,
        endpoint: '/v1/members/7',
        message: 'Resource not found in Memberful API.',
        details: { error: 'missing' },
      });
      expect(request).toHaveBeenCalledTimes(1);
    });

    it('opens the circuit breaker after repeated failures', async () => {
      const breakers = moduleRef.get(CircuitBreakerService);
      request.mockImplementation(() => throwError(() => httpError(500)));

      await expect(client.getMembers()).rejects.toThrow(RetryExhaustedError);
      expect(breakers.isOpen(MEMBERFUL_API_BREAKER)).toBe(true);

      request.mockClear();
      await expect(client.getMembers()).rejects.toThrow(TransportError);
      expect(request).not.toHaveBeenCalled();
    });
  });

  it('refuses to send requests without an API key', async () => {
    await moduleRef.close();
    await createClient({ MEMBERFUL_API_KEY: '' });

    await expect(client.getMembers()).rejects.toThrow('MEMBERFUL_API_KEY is not configured');
    expect(request).not.toHaveBeenCalled();
  });

  describe('query', () => {
    const document = 'query Members($first: Int) { members(first: $first) { edges { node { id } } } }';

    it('posts the document and returns data', async () => {
      request.mockReturnValueOnce(of(ok({ data: { members: { edges: [] } } })));

      const data = await client.query(document, { first: 10 });

      expect(data).toEqual({ members: { edges: [] } });
      expect(request).toHaveBeenCalledWith(
        expect.objectContaining({
          method: 'POST',
          url: 'https://memberful.test/api/graphql',
          data: { query: document, variables: { first: 10 } },
        }),
      );
    });

    it('applies a decoder to the data', async () => {
      request.mockReturnValueOnce(of(ok({ data: { member: memberJson() } })));

      const email = await client.query(
        'query { member(id: 42) { id email createdAt } }',
        {},
        (data) => decodeEntity(Member, data.member).email,
      );

      expect(email).toBe('ada@example.com');
    });

    it('turns an errors array into one error', async () => {
      request.mockReturnValueOnce(
        of(ok({ data: null, errors: [{ message: 'Field missing' }, { message: 'Not allowed' }] })),
      );

      const error = await client.query(document).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(GraphQLResponseError);
      expect(error).toMatchObject({
        message: 'GraphQL request failed: Field missing; Not allowed',
        messages: ['Field missing', 'Not allowed'],
      });
    });

    it('rejects mutations without sending them', async () => {
      await expect(
        client.query('# update\nmutation { memberUpdate(id: 1) { id } }'),
      ).rejects.toThrow(TransportError);
      expect(request).not.toHaveBeenCalled();
    });
  });
});
