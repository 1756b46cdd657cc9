import { JsonObject } from '../../../domain/memberful';

/**
 * One page of a paginated REST listing
 */
export interface Page<T> {
  items: T[];
  totalCount: number;
  totalPages: number;
  currentPage: number;
  perPage: number;
}

export interface SubscriptionFilters {
  memberId?: number | string;
  page?: number;
  perPage?: number;
}

export type HttpMethod = 'GET' | 'POST';

export interface ApiRequest {
  method: HttpMethod;
  endpoint: string;
  params?: Record<string, string | number>;
  data?: JsonObject;
}
