/**
 * Closed vocabularies shared by Memberful records.
 * Values outside these sets fail decoding.
 */

export enum SignupMethod {
  CHECKOUT = 'checkout',
  MANUAL = 'manual',
  API = 'api',
  IMPORT = 'import',
}

export enum OrderStatus {
  COMPLETED = 'completed',
  SUSPENDED = 'suspended',
  PENDING = 'pending',
  CANCELLED = 'cancelled',
}

export enum RenewalPeriod {
  MONTHLY = 'monthly',
  YEARLY = 'yearly',
  QUARTERLY = 'quarterly',
  WEEKLY = 'weekly',
}

export enum IntervalUnit {
  MONTH = 'month',
  YEAR = 'year',
  QUARTER = 'quarter',
  WEEK = 'week',
  DAY = 'day',
}
