/**
 * Change deltas attached to `*_updated` events.
 *
 * Each changed field is an `[old, new]` pair. A missing key means the field
 * did not change.
 */

import { IsOptional } from 'class-validator';
import { MemberfulEntity } from '../decoding/memberful-entity';
import {
  ChangePair,
  IsChangePair,
  isAnyValue,
  isBooleanValue,
  isIntegerValue,
  isStringValue,
} from '../decoding/validators';
import { WireField } from '../decoding/wire-field.decorator';

export class SubscriptionChanges extends MemberfulEntity {
  @WireField('plan_id')
  @IsOptional()
  @IsChangePair(isIntegerValue, 'integer')
  readonly planId: ChangePair<number> | null = null;

  /**
   * ISO datetime strings
   */
  @WireField('expires_at')
  @IsOptional()
  @IsChangePair(isStringValue, 'string')
  readonly expiresAt: ChangePair<string> | null = null;

  @WireField('autorenew')
  @IsOptional()
  @IsChangePair(isBooleanValue, 'boolean')
  readonly autorenew: ChangePair<boolean> | null = null;

  @WireField('active')
  @IsOptional()
  @IsChangePair(isBooleanValue, 'boolean')
  readonly active: ChangePair<boolean> | null = null;

  @WireField('price')
  @IsOptional()
  @IsChangePair(isIntegerValue, 'integer')
  readonly price: ChangePair<number> | null = null;
}

export class MemberChanges extends MemberfulEntity {
  @WireField('email')
  @IsOptional()
  @IsChangePair(isStringValue, 'string')
  readonly email: ChangePair<string> | null = null;

  @WireField('first_name')
  @IsOptional()
  @IsChangePair(isStringValue, 'string')
  readonly firstName: ChangePair<string> | null = null;

  @WireField('last_name')
  @IsOptional()
  @IsChangePair(isStringValue, 'string')
  readonly lastName: ChangePair<string> | null = null;

  @WireField('full_name')
  @IsOptional()
  @IsChangePair(isStringValue, 'string')
  readonly fullName: ChangePair<string> | null = null;

  @WireField('username')
  @IsOptional()
  @IsChangePair(isStringValue, 'string')
  readonly username: ChangePair<string> | null = null;

  @WireField('phone_number')
  @IsOptional()
  @IsChangePair(isStringValue, 'string')
  readonly phoneNumber: ChangePair<string> | null = null;

  @WireField('discord_user_id')
  @IsOptional()
  @IsChangePair(isStringValue, 'string')
  readonly discordUserId: ChangePair<string> | null = null;

  @WireField('stripe_customer_id')
  @IsOptional()
  @IsChangePair(isStringValue, 'string')
  readonly stripeCustomerId: ChangePair<string> | null = null;

  @WireField('unrestricted_access')
  @IsOptional()
  @IsChangePair(isBooleanValue, 'boolean')
  readonly unrestrictedAccess: ChangePair<boolean> | null = null;

  @WireField('custom_field', { raw: true })
  @IsOptional()
  @IsChangePair(isAnyValue, 'JSON')
  readonly customField: ChangePair<unknown> | null = null;
}
