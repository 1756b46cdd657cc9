/**
 * Subscription records
 *
 * Memberful sends two shapes. Inside orders a subscription embeds its plan
 * under `subscription` and uses unix timestamps. Subscription lifecycle events
 * send a standalone record with the plan under `subscription_plan`, the owning
 * member, and ISO datetime strings. The field sets differ in name, type and
 * optionality, so each shape keeps its own class.
 */

import {
  IsBoolean,
  IsDefined,
  IsInt,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { MemberfulEntity } from '../decoding/memberful-entity';
import { WireField } from '../decoding/wire-field.decorator';
import { Member } from './member.model';
import { SubscriptionPlan } from './subscription-plan.model';

/**
 * Subscription as embedded in orders
 */
export class MemberSubscription extends MemberfulEntity {
  @WireField('id')
  @IsInt()
  readonly id!: number;

  @WireField('active')
  @IsBoolean()
  readonly active!: boolean;

  @WireField('created_at')
  @IsInt()
  readonly createdAt!: number;

  @WireField('expires')
  @IsBoolean()
  readonly expires!: boolean;

  @WireField('expires_at')
  @IsOptional()
  @IsInt()
  readonly expiresAt: number | null = null;

  @WireField('in_trial_period')
  @IsBoolean()
  readonly inTrialPeriod: boolean = false;

  @WireField('subscription', { type: () => SubscriptionPlan })
  @IsDefined()
  @ValidateNested()
  readonly plan!: SubscriptionPlan;

  @WireField('trial_start_at')
  @IsOptional()
  @IsInt()
  readonly trialStartAt: number | null = null;

  @WireField('trial_end_at')
  @IsOptional()
  @IsInt()
  readonly trialEndAt: number | null = null;
}

/**
 * Standalone subscription from lifecycle events and the REST API
 */
export class Subscription extends MemberfulEntity {
  @WireField('id')
  @IsInt()
  readonly id!: number;

  @WireField('active')
  @IsBoolean()
  readonly active!: boolean;

  @WireField('autorenew')
  @IsBoolean()
  readonly autorenew!: boolean;

  /**
   * ISO 8601 datetime
   */
  @WireField('created_at')
  @IsString()
  readonly createdAt!: string;

  @WireField('expires_at')
  @IsString()
  readonly expiresAt!: string;

  @WireField('member', { type: () => Member })
  @IsDefined()
  @ValidateNested()
  readonly member!: Member;

  @WireField('subscription_plan', { type: () => SubscriptionPlan })
  @IsDefined()
  @ValidateNested()
  readonly plan!: SubscriptionPlan;

  @WireField('trial_start_at')
  @IsOptional()
  @IsString()
  readonly trialStartAt: string | null = null;

  @WireField('trial_end_at')
  @IsOptional()
  @IsString()
  readonly trialEndAt: string | null = null;
}
