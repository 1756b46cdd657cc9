import {
  IsBoolean,
  IsEnum,
  IsInt,
  IsOptional,
  IsString,
} from 'class-validator';
import { MemberfulEntity } from '../decoding/memberful-entity';
import { WireField } from '../decoding/wire-field.decorator';
import { IntervalUnit, RenewalPeriod } from './enums';

/**
 * Subscription plan.
 *
 * Price and billing period are optional: order payloads sometimes carry
 * plan stubs with only id, name and slug. Some payloads send `price_cents`
 * instead of `price`; the two are kept apart.
 */
export class SubscriptionPlan extends MemberfulEntity {
  @WireField('id')
  @IsInt()
  readonly id!: number;

  @WireField('name')
  @IsString()
  readonly name!: string;

  @WireField('slug')
  @IsString()
  readonly slug!: string;

  /**
   * Minor currency unit (cents)
   */
  @WireField('price')
  @IsOptional()
  @IsInt()
  readonly price: number | null = null;

  @WireField('price_cents')
  @IsOptional()
  @IsInt()
  readonly priceCents: number | null = null;

  @WireField('renewal_period')
  @IsOptional()
  @IsEnum(RenewalPeriod)
  readonly renewalPeriod: RenewalPeriod | null = null;

  @WireField('interval_unit')
  @IsOptional()
  @IsEnum(IntervalUnit)
  readonly intervalUnit: IntervalUnit | null = null;

  @WireField('interval_count')
  @IsInt()
  readonly intervalCount: number = 1;

  @WireField('for_sale')
  @IsBoolean()
  readonly forSale: boolean = true;

  /**
   * Plan type, e.g. `standard_plan`
   */
  @WireField('type')
  @IsOptional()
  @IsString()
  readonly type: string | null = null;
}
