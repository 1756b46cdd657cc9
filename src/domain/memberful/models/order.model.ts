import {
  IsArray,
  IsBoolean,
  IsEnum,
  IsInt,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { MemberfulEntity } from '../decoding/memberful-entity';
import { IsTimestampOrDateString } from '../decoding/validators';
import { WireField } from '../decoding/wire-field.decorator';
import { OrderStatus } from './enums';
import { Member } from './member.model';
import { MemberSubscription } from './subscription.model';

/**
 * Download (digital product)
 */
export class Product extends MemberfulEntity {
  @WireField('id')
  @IsInt()
  readonly id!: number;

  @WireField('name')
  @IsString()
  readonly name!: string;

  /**
   * Minor currency unit (cents)
   */
  @WireField('price')
  @IsInt()
  readonly price!: number;

  @WireField('slug')
  @IsString()
  readonly slug!: string;

  @WireField('for_sale')
  @IsBoolean()
  readonly forSale: boolean = true;
}

export class Order extends MemberfulEntity {
  @WireField('uuid')
  @IsString()
  readonly uuid!: string;

  @WireField('number')
  @IsOptional()
  @IsString()
  readonly number: string | null = null;

  /**
   * Minor currency unit (cents)
   */
  @WireField('total')
  @IsInt()
  readonly total!: number;

  @WireField('status')
  @IsEnum(OrderStatus)
  readonly status!: OrderStatus;

  @WireField('receipt')
  @IsOptional()
  @IsString()
  readonly receipt: string | null = null;

  /**
   * Unix timestamp or ISO datetime string, depending on the event
   */
  @WireField('created_at')
  @IsOptional()
  @IsTimestampOrDateString()
  readonly createdAt: number | string | null = null;

  /**
   * Absent in some subscription lifecycle payloads
   */
  @WireField('member', { type: () => Member })
  @IsOptional()
  @ValidateNested()
  readonly member: Member | null = null;

  @WireField('products', { type: () => Product, list: true })
  @IsArray()
  @ValidateNested({ each: true })
  readonly products: readonly Product[] = [];

  @WireField('subscriptions', { type: () => MemberSubscription, list: true })
  @IsArray()
  @ValidateNested({ each: true })
  readonly subscriptions: readonly MemberSubscription[] = [];
}
