import {
  IsBoolean,
  IsEnum,
  IsInt,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { MemberfulEntity } from '../decoding/memberful-entity';
import { WireField } from '../decoding/wire-field.decorator';
import { SignupMethod } from './enums';
import { Address, CreditCard, TrackingParams } from './member-details.model';

/**
 * Full member record as sent in member and order payloads
 */
export class Member extends MemberfulEntity {
  @WireField('id')
  @IsInt()
  readonly id!: number;

  @WireField('email')
  @IsString()
  readonly email!: string;

  @WireField('first_name')
  @IsOptional()
  @IsString()
  readonly firstName: string | null = null;

  @WireField('last_name')
  @IsOptional()
  @IsString()
  readonly lastName: string | null = null;

  @WireField('full_name')
  @IsOptional()
  @IsString()
  readonly fullName: string | null = null;

  @WireField('username')
  @IsOptional()
  @IsString()
  readonly username: string | null = null;

  @WireField('phone_number')
  @IsOptional()
  @IsString()
  readonly phoneNumber: string | null = null;

  /**
   * Unix timestamp (seconds)
   */
  @WireField('created_at')
  @IsInt()
  readonly createdAt!: number;

  @WireField('signup_method')
  @IsOptional()
  @IsEnum(SignupMethod)
  readonly signupMethod: SignupMethod | null = null;

  @WireField('stripe_customer_id')
  @IsOptional()
  @IsString()
  readonly stripeCustomerId: string | null = null;

  @WireField('discord_user_id')
  @IsOptional()
  @IsString()
  readonly discordUserId: string | null = null;

  @WireField('unrestricted_access')
  @IsBoolean()
  readonly unrestrictedAccess: boolean = false;

  @WireField('address', { type: () => Address })
  @IsOptional()
  @ValidateNested()
  readonly address: Address | null = null;

  @WireField('credit_card', { type: () => CreditCard })
  @IsOptional()
  @ValidateNested()
  readonly creditCard: CreditCard | null = null;

  @WireField('tracking_params', { type: () => TrackingParams })
  @IsOptional()
  @ValidateNested()
  readonly trackingParams: TrackingParams | null = null;

  /**
   * Account custom fields, passed through untouched
   */
  @WireField('custom_field', { raw: true })
  readonly customField: unknown = null;
}

/**
 * `member.deleted` only carries the id; the rest of the record is gone
 */
export class DeletedMember extends MemberfulEntity {
  @WireField('id')
  @IsInt()
  readonly id!: number;

  @WireField('deleted')
  @IsBoolean()
  readonly deleted: boolean = true;
}
