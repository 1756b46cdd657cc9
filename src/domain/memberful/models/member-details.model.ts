/**
 * Member sub-records: postal address, stored card and UTM parameters
 */

import { IsInt, IsOptional, IsString } from 'class-validator';
import { MemberfulEntity } from '../decoding/memberful-entity';
import { WireField } from '../decoding/wire-field.decorator';

export class Address extends MemberfulEntity {
  @WireField('street')
  @IsOptional()
  @IsString()
  readonly street: string | null = null;

  @WireField('city')
  @IsOptional()
  @IsString()
  readonly city: string | null = null;

  @WireField('state')
  @IsOptional()
  @IsString()
  readonly state: string | null = null;

  @WireField('postal_code')
  @IsOptional()
  @IsString()
  readonly postalCode: string | null = null;

  @WireField('country')
  @IsOptional()
  @IsString()
  readonly country: string | null = null;
}

export class CreditCard extends MemberfulEntity {
  @WireField('exp_month')
  @IsOptional()
  @IsInt()
  readonly expMonth: number | null = null;

  @WireField('exp_year')
  @IsOptional()
  @IsInt()
  readonly expYear: number | null = null;

  @WireField('last_four')
  @IsOptional()
  @IsString()
  readonly lastFour: string | null = null;

  @WireField('brand')
  @IsOptional()
  @IsString()
  readonly brand: string | null = null;
}

export class TrackingParams extends MemberfulEntity {
  @WireField('utm_term')
  @IsOptional()
  @IsString()
  readonly utmTerm: string | null = null;

  @WireField('utm_campaign')
  @IsOptional()
  @IsString()
  readonly utmCampaign: string | null = null;

  @WireField('utm_medium')
  @IsOptional()
  @IsString()
  readonly utmMedium: string | null = null;

  @WireField('utm_source')
  @IsOptional()
  @IsString()
  readonly utmSource: string | null = null;

  @WireField('utm_content')
  @IsOptional()
  @IsString()
  readonly utmContent: string | null = null;
}
