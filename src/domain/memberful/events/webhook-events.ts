/**
 * Memberful webhook event variants
 *
 * Every class pins `event` to one discriminator. Decoding a payload whose
 * `event` differs fails, so a variant instance always matches its literal.
 */

import { Equals, IsDefined, IsOptional, ValidateNested } from 'class-validator';
import { MemberfulEntity } from '../decoding/memberful-entity';
import {
  EntityConstructor,
  WireField,
} from '../decoding/wire-field.decorator';
import { MemberChanges, SubscriptionChanges } from '../models/changes.model';
import { DeletedMember, Member } from '../models/member.model';
import { Order, Product } from '../models/order.model';
import { SubscriptionPlan } from '../models/subscription-plan.model';
import { Subscription } from '../models/subscription.model';

const EventName = (discriminator: string): PropertyDecorator => {
  return (target, propertyKey) => {
    WireField('event')(target, propertyKey);
    Equals(discriminator)(target, propertyKey);
  };
};

const Payload = (
  wireName: string,
  type: () => EntityConstructor,
): PropertyDecorator => {
  return (target, propertyKey) => {
    WireField(wireName, { type })(target, propertyKey);
    IsDefined()(target, propertyKey);
    ValidateNested()(target, propertyKey);
  };
};

const OptionalPayload = (
  wireName: string,
  type: () => EntityConstructor,
): PropertyDecorator => {
  return (target, propertyKey) => {
    WireField(wireName, { type })(target, propertyKey);
    IsOptional()(target, propertyKey);
    ValidateNested()(target, propertyKey);
  };
};

/**
 * Sent when a new member account is created
 */
export class MemberSignupEvent extends MemberfulEntity {
  @EventName('member_signup')
  readonly event!: 'member_signup';

  @Payload('member', () => Member)
  readonly member!: Member;
}

/**
 * Sent when profile fields change. Custom field edits do not trigger it.
 */
export class MemberUpdatedEvent extends MemberfulEntity {
  @EventName('member_updated')
  readonly event!: 'member_updated';

  @Payload('member', () => Member)
  readonly member!: Member;

  @OptionalPayload('changed', () => MemberChanges)
  readonly changed: MemberChanges | null = null;
}

/**
 * Sent when a member is deleted; only the id survives
 */
export class MemberDeletedEvent extends MemberfulEntity {
  @EventName('member.deleted')
  readonly event!: 'member.deleted';

  @Payload('member', () => DeletedMember)
  readonly member!: DeletedMember;
}

/**
 * Sent when a subscription is added to an account: purchase, gift
 * activation, group addition or staff action
 */
export class SubscriptionCreatedEvent extends MemberfulEntity {
  @EventName('subscription.created')
  readonly event!: 'subscription.created';

  @Payload('subscription', () => Subscription)
  readonly subscription!: Subscription;
}

/**
 * A plan change shows up as `changed.planId`
 */
export class SubscriptionUpdatedEvent extends MemberfulEntity {
  @EventName('subscription.updated')
  readonly event!: 'subscription.updated';

  @Payload('subscription', () => Subscription)
  readonly subscription!: Subscription;

  @OptionalPayload('changed', () => SubscriptionChanges)
  readonly changed: SubscriptionChanges | null = null;
}

/**
 * Sent when staff complete a suspended order and the subscription is active again
 */
export class SubscriptionActivatedEvent extends MemberfulEntity {
  @EventName('subscription.activated')
  readonly event!: 'subscription.activated';

  @Payload('subscription', () => Subscription)
  readonly subscription!: Subscription;
}

/**
 * Sent when a subscription fails to renew, expires, or its order is suspended
 */
export class SubscriptionDeactivatedEvent extends MemberfulEntity {
  @EventName('subscription.deactivated')
  readonly event!: 'subscription.deactivated';

  @Payload('subscription', () => Subscription)
  readonly subscription!: Subscription;
}

export class SubscriptionDeletedEvent extends MemberfulEntity {
  @EventName('subscription.deleted')
  readonly event!: 'subscription.deleted';

  @Payload('subscription', () => Subscription)
  readonly subscription!: Subscription;
}

/**
 * Renewal and reactivation are indistinguishable in this payload
 */
export class SubscriptionRenewedEvent extends MemberfulEntity {
  @EventName('subscription.renewed')
  readonly event!: 'subscription.renewed';

  @Payload('subscription', () => Subscription)
  readonly subscription!: Subscription;

  @Payload('order', () => Order)
  readonly order!: Order;
}

/**
 * Not sent for renewal payments. Gift purchases create no subscription
 * until the recipient activates the gift.
 */
export class OrderPurchasedEvent extends MemberfulEntity {
  @EventName('order.purchased')
  readonly event!: 'order.purchased';

  @Payload('order', () => Order)
  readonly order!: Order;
}

export class OrderRefundedEvent extends MemberfulEntity {
  @EventName('order.refunded')
  readonly event!: 'order.refunded';

  @Payload('order', () => Order)
  readonly order!: Order;
}

export class OrderCompletedEvent extends MemberfulEntity {
  @EventName('order.completed')
  readonly event!: 'order.completed';

  @Payload('order', () => Order)
  readonly order!: Order;
}

export class OrderSuspendedEvent extends MemberfulEntity {
  @EventName('order.suspended')
  readonly event!: 'order.suspended';

  @Payload('order', () => Order)
  readonly order!: Order;
}

export class SubscriptionPlanCreatedEvent extends MemberfulEntity {
  @EventName('subscription_plan.created')
  readonly event!: 'subscription_plan.created';

  @Payload('subscription', () => SubscriptionPlan)
  readonly subscription!: SubscriptionPlan;
}

export class SubscriptionPlanUpdatedEvent extends MemberfulEntity {
  @EventName('subscription_plan.updated')
  readonly event!: 'subscription_plan.updated';

  @Payload('subscription', () => SubscriptionPlan)
  readonly subscription!: SubscriptionPlan;
}

export class SubscriptionPlanDeletedEvent extends MemberfulEntity {
  @EventName('subscription_plan.deleted')
  readonly event!: 'subscription_plan.deleted';

  @Payload('subscription', () => SubscriptionPlan)
  readonly subscription!: SubscriptionPlan;
}

export class DownloadCreatedEvent extends MemberfulEntity {
  @EventName('download.created')
  readonly event!: 'download.created';

  @Payload('product', () => Product)
  readonly product!: Product;
}

export class DownloadUpdatedEvent extends MemberfulEntity {
  @EventName('download.updated')
  readonly event!: 'download.updated';

  @Payload('product', () => Product)
  readonly product!: Product;
}

export class DownloadDeletedEvent extends MemberfulEntity {
  @EventName('download.deleted')
  readonly event!: 'download.deleted';

  @Payload('product', () => Product)
  readonly product!: Product;
}
