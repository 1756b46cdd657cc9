/**
 * Barrel export for Memberful entity models
 */

export * from './changes.model';
export * from './enums';
export * from './member-details.model';
export * from './member.model';
export * from './order.model';
export * from './subscription-plan.model';
export * from './subscription.model';
