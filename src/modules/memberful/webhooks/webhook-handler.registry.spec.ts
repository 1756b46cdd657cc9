import { eventPayloads } from '../../../domain/memberful/__fixtures__/payloads';
import { MemberSignupEvent, parsePayload } from '../../../domain/memberful';
import { WebhookHandlerRegistry } from './webhook-handler.registry';

const signupEvent = () => parsePayload(eventPayloads().member_signup);
const orderEvent = () => parsePayload(eventPayloads()['order.purchased']);

describe('WebhookHandlerRegistry', () => {
  let registry: WebhookHandlerRegistry;

  beforeEach(() => {
    registry = new WebhookHandlerRegistry();
  });

  it('invokes handlers registered for the event type', async () => {
    const handler = jest.fn();
    registry.on('member_signup', handler);

    const event = signupEvent();
    const invoked = await registry.dispatch(event);

    expect(invoked).toBe(1);
    expect(handler).toHaveBeenCalledWith(event);
    expect(handler.mock.calls[0][0]).toBeInstanceOf(MemberSignupEvent);
  });

  it('skips handlers of other event types', async () => {
    const handler = jest.fn();
    registry.on('member_signup', handler);

    const invoked = await registry.dispatch(orderEvent());

    expect(invoked).toBe(0);
    expect(handler).not.toHaveBeenCalled();
  });

  it('runs variant handlers in registration order, then catch-alls', async () => {
    const calls: string[] = [];
    registry
      .onAny(() => {
        calls.push('any');
      })
      .on('member_signup', async () => {
        await Promise.resolve();
        calls.push('first');
      })
      .on('member_signup', () => {
        calls.push('second');
      });

    const invoked = await registry.dispatch(signupEvent());

    expect(invoked).toBe(3);
    expect(calls).toEqual(['first', 'second', 'any']);
  });

  it('stops at the first failing handler and propagates its error', async () => {
    const after = jest.fn();
    registry
      .on('member_signup', () => {
        throw new Error('handler failed');
      })
      .onAny(after);

    await expect(registry.dispatch(signupEvent())).rejects.toThrow('handler failed');
    expect(after).not.toHaveBeenCalled();
  });

  it('counts handlers per event type', () => {
    registry.on('member_signup', jest.fn()).on('order.purchased', jest.fn()).onAny(jest.fn());

    expect(registry.handlerCount('member_signup')).toBe(2);
    expect(registry.handlerCount('download.deleted')).toBe(1);
  });
});
