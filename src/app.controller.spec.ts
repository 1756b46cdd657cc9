import { AppController } from './app.controller';

describe('AppController', () => {
  it('lists the endpoints and supported events', () => {
    const info = new AppController().getInfo();

    expect(info.endpoints).toEqual({
      webhook: 'POST /api/webhooks/memberful',
      health: 'GET /api/health',
    });
    expect(info.supportedEvents).toContain('subscription.renewed');
  });
});
