import { describe, it, expect, beforeEach, vi } from 'vitest';

describe('buildApp', () => {
  beforeEach(() => {
    vi.resetModules();
  });

  async function build() {
    const { buildApp } = await import('../../src/app');
    const app = buildApp();
    await app.ready();
    return app;
  }

  it('reports health with the active rule set', async () => {
    const app = await build();
    const res = await app.inject({ method: 'GET', url: '/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok', ruleSet: 'default' });
    await app.close();
  });

  it('wraps validation failures in the error envelope', async () => {
    const app = await build();
    const res = await app.inject({ method: 'POST', url: '/lots/process', payload: { lotId: 'A1' } });
    expect(res.statusCode).toBe(400);
    expect(res.json().error.code).toBe('VALIDATION_ERROR');
    expect(res.json().error.message).toBe('Invalid request data');
    await app.close();
  });

  it('maps lot input errors to 400', async () => {
    const app = await build();
    const res = await app.inject({
      method: 'POST',
      url: '/lots/process',
      payload: { lotId: '   ', description: 'Vase' },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().error.code).toBe('INVALID_LOT_INPUT');
    await app.close();
  });
});
