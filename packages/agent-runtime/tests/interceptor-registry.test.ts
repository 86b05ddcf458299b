import { describe, it, expect } from 'vitest';
import { InterceptorRegistry } from '../src/interceptor-registry.js';
import type { InterceptorContext } from '../src/interceptor-registry.js';
import { AuthenticationRequiredError } from '../src/errors.js';

const ctx: InterceptorContext = {
  request: { jsonrpc: '2.0', id: 1, method: 'message/send', params: {} },
  transport: { headers: {} },
};

describe('InterceptorRegistry', () => {
  it('runs interceptors by ascending priority', async () => {
    const registry = new InterceptorRegistry();
    const order: string[] = [];

    registry.register(() => {
      order.push('audit');
    }, 200);
    registry.register(async () => {
      order.push('auth');
    }, 10);

    await registry.run(ctx);
    expect(order).toEqual(['auth', 'audit']);
  });

  it('stops at the first interceptor that throws', async () => {
    const registry = new InterceptorRegistry();
    const seen: string[] = [];

    registry.register(() => {
      throw new AuthenticationRequiredError();
    }, 1);
    registry.register(() => {
      seen.push('later');
    }, 2);

    await expect(registry.run(ctx)).rejects.toThrow(AuthenticationRequiredError);
    expect(seen).toEqual([]);
  });

  it('dispose removes an interceptor', () => {
    const registry = new InterceptorRegistry();
    const handle = registry.register(() => {});
    registry.register(() => {});

    expect(registry.size).toBe(2);
    handle.dispose();
    handle.dispose();
    expect(registry.size).toBe(1);
  });
});
