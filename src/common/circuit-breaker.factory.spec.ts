import { CircuitBreakerFactory } from './circuit-breaker.factory';

class StatusError extends Error {
  constructor(
    message: string,
    readonly statusCode: number,
  ) {
    super(message);
  }
}

describe('CircuitBreakerFactory', () => {
  let factory: CircuitBreakerFactory;

  beforeEach(() => {
    factory = new CircuitBreakerFactory();
  });

  afterEach(() => {
    factory.onModuleDestroy();
  });

  it('should pass calls through while closed', async () => {
    const breaker = factory.createBreaker('echo', (value: string) =>
      Promise.resolve(value.toUpperCase()),
    );

    await expect(breaker.fire('acme')).resolves.toBe('ACME');
    expect(factory.health().echo.state).toBe('CLOSED');
  });

  it('should open after repeated server failures', async () => {
    const breaker = factory.createBreaker(
      'failing',
      () => Promise.reject(new StatusError('Bad gateway', 502)),
      { volumeThreshold: 2, errorThreshold: 50 },
    );

    await expect(breaker.fire()).rejects.toThrow('Bad gateway');
    await expect(breaker.fire()).rejects.toThrow('Bad gateway');

    expect(factory.hasOpenCircuits()).toBe(true);
    expect(factory.health().failing.state).toBe('OPEN');
  });

  it('should not count client errors as failures', async () => {
    const breaker = factory.createBreaker(
      'client-errors',
      () => Promise.reject(new StatusError('Unauthorized', 401)),
      { volumeThreshold: 2, errorThreshold: 50 },
    );

    await expect(breaker.fire()).rejects.toThrow('Unauthorized');
    await expect(breaker.fire()).rejects.toThrow('Unauthorized');
    await expect(breaker.fire()).rejects.toThrow('Unauthorized');

    expect(factory.hasOpenCircuits()).toBe(false);
  });

  it('should replace a breaker registered under the same name', () => {
    factory.createBreaker('agent', () => Promise.resolve(1));
    factory.createBreaker('agent', () => Promise.resolve(2));

    expect(Object.keys(factory.health())).toEqual(['agent']);
  });
});
