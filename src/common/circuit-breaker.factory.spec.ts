import {
  MalformedOracleResponseError,
  OracleUnavailableError,
} from '../matching/matching.errors';
import {
  CircuitBreakerFactory,
  translateBreakerError,
} from './circuit-breaker.factory';

describe('CircuitBreakerFactory', () => {
  let factory: CircuitBreakerFactory;

  beforeEach(() => {
    factory = new CircuitBreakerFactory();
  });

  afterEach(() => {
    factory.onModuleDestroy();
  });

  it('should report a new breaker as closed', async () => {
    const breaker = factory.createBreaker('oracle', async (value: number) => value * 2);

    await expect(breaker.fire(21)).resolves.toBe(42);

    expect(factory.health()).toEqual({
      oracle: {
        state: 'CLOSED',
        stats: { failures: 0, successes: 1, rejects: 0, fires: 1, timeouts: 0 },
      },
    });
  });

  it('should open after failures and reject with an unavailable error', async () => {
    const breaker = factory.createBreaker(
      'oracle',
      async () => {
        throw new Error('connection reset');
      },
      { volumeThreshold: 1 },
    );

    await expect(breaker.fire()).rejects.toThrow('connection reset');
    expect(factory.health().oracle.state).toBe('OPEN');

    const rejection = await breaker.fire().catch((error: unknown) => translateBreakerError(error));
    expect(rejection).toBeInstanceOf(OracleUnavailableError);
  });

  it('should not count malformed answers as failures', async () => {
    const breaker = factory.createBreaker(
      'oracle',
      async () => {
        throw new MalformedOracleResponseError('not json');
      },
      { volumeThreshold: 1 },
    );

    await expect(breaker.fire()).rejects.toBeInstanceOf(MalformedOracleResponseError);

    expect(factory.health().oracle.state).toBe('CLOSED');
    expect(factory.health().oracle.stats.failures).toBe(0);
  });

  it('should keep calling the action when tripping is turned off', async () => {
    const action = jest.fn(async (fail: boolean) => {
      if (fail) throw new Error('connection reset');
      return 'ok';
    });
    const breaker = factory.createBreaker('oracle', action, {
      volumeThreshold: 1,
      tripOnFailure: false,
    });

    for (let i = 0; i < 12; i++) {
      await expect(breaker.fire(true)).rejects.toThrow('connection reset');
    }

    await expect(breaker.fire(false)).resolves.toBe('ok');
    expect(action).toHaveBeenCalledTimes(13);
    expect(factory.health().oracle).toEqual({
      state: 'CLOSED',
      stats: { failures: 12, successes: 1, rejects: 0, fires: 13, timeouts: 0 },
    });
  });

  it('should time out slow calls', async () => {
    const breaker = factory.createBreaker(
      'oracle',
      () => new Promise<never>(() => undefined),
      { timeout: 10 },
    );

    const rejection = await breaker.fire().catch((error: unknown) => translateBreakerError(error));

    expect(rejection).toBeInstanceOf(OracleUnavailableError);
    expect(factory.health().oracle.stats.timeouts).toBe(1);
  });

  it('should replace a breaker registered under the same name', () => {
    const first = factory.createBreaker('oracle', async () => 1);
    factory.createBreaker('oracle', async () => 2);

    expect(first.isShutdown).toBe(true);
    expect(Object.keys(factory.health())).toEqual(['oracle']);
  });
});

describe('translateBreakerError', () => {
  it.each(['ETIMEDOUT', 'EOPENBREAKER', 'ESHUTDOWN'])(
    'should map opossum code %s to OracleUnavailableError',
    (code) => {
      const error = Object.assign(new Error('breaker rejected'), { code });

      const translated = translateBreakerError(error);

      expect(translated).toBeInstanceOf(OracleUnavailableError);
      expect(translated).toHaveProperty('message', 'breaker rejected');
    },
  );

  it('should pass other errors through untouched', () => {
    const error = Object.assign(new Error('refused'), { code: 'ECONNREFUSED' });

    expect(translateBreakerError(error)).toBe(error);
  });
});
