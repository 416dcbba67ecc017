import { ConfigurationError } from '../common/errors';
import { testConfig } from '../../test/support/config';
import { ConnectionResolver } from './connection-resolver.service';
import type { ConnectionStore, StoredConnection } from './connection.types';

function storeReturning(
  result: StoredConnection | null | Error,
): ConnectionStore {
  return {
    name: 'fake-store',
    getConnection: jest.fn(async () => {
      if (result instanceof Error) throw result;
      return result;
    }),
  };
}

const stored: StoredConnection = {
  connId: 'contracts_postgres',
  connType: 'postgres',
  host: 'warehouse.internal',
  port: 6432,
  schema: 'contracts_prod',
  login: 'etl',
  password: 'test-secret',
};

describe('ConnectionResolver', () => {
  it('prefers the stored orchestrator connection', async () => {
    const store = storeReturning(stored);
    const resolver = new ConnectionResolver(testConfig(), store);

    await expect(resolver.resolve()).resolves.toEqual({
      source: 'orchestrator',
      connectionId: 'contracts_postgres',
      host: 'warehouse.internal',
      port: 6432,
      database: 'contracts_prod',
      user: 'etl',
      password: 'test-secret',
    });
    expect(store.getConnection).toHaveBeenCalledWith('contracts_postgres');
  });

  it.each<[string, Error | null]>([
    ['unreachable', new Error('connect ECONNREFUSED 127.0.0.1:8080')],
    ['missing the connection', null],
  ])(
    'falls back to the environment when the store is %s',
    async (_label, result) => {
      const store = storeReturning(result);
      const resolver = new ConnectionResolver(testConfig(), store);

      await expect(resolver.resolve()).resolves.toEqual({
        source: 'environment',
        host: 'db.test',
        port: 5433,
        database: 'contracts',
        user: 'tester',
        password: 'test-password',
      });
    },
  );

  it('falls back to the environment when no store is configured', async () => {
    const resolver = new ConnectionResolver(testConfig(), null);

    const conn = await resolver.resolve();
    expect(conn.source).toBe('environment');
  });

  it('never fills a missing stored password from the environment', async () => {
    const resolver = new ConnectionResolver(
      testConfig(),
      storeReturning({ ...stored, password: undefined, port: undefined }),
    );

    const conn = await resolver.resolve();
    expect(conn).toEqual({
      source: 'orchestrator',
      connectionId: 'contracts_postgres',
      host: 'warehouse.internal',
      port: undefined,
      database: 'contracts_prod',
      user: 'etl',
      password: undefined,
    });
    expect(conn.password).toBeUndefined();
    expect(conn.port).toBeUndefined();
  });

  it('ignores a stored definition without a database', async () => {
    const resolver = new ConnectionResolver(
      testConfig(),
      storeReturning({ ...stored, schema: undefined }),
    );

    const conn = await resolver.resolve();
    expect(conn).toMatchObject({
      source: 'environment',
      host: 'db.test',
      user: 'tester',
    });
  });

  it('applies host and port defaults only to the environment branch', async () => {
    const resolver = new ConnectionResolver(
      testConfig({ POSTGRES_HOST: '', POSTGRES_PORT: '' }),
      null,
    );

    await expect(resolver.resolve()).resolves.toMatchObject({
      source: 'environment',
      host: 'localhost',
      port: 5432,
    });
  });

  it('uses the docker host when DOCKER_ENV is set without a host', async () => {
    const resolver = new ConnectionResolver(
      testConfig({ POSTGRES_HOST: '', DOCKER_ENV: 'true' }),
      null,
    );

    await expect(resolver.resolve()).resolves.toMatchObject({
      host: 'postgres',
    });
  });

  it('throws a ConfigurationError when neither source is usable', async () => {
    const resolver = new ConnectionResolver(
      testConfig({ POSTGRES_DB: '', POSTGRES_USER: '' }),
      storeReturning(new Error('timeout')),
    );

    await expect(resolver.resolve()).rejects.toBeInstanceOf(
      ConfigurationError,
    );
  });

  it('returns a frozen config', async () => {
    const conn = await new ConnectionResolver(testConfig(), null).resolve();
    expect(Object.isFrozen(conn)).toBe(true);
  });
});
