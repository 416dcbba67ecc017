import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { APP_CONFIG, type AppConfig } from '../config/app-config';
import { ConfigurationError, errorMessage } from '../common/errors';
import {
  CONNECTION_STORE,
  type ConnectionConfig,
  type ConnectionStore,
  type StoredConnection,
} from './connection.types';

const DEFAULT_HOST = 'localhost';
const DOCKER_HOST = 'postgres';
const DEFAULT_PORT = 5432;

@Injectable()
export class ConnectionResolver {
  private readonly logger = new Logger(ConnectionResolver.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Optional()
    @Inject(CONNECTION_STORE)
    private readonly store: ConnectionStore | null = null,
  ) {}

  /**
   * Stored orchestrator connection first, environment second. The two are never
   * merged: a stored definition without a password stays without one.
   */
  async resolve(): Promise<ConnectionConfig> {
    const resolved = (await this.fromOrchestrator()) ?? this.fromEnvironment();
    if (!resolved) {
      const { connectionId } = this.config.orchestrator;
      throw new ConfigurationError(
        `No usable database connection: stored connection "${connectionId}" ` +
          'was not available and POSTGRES_DB / POSTGRES_USER are not set',
      );
    }

    const { source, user, host, port, database } = resolved;
    const target = `${user}@${host}:${port ?? 'default'}/${database}`;
    this.logger.log(`Using ${source} connection ${target}`);
    return Object.freeze(resolved);
  }

  private async fromOrchestrator(): Promise<ConnectionConfig | null> {
    const { connectionId } = this.config.orchestrator;
    if (!this.store) {
      this.logger.debug('No orchestrator connection store configured');
      return null;
    }

    let stored: StoredConnection | null;
    try {
      stored = await this.store.getConnection(connectionId);
    } catch (err) {
      const { name } = this.store;
      this.logger.warn(
        `Could not read connection "${connectionId}" from ${name}: ` +
          errorMessage(err),
      );
      return null;
    }

    if (!stored) {
      this.logger.warn(
        `Connection "${connectionId}" not found in ${this.store.name}`,
      );
      return null;
    }

    const { host, schema, login } = stored;
    if (!host || !schema || !login) {
      this.logger.warn(
        `Connection "${connectionId}" in ${this.store.name} lacks host, ` +
          'schema or login; ignoring it',
      );
      return null;
    }

    return {
      source: 'orchestrator',
      connectionId,
      host,
      port: stored.port,
      database: schema,
      user: login,
      password: stored.password,
    };
  }

  private fromEnvironment(): ConnectionConfig | null {
    const env = this.config.database.env;
    if (!env.database || !env.user) return null;

    return {
      source: 'environment',
      host: env.host ?? (env.dockerEnv ? DOCKER_HOST : DEFAULT_HOST),
      port: env.port ?? DEFAULT_PORT,
      database: env.database,
      user: env.user,
      password: env.password,
    };
  }
}
