export type ConnectionSource = 'orchestrator' | 'environment';

/**
 * Database credentials resolved once at startup. Exactly one source wins; the
 * orchestrator branch carries whatever the stored definition had, nothing more.
 */
export type ConnectionConfig =
  | {
      readonly source: 'orchestrator';
      readonly connectionId: string;
      readonly host: string;
      readonly port?: number;
      readonly database: string;
      readonly user: string;
      readonly password?: string;
    }
  | {
      readonly source: 'environment';
      readonly host: string;
      readonly port: number;
      readonly database: string;
      readonly user: string;
      readonly password?: string;
    };

/** A connection definition as the orchestrator stores it (Airflow names). */
export type StoredConnection = {
  connId: string;
  connType?: string;
  host?: string;
  port?: number;
  schema?: string;
  login?: string;
  password?: string;
};

export interface ConnectionStore {
  /** Human-readable name used in logs. */
  readonly name: string;
  /**
   * Resolves `null` when the connection does not exist. Rejects when the
   * store cannot be read.
   */
  getConnection(connId: string): Promise<StoredConnection | null>;
}

export const CONNECTION_STORE = Symbol('CONNECTION_STORE');
export const CONNECTION_CONFIG = Symbol('CONNECTION_CONFIG');

/** Loggable view of a connection, password replaced by a flag. */
export function describeConnection(conn: ConnectionConfig) {
  return {
    source: conn.source,
    host: conn.host,
    port: conn.port ?? null,
    database: conn.database,
    user: conn.user,
    hasPassword: conn.password !== undefined,
    ...(conn.source === 'orchestrator'
      ? { connectionId: conn.connectionId }
      : {}),
  };
}
