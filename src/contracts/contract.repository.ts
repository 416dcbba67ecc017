import {
  Inject,
  Injectable,
  Logger,
  type OnApplicationShutdown,
} from '@nestjs/common';
import { z } from 'zod';
import { APP_CONFIG, type AppConfig } from '../config/app-config';
import {
  AppError,
  ConfigurationError,
  DatabaseUnavailableError,
  QueryFailedError,
  errorMessage,
} from '../common/errors';
import { PG_POOL, type DbClient, type DbPool } from '../database/database';
import {
  CONTRACT_COLUMNS,
  OPTIONAL_CONTRACT_FIELDS,
  type ContractRecord,
  type ContractStats,
  type FieldPresence,
  type ListContractsOptions,
} from './contract.types';

// SQLSTATE classes/codes and socket errors meaning "cannot reach the data".
const UNAVAILABLE_SQLSTATE = /^(08|57P0)/;
const STATEMENT_TIMEOUT = '57014';
const SOCKET_ERRORS = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'EPIPE',
]);

function toText(value: unknown): unknown {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number' || typeof value === 'bigint') {
    return String(value);
  }
  if (typeof value === 'string') return value.trim() === '' ? null : value;
  return value;
}

function toIso(value: unknown): unknown {
  return value instanceof Date ? value.toISOString() : value;
}

const nullableText = z.preprocess(toText, z.string().nullable());

const ContractRowSchema = z.object({
  code: z.preprocess(toText, z.string()),
  legalName: nullableText,
  legalRepresentative: nullableText,
  taxId: nullableText,
  phone: nullableText,
  email: nullableText,
  address: nullableText,
  extractedAt: z.preprocess(toIso, z.string().nullable()),
});

const count = z.coerce.number().int().nonnegative();

const StatsRowSchema = z.object({
  total: count,
  legalName: count,
  legalRepresentative: count,
  taxId: count,
  phone: count,
  email: count,
  address: count,
  lastExtractedAt: z.preprocess(toIso, z.string().nullable()),
});

const IDENT = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

function quoteIdent(name: string): string {
  const parts = name.trim().split('.');
  if (parts.length > 2 || parts.some((p) => !IDENT.test(p))) {
    throw new ConfigurationError(`Invalid CONTRACTS_TABLE "${name}"`);
  }
  return parts.map((p) => `"${p}"`).join('.');
}

/** Same rule as the statistics: null and blank both count as missing. */
function presentSql(column: string): string {
  return `nullif(btrim(${column}::text), '')`;
}

function sqlCode(err: unknown): string | undefined {
  if (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    typeof err.code === 'string'
  ) {
    return err.code;
  }
  return undefined;
}

/**
 * Read-only access to the pipeline's contracts table. Every call borrows a
 * pooled client and gives it back on every exit path.
 */
@Injectable()
export class ContractRepository implements OnApplicationShutdown {
  private readonly logger = new Logger(ContractRepository.name);
  private readonly table: string;
  private readonly selectColumns: string;
  private readonly extractedAtExpr =
    'coalesce(updated_at, fecha_actualizacion)';

  constructor(
    @Inject(PG_POOL) private readonly pool: DbPool,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {
    this.table = quoteIdent(config.database.table);
    this.selectColumns = [
      'codigo_proceso as code',
      ...OPTIONAL_CONTRACT_FIELDS.map(
        (f) => `${CONTRACT_COLUMNS[f]} as "${f}"`,
      ),
      `${this.extractedAtExpr} as "extractedAt"`,
    ].join(',\n        ');
  }

  async listAll(options: ListContractsOptions = {}): Promise<ContractRecord[]> {
    const anyPresent = OPTIONAL_CONTRACT_FIELDS.map(
      (f) => `${presentSql(CONTRACT_COLUMNS[f])} is not null`,
    ).join(' or ');
    const where = options.extractedOnly ? `where ${anyPresent}` : '';
    const rows = await this.run(
      'listAll',
      `
      select
        ${this.selectColumns}
      from ${this.table}
      ${where}
      order by ${this.extractedAtExpr} desc nulls last, codigo_proceso asc
      limit $1
      `,
      [this.config.database.listLimit],
    );
    return rows.map((row) => this.toRecord(row));
  }

  async get(code: string): Promise<ContractRecord | null> {
    const rows = await this.run(
      'get',
      `
      select
        ${this.selectColumns}
      from ${this.table}
      where codigo_proceso = $1
      limit 1
      `,
      [code],
    );
    return rows.length ? this.toRecord(rows[0]) : null;
  }

  /** Counts only; never reads rows back, whatever the table size. */
  async aggregateStats(): Promise<ContractStats> {
    const presenceColumns = OPTIONAL_CONTRACT_FIELDS.map(
      (f) => `count(${presentSql(CONTRACT_COLUMNS[f])})::int as "${f}"`,
    ).join(',\n        ');
    const rows = await this.run(
      'aggregateStats',
      `
      select
        count(*)::int as total,
        ${presenceColumns},
        max(${this.extractedAtExpr}) as "lastExtractedAt"
      from ${this.table}
      `,
    );

    const parsed = StatsRowSchema.safeParse(rows[0]);
    if (!parsed.success) {
      throw new QueryFailedError(
        `Unexpected statistics row from ${this.config.database.table}`,
      );
    }
    const row = parsed.data;
    const presence = (present: number): FieldPresence => ({
      present,
      missing: row.total - present,
    });
    return {
      total: row.total,
      fields: {
        legalName: presence(row.legalName),
        legalRepresentative: presence(row.legalRepresentative),
        taxId: presence(row.taxId),
        phone: presence(row.phone),
        email: presence(row.email),
        address: presence(row.address),
      },
      lastExtractedAt: row.lastExtractedAt,
    };
  }

  async ping(): Promise<void> {
    await this.run('ping', 'select 1');
  }

  async onApplicationShutdown() {
    await this.pool.end();
  }

  private toRecord(row: unknown): ContractRecord {
    const parsed = ContractRowSchema.safeParse(row);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const table = this.config.database.table;
      const where = issue?.path.join('.');
      throw new QueryFailedError(
        `Malformed row in ${table}: ${where} ${issue?.message}`,
      );
    }
    return parsed.data;
  }

  private async run(
    op: string,
    sql: string,
    params: unknown[] = [],
  ): Promise<unknown[]> {
    let client: DbClient;
    try {
      client = await this.pool.connect();
    } catch (err) {
      this.logger.error(`${op}: cannot connect: ${errorMessage(err)}`);
      throw new DatabaseUnavailableError(
        `Cannot connect to the contracts database: ${errorMessage(err)}`,
        { cause: err },
      );
    }

    try {
      const timeoutMs = this.config.database.statementTimeoutMs;
      await client.query(`set statement_timeout = '${timeoutMs}ms'`);
      const res = await client.query(sql, params);
      return res.rows;
    } catch (err) {
      throw this.translate(op, err);
    } finally {
      client.release();
    }
  }

  private translate(op: string, err: unknown): AppError {
    if (err instanceof AppError) return err;
    const code = sqlCode(err);
    const message = errorMessage(err);
    this.logger.error(`${op} failed${code ? ` (${code})` : ''}: ${message}`);

    const unreachable =
      code !== undefined &&
      (UNAVAILABLE_SQLSTATE.test(code) ||
        code === STATEMENT_TIMEOUT ||
        SOCKET_ERRORS.has(code));
    if (unreachable || /connection terminated/i.test(message)) {
      return new DatabaseUnavailableError(
        `Contracts database unavailable: ${message}`,
        { cause: err },
      );
    }
    return new QueryFailedError(
      `Query on ${this.config.database.table} failed: ${message}`,
      { cause: err },
    );
  }
}
