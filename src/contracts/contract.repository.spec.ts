import {
  ConfigurationError,
  DatabaseUnavailableError,
  QueryFailedError,
} from '../common/errors';
import { testConfig } from '../../test/support/config';
import {
  FakeContractsDb,
  pgError,
} from '../../test/support/fake-contracts-db';
import { ContractRepository } from './contract.repository';

const jan = (day: number) => new Date(Date.UTC(2024, 0, day, 12, 0, 0));

function seed() {
  return new FakeContractsDb([
    {
      codigo_proceso: 'SIE-001',
      razon_social: 'Constructora Andina S.A.',
      representante: 'Maria Perez',
      ruc: '1790012345001',
      telefono: '022345678',
      mail: 'contacto@andina.test',
      domicilio: 'Av. Amazonas N34-12',
      updated_at: jan(2),
    },
    {
      codigo_proceso: 'SIE-002',
      razon_social: 'Servicios Litorales',
      mail: '   ',
      updated_at: jan(5),
    },
    {
      codigo_proceso: 'SIE-003',
      updated_at: null,
      fecha_actualizacion: jan(3),
    },
  ]);
}

describe('ContractRepository', () => {
  let db: FakeContractsDb;
  let repo: ContractRepository;

  beforeEach(() => {
    db = seed();
    repo = new ContractRepository(db, testConfig());
  });

  describe('listAll', () => {
    it('returns normalized records, most recent extraction first', async () => {
      const records = await repo.listAll();

      expect(records.map((r) => r.code)).toEqual([
        'SIE-002',
        'SIE-003',
        'SIE-001',
      ]);
      expect(records[0]).toEqual({
        code: 'SIE-002',
        legalName: 'Servicios Litorales',
        legalRepresentative: null,
        taxId: null,
        phone: null,
        email: null,
        address: null,
        extractedAt: '2024-01-05T12:00:00.000Z',
      });
      expect(records[1].extractedAt).toBe('2024-01-03T12:00:00.000Z');
    });

    it('lists rows the pipeline has not stamped yet, last', async () => {
      db.rows.push({ codigo_proceso: 'SIE-004', ruc: '0990011122001' });

      const records = await repo.listAll();

      expect(records.map((r) => r.code)).toEqual([
        'SIE-002',
        'SIE-003',
        'SIE-001',
        'SIE-004',
      ]);
      expect(records[3]).toMatchObject({
        code: 'SIE-004',
        taxId: '0990011122001',
        extractedAt: null,
      });
    });

    it('can keep only rows with extracted data', async () => {
      const records = await repo.listAll({ extractedOnly: true });

      expect(records.map((r) => r.code)).toEqual(['SIE-002', 'SIE-001']);
      expect(db.queries[0]).toContain(
        "where nullif(btrim(razon_social::text), '') is not null or",
      );
    });

    it('treats blank values as missing when filtering', async () => {
      db.rows[1] = {
        codigo_proceso: 'SIE-002',
        razon_social: '',
        mail: '   ',
        updated_at: jan(5),
      };

      const records = await repo.listAll({ extractedOnly: true });

      expect(records.map((r) => r.code)).toEqual(['SIE-001']);
    });

    it('passes the configured limit as a parameter', async () => {
      const config = testConfig({ CONTRACTS_LIST_LIMIT: '2' });
      repo = new ContractRepository(db, config);

      await expect(repo.listAll()).resolves.toHaveLength(2);
      expect(db.statements[1].values).toEqual([2]);
    });

    it('sets the statement timeout on the borrowed client', async () => {
      await repo.listAll();

      expect(db.statements[0].text).toBe("set statement_timeout = '5000ms'");
    });
  });

  describe('get', () => {
    it('finds a record by code', async () => {
      const record = await repo.get('SIE-001');

      expect(record).toMatchObject({
        code: 'SIE-001',
        taxId: '1790012345001',
        email: 'contacto@andina.test',
      });
      expect(db.statements[1].values).toEqual(['SIE-001']);
    });

    it('returns null for an unknown code', async () => {
      await expect(repo.get('C-100')).resolves.toBeNull();
    });
  });

  describe('aggregateStats', () => {
    it('counts present and missing values per field', async () => {
      const stats = await repo.aggregateStats();

      expect(stats.total).toBe(3);
      expect(stats.fields.legalName).toEqual({ present: 2, missing: 1 });
      expect(stats.fields.email).toEqual({ present: 1, missing: 2 });
      expect(stats.fields.taxId).toEqual({ present: 1, missing: 2 });
      expect(stats.lastExtractedAt).toBe('2024-01-05T12:00:00.000Z');
    });

    it('reports an empty table as zero counts', async () => {
      db.rows = [];

      const stats = await repo.aggregateStats();
      expect(stats.total).toBe(0);
      expect(stats.fields.address).toEqual({ present: 0, missing: 0 });
      expect(stats.lastExtractedAt).toBeNull();
    });
  });

  describe('failures', () => {
    it('maps a refused connection to DatabaseUnavailableError', async () => {
      db.connectError = pgError(
        'connect ECONNREFUSED 127.0.0.1:5432',
        'ECONNREFUSED',
      );

      await expect(repo.listAll()).rejects.toBeInstanceOf(
        DatabaseUnavailableError,
      );
      expect(db.connects).toBe(0);
    });

    it('maps a missing table to QueryFailedError and releases the client', async () => {
      db.queryError = pgError(
        'relation "public.sync_contratos" does not exist',
        '42P01',
      );

      await expect(repo.aggregateStats()).rejects.toBeInstanceOf(
        QueryFailedError,
      );
      expect(db.connects).toBe(1);
      expect(db.releases).toBe(1);
    });

    it('maps a statement timeout to DatabaseUnavailableError', async () => {
      db.queryError = pgError(
        'canceling statement due to statement timeout',
        '57014',
      );

      await expect(repo.get('SIE-001')).rejects.toBeInstanceOf(
        DatabaseUnavailableError,
      );
      expect(db.releases).toBe(1);
    });

    it('reports a row without a code as a malformed table', async () => {
      db.rows = [{ codigo_proceso: '', updated_at: jan(1) }];

      await expect(repo.listAll()).rejects.toThrow(QueryFailedError);
    });

    it('releases every borrowed client', async () => {
      await repo.listAll();
      await repo.get('SIE-002');
      await repo.aggregateStats();
      await repo.ping();

      expect(db.connects).toBe(4);
      expect(db.releases).toBe(4);
    });
  });

  it('rejects an unsafe table name', () => {
    const config = testConfig({ CONTRACTS_TABLE: 'contracts; drop' });

    expect(() => new ContractRepository(db, config)).toThrow(
      ConfigurationError,
    );
  });

  it('ends the pool on shutdown', async () => {
    await repo.onApplicationShutdown();
    expect(db.ended).toBe(true);
  });
});
