import { describe, it, expect, vi } from 'vitest';
import neo4j, { type Driver } from 'neo4j-driver';
import { Neo4jGraphExecutor, toPlainValue } from './neo4j-executor.js';

function makeRecord(values: Record<string, unknown>): { toObject: () => Record<string, unknown> } {
  return { toObject: () => values };
}

function createMockDriver(options: {
  records?: Array<Record<string, unknown>>;
  runError?: Error;
  connectError?: Error;
  closeError?: Error;
} = {}) {
  const session = {
    run: options.runError
      ? vi.fn().mockRejectedValue(options.runError)
      : vi.fn().mockResolvedValue({ records: (options.records ?? []).map(makeRecord) }),
    close: options.closeError ? vi.fn().mockRejectedValue(options.closeError) : vi.fn().mockResolvedValue(undefined),
  };
  const driver = {
    session: vi.fn().mockReturnValue(session),
    close: vi.fn().mockResolvedValue(undefined),
    verifyConnectivity: options.connectError
      ? vi.fn().mockRejectedValue(options.connectError)
      : vi.fn().mockResolvedValue({ address: 'localhost:7687' }),
  };
  return { driver: driver as unknown as Driver, mockDriver: driver, session };
}

describe('toPlainValue', () => {
  it('should convert driver integers to numbers', () => {
    expect(toPlainValue(neo4j.int(1000))).toBe(1000);
  });

  it('should convert integers outside the safe range to strings', () => {
    expect(toPlainValue(neo4j.int('9223372036854775807'))).toBe('9223372036854775807');
  });

  it('should convert lists and maps element-wise', () => {
    expect(toPlainValue([neo4j.int(1), { count: neo4j.int(2), name: 'x' }])).toEqual([1, { count: 2, name: 'x' }]);
  });

  it('should pass other values through', () => {
    expect(toPlainValue('cough')).toBe('cough');
    expect(toPlainValue(99.99)).toBe(99.99);
    expect(toPlainValue(null)).toBeNull();
  });
});

describe('Neo4jGraphExecutor', () => {
  it('should return plain rows for a read query', async () => {
    const { driver, session } = createMockDriver({
      records: [
        { name: 'Lung Cancer Dataset', instances: neo4j.int(1000) },
        { name: 'Other', instances: neo4j.int(24) },
      ],
    });
    const executor = new Neo4jGraphExecutor(driver);

    const result = await executor.execute('MATCH (d:Dataset) RETURN d.name AS name, d.instances AS instances', {});

    expect(result.isOk()).toBe(true);
    expect(result._unsafeUnwrap()).toEqual([
      { name: 'Lung Cancer Dataset', instances: 1000 },
      { name: 'Other', instances: 24 },
    ]);
    expect(session.close).toHaveBeenCalledTimes(1);
  });

  it('should pass parameters and open a read session on the configured database', async () => {
    const { driver, mockDriver, session } = createMockDriver();
    const executor = new Neo4jGraphExecutor(driver, { database: 'papers' });

    await executor.execute('MATCH (s:Section) WHERE s.text CONTAINS $q RETURN s.name AS name', { q: 'smoking' });

    expect(mockDriver.session).toHaveBeenCalledWith({ defaultAccessMode: 'READ', database: 'papers' });
    expect(session.run).toHaveBeenCalledWith(
      'MATCH (s:Section) WHERE s.text CONTAINS $q RETURN s.name AS name',
      { q: 'smoking' },
    );
  });

  it('should omit the database when none is configured', async () => {
    const { driver, mockDriver } = createMockDriver();
    await new Neo4jGraphExecutor(driver).execute('RETURN 1', {});
    expect(mockDriver.session).toHaveBeenCalledWith({ defaultAccessMode: 'READ' });
  });

  it('should use a write session for write statements', async () => {
    const { driver, mockDriver } = createMockDriver();
    const executor = new Neo4jGraphExecutor(driver);

    const result = await executor.write('MERGE (s:Symptom {name: $name})', { name: 'cough' });

    expect(result.isOk()).toBe(true);
    expect(mockDriver.session).toHaveBeenCalledWith({ defaultAccessMode: 'WRITE' });
  });

  it('should wrap driver failures in GraphQueryError and still close the session', async () => {
    const { driver, session } = createMockDriver({ runError: new Error('Invalid input') });
    const executor = new Neo4jGraphExecutor(driver);

    const result = await executor.execute('MATCH (', {});

    expect(result.isErr()).toBe(true);
    const error = result._unsafeUnwrapErr();
    expect(error.name).toBe('GraphQueryError');
    expect(error.message).toBe('Query failed: Invalid input');
    expect(session.close).toHaveBeenCalledTimes(1);
  });

  it('should return an error instead of throwing when the session fails to close', async () => {
    const { driver } = createMockDriver({ records: [{ n: 1 }], closeError: new Error('connection reset') });
    const executor = new Neo4jGraphExecutor(driver);

    const result = await executor.write('CREATE (n:Paper)', {});

    expect(result.isErr()).toBe(true);
    expect(result._unsafeUnwrapErr().message).toBe('Session close failed: connection reset');
  });

  it('should keep the query error when the session also fails to close', async () => {
    const { driver } = createMockDriver({ runError: new Error('Invalid input'), closeError: new Error('connection reset') });
    const executor = new Neo4jGraphExecutor(driver);

    const result = await executor.execute('MATCH (', {});

    expect(result._unsafeUnwrapErr().message).toBe('Query failed: Invalid input');
  });

  it('should report connectivity', async () => {
    const up = createMockDriver();
    expect((await new Neo4jGraphExecutor(up.driver).verifyConnectivity()).isOk()).toBe(true);

    const down = createMockDriver({ connectError: new Error('ECONNREFUSED') });
    const result = await new Neo4jGraphExecutor(down.driver).verifyConnectivity();
    expect(result._unsafeUnwrapErr().message).toBe('Neo4j is unreachable: ECONNREFUSED');
  });

  it('should close the driver', async () => {
    const { driver, mockDriver } = createMockDriver();
    await new Neo4jGraphExecutor(driver).close();
    expect(mockDriver.close).toHaveBeenCalledTimes(1);
  });
});
