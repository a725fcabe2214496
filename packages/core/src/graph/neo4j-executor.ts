import neo4j, { type Driver } from 'neo4j-driver';
import { ok, err, type Result } from 'neverthrow';
import { GraphQueryError, type GraphExecutor } from '../types/provider.js';
import type { GraphConfig } from '../types/config.js';
import type { QueryParams } from '../types/query.js';
import type { ResultRow } from '../types/row.js';

type AccessMode = 'READ' | 'WRITE';

export interface Neo4jExecutorOptions {
  /** Target database; the server default when omitted. */
  database?: string;
}

/**
 * Convert driver values to plain JS: Integers become numbers (strings when
 * outside the safe range), lists and maps are converted element-wise.
 */
export function toPlainValue(value: unknown): unknown {
  if (neo4j.isInt(value)) {
    return neo4j.integer.inSafeRange(value) ? value.toNumber() : value.toString();
  }
  if (Array.isArray(value)) {
    return value.map(toPlainValue);
  }
  if (value !== null && typeof value === 'object' && Object.getPrototypeOf(value) === Object.prototype) {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = toPlainValue(entry);
    }
    return result;
  }
  return value;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

export class Neo4jGraphExecutor implements GraphExecutor {
  private readonly driver: Driver;
  private readonly database: string | undefined;

  constructor(driver: Driver, options: Neo4jExecutorOptions = {}) {
    this.driver = driver;
    this.database = options.database;
  }

  static fromConfig(config: GraphConfig): Neo4jGraphExecutor {
    const driver = neo4j.driver(config.uri, neo4j.auth.basic(config.username, config.password));
    return new Neo4jGraphExecutor(driver, { database: config.database });
  }

  async verifyConnectivity(): Promise<Result<void, GraphQueryError>> {
    try {
      await this.driver.verifyConnectivity();
      return ok(undefined);
    } catch (error: unknown) {
      return err(new GraphQueryError(`Neo4j is unreachable: ${describeError(error)}`));
    }
  }

  async execute(query: string, params: QueryParams): Promise<Result<ResultRow[], GraphQueryError>> {
    const result = await this.run(query, params, 'READ');
    return result.map((records) =>
      records.map((record) => {
        const row: Record<string, unknown> = {};
        for (const [key, value] of Object.entries(record)) {
          row[key] = toPlainValue(value);
        }
        return row;
      }),
    );
  }

  async write(
    statement: string,
    params: Readonly<Record<string, unknown>>,
  ): Promise<Result<void, GraphQueryError>> {
    const result = await this.run(statement, params, 'WRITE');
    return result.map(() => undefined);
  }

  async close(): Promise<void> {
    await this.driver.close();
  }

  private async run(
    statement: string,
    params: Readonly<Record<string, unknown>>,
    mode: AccessMode,
  ): Promise<Result<Array<Record<string, unknown>>, GraphQueryError>> {
    const session = this.driver.session({
      defaultAccessMode: mode,
      ...(this.database !== undefined ? { database: this.database } : {}),
    });
    let result: Result<Array<Record<string, unknown>>, GraphQueryError>;
    try {
      const queryResult = await session.run(statement, { ...params });
      result = ok(queryResult.records.map((record) => record.toObject()));
    } catch (error: unknown) {
      result = err(new GraphQueryError(`Query failed: ${describeError(error)}`));
    }

    try {
      await session.close();
    } catch (error: unknown) {
      // A query error takes precedence over the close error
      if (result.isOk()) {
        return err(new GraphQueryError(`Session close failed: ${describeError(error)}`));
      }
    }
    return result;
  }
}
