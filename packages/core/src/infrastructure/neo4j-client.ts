import neo4j from 'neo4j-driver';
import type { Driver } from 'neo4j-driver';
import type { GraphConfig } from '@medgraph/schemas/src/app-config.schema.js';
import { createChildLogger } from '@medgraph/shared/src/logger.js';
import {
  AuthenticationError,
  PersistenceError,
  toError,
} from '@medgraph/shared/src/utils/errors.js';

const log = createChildLogger('infrastructure:neo4j');

const UNAUTHORIZED_CODE = 'Neo.ClientError.Security.Unauthorized';

export type CypherParams = Record<string, unknown>;
export type CypherRow = Readonly<Record<string, unknown>>;

/** Narrow query surface the graph store needs; swapped for a fake in unit tests. */
export interface CypherExecutor {
  run(query: string, params?: CypherParams): Promise<readonly CypherRow[]>;
  close(): Promise<void>;
}

function translateError(error: unknown): Error {
  if (error instanceof neo4j.Neo4jError && error.code === UNAUTHORIZED_CODE) {
    return new AuthenticationError('Neo4j rejected the configured credentials', error);
  }
  return new PersistenceError(`Neo4j query failed: ${toError(error).message}`, toError(error));
}

export function createNeo4jDriver(config: GraphConfig): Driver {
  log.info({ uri: config.uri, database: config.database }, 'Creating Neo4j driver');
  return neo4j.driver(config.uri, neo4j.auth.basic(config.user, config.password));
}

export function createNeo4jExecutor(driver: Driver, database: string): CypherExecutor {
  return {
    async run(query: string, params: CypherParams = {}): Promise<readonly CypherRow[]> {
      try {
        const result = await driver.executeQuery(query, params, { database });
        return result.records.map((record) => record.toObject());
      } catch (error) {
        throw translateError(error);
      }
    },

    async close(): Promise<void> {
      await driver.close();
      log.info('Neo4j driver closed');
    },
  };
}

/** Opens a driver and fails early when the server is unreachable or rejects the credentials. */
export async function connectNeo4j(config: GraphConfig): Promise<CypherExecutor> {
  const driver = createNeo4jDriver(config);
  try {
    await driver.verifyConnectivity({ database: config.database });
  } catch (error) {
    await driver.close();
    throw translateError(error);
  }
  return createNeo4jExecutor(driver, config.database);
}
