/**
 * LanceDB Vector Store
 *
 * Persists vendor embeddings in a LanceDB table under the data directory.
 * The table is created on the first write, which fixes its vector
 * dimension; later writes of another dimension are rejected before they
 * reach the table.
 *
 * @module storage/lance
 */

import * as lancedb from '@lancedb/lancedb';
import type { Connection, Table } from '@lancedb/lancedb';
import { mkdir } from 'node:fs/promises';
import { ServiceError, TransientServiceError } from '../errors/index.js';
import type { EmbeddingRecord, RecordFilter } from '../vendors/types.js';
import {
  mergeCategories,
  recordToRow,
  rowToRecord,
  validateRecord,
  type VectorStore,
} from './vector-store.js';

export const VENDOR_TABLE = 'vendor_embeddings';

/**
 * Quote a string literal for a LanceDB SQL predicate.
 */
export function sqlString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export interface LanceVectorStoreOptions {
  /** Directory holding the database */
  path: string;
  dimensions: number;
  tableName?: string;
}

export class LanceVectorStore implements VectorStore {
  readonly dimensions: number;
  readonly path: string;
  readonly tableName: string;

  private connection: Connection | null = null;
  private table: Table | null = null;

  constructor(options: LanceVectorStoreOptions) {
    this.path = options.path;
    this.dimensions = options.dimensions;
    this.tableName = options.tableName ?? VENDOR_TABLE;
  }

  async upsert(record: EmbeddingRecord): Promise<void> {
    validateRecord(record, this.dimensions);

    await this.guard('upsert', async () => {
      const table = await this.openTable();
      if (!table) {
        const conn = await this.connect();
        this.table = await conn.createTable(this.tableName, [{ ...recordToRow(record) }]);
        return;
      }

      const [previous] = await this.select(table, [record.id]);
      const merged: EmbeddingRecord = {
        ...record,
        metadata: mergeCategories(previous?.metadata, record.metadata),
      };
      await table.delete(`id = ${sqlString(record.id)}`);
      await table.add([{ ...recordToRow(merged) }]);
    });
  }

  async fetchAll(filter: RecordFilter = {}): Promise<EmbeddingRecord[]> {
    if (filter.ids && filter.ids.length === 0) {
      return [];
    }
    return this.guard('fetchAll', async () => {
      const table = await this.openTable();
      return table ? this.select(table, filter.ids) : [];
    });
  }

  async count(): Promise<number> {
    return this.guard('count', async () => {
      const table = await this.openTable();
      return table ? table.countRows() : 0;
    });
  }

  async close(): Promise<void> {
    this.table?.close();
    this.connection?.close();
    this.table = null;
    this.connection = null;
  }

  private async connect(): Promise<Connection> {
    if (!this.connection) {
      await mkdir(this.path, { recursive: true });
      this.connection = await lancedb.connect(this.path);
    }
    return this.connection;
  }

  private async openTable(): Promise<Table | null> {
    if (this.table) {
      return this.table;
    }
    const conn = await this.connect();
    const names = await conn.tableNames();
    if (!names.includes(this.tableName)) {
      return null;
    }
    this.table = await conn.openTable(this.tableName);
    return this.table;
  }

  private async select(table: Table, ids?: readonly string[]): Promise<EmbeddingRecord[]> {
    const total = await table.countRows();
    if (total === 0) {
      return [];
    }
    // Plain queries are capped at a default limit; ask for every row.
    let query = table.query().limit(total);
    if (ids) {
      query = query.where(`id IN (${[...new Set(ids)].map(sqlString).join(', ')})`);
    }
    const rows: unknown[] = await query.toArray();
    return rows.map(rowToRecord);
  }

  /**
   * Run a store operation, reporting database failures as transient
   * `store` service errors.
   */
  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof ServiceError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new TransientServiceError(`Vector store ${operation} failed: ${message}`, 'store', undefined, {
        cause: error,
      });
    }
  }
}
