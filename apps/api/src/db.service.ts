import { Inject, Injectable, Logger, NotFoundException, OnModuleDestroy } from '@nestjs/common';
import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { APP_CONFIG, AppConfig } from './config';
import { ExecutionError, messageOf } from './errors';
import { suggestNames } from './name-suggestions';
import { createSchema } from './schema-parser';
import { ExecutionErrorCode, ExecutionResult, Schema } from './types';

const TableNameRows = z.array(z.object({ name: z.string() }));
const ColumnInfoRows = z.array(z.object({ name: z.string(), type: z.string() }));
const ResultRows = z.array(
  z.record(z.union([z.string(), z.number(), z.bigint(), z.null(), z.instanceof(Buffer)])),
);

/** Creates the demo tables (employees, products, sales) and their rows from `schema.sql` + `seed.sql`. */
export function seedDemoDatabase(db: Database.Database, dataDir: string): void {
  db.exec(fs.readFileSync(path.join(dataDir, 'schema.sql'), 'utf8'));
  db.exec(fs.readFileSync(path.join(dataDir, 'seed.sql'), 'utf8'));
}

function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

@Injectable()
export class DbService implements OnModuleDestroy {
  private readonly logger = new Logger(DbService.name);
  private readonly db: Database.Database;
  private readonly schema: Schema;

  constructor(@Inject(APP_CONFIG) config: AppConfig) {
    if (config.demoDbPath) {
      this.db = new Database(config.demoDbPath, { readonly: true, fileMustExist: true });
      this.logger.log(`Opened demo database read-only at ${config.demoDbPath}`);
    } else {
      this.db = new Database(':memory:');
      seedDemoDatabase(this.db, config.demoDataDir);
      this.logger.log(`Seeded in-memory demo database from ${config.demoDataDir}`);
    }
    this.db.pragma('query_only = ON');
    this.schema = this.introspect();
  }

  describeSchema(): Schema {
    return this.schema;
  }

  execute(sql: string): ExecutionResult {
    try {
      const stmt = this.db.prepare(sql);
      if (!stmt.reader) {
        throw new ExecutionError('Statement does not return rows', 'other');
      }
      const columns = stmt.columns().map((c) => c.name);
      const rows = ResultRows.parse(stmt.all());
      this.logger.log(`Demo query returned ${rows.length} rows`);
      return { columns, rows, rowCount: rows.length };
    } catch (error) {
      if (error instanceof ExecutionError) throw error;
      throw this.toExecutionError(error);
    }
  }

  sampleRows(table: string, limit = 5): ExecutionResult {
    const match = this.schema.tables.find((t) => t.name.toLowerCase() === table.toLowerCase());
    if (!match) {
      throw new NotFoundException(`Unknown demo table '${table}'`);
    }
    return this.execute(`SELECT * FROM ${quoteIdent(match.name)} LIMIT ${Math.max(1, Math.floor(limit))}`);
  }

  onModuleDestroy() {
    this.db.close();
    this.logger.log('Demo database closed');
  }

  private introspect(): Schema {
    const names = TableNameRows.parse(
      this.db
        .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY rowid")
        .all(),
    );
    const tables = names.map(({ name }) => ({
      name,
      columns: ColumnInfoRows.parse(this.db.pragma(`table_info(${quoteIdent(name)})`)).map((c) => ({
        name: c.name,
        type: c.type,
      })),
    }));
    return createSchema(tables, 'sample');
  }

  private toExecutionError(error: unknown): ExecutionError {
    const message = messageOf(error);
    const column = /no such column:\s*(\S+)/i.exec(message);
    if (column) {
      const known = this.schema.tables.flatMap((t) => t.columns.map((c) => c.name));
      return new ExecutionError(message, 'unknown_column', suggestNames(column[1], known));
    }
    const table = /no such table:\s*(\S+)/i.exec(message);
    if (table) {
      const known = this.schema.tables.map((t) => t.name);
      return new ExecutionError(message, 'unknown_table', suggestNames(table[1], known));
    }
    const code: ExecutionErrorCode = /syntax error|incomplete input|unrecognized token/i.test(message)
      ? 'syntax'
      : 'other';
    return new ExecutionError(message, code);
  }
}
