import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type { BaseSQLiteDatabase } from 'drizzle-orm/sqlite-core';
import { mkdirSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';

import * as schema from './schema';

export type Schema = typeof schema;

/** Either the root database handle or an open transaction. */
export type Executor = BaseSQLiteDatabase<'sync', Database.RunResult, Schema>;

const SCHEMA_FILE = resolve(__dirname, '../../db/schema.sql');

@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private readonly sqlite: Database.Database;
  readonly db: BetterSQLite3Database<Schema>;

  constructor(private readonly path: string) {
    if (path !== ':memory:') {
      mkdirSync(dirname(path), { recursive: true });
    }

    this.sqlite = new Database(path);
    this.sqlite.pragma('journal_mode = WAL');
    this.sqlite.pragma('foreign_keys = ON');
    this.db = drizzle(this.sqlite, { schema });
  }

  onModuleInit() {
    this.migrate();
    this.logger.log(`Database ready at ${this.path}`);
  }

  onModuleDestroy() {
    this.sqlite.close();
    this.logger.log('Database connection closed');
  }

  migrate(): void {
    this.sqlite.exec(readFileSync(SCHEMA_FILE, 'utf8'));
  }

  /**
   * Runs `work` in a single transaction. Anything thrown inside rolls the
   * whole unit back and is rethrown to the caller.
   */
  transaction<T>(work: (tx: Executor) => T): T {
    return this.db.transaction((tx) => work(tx));
  }
}
