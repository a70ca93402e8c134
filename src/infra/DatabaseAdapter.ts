import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { DatabaseError } from '../domain/errors.js';
import { SCHEMA_SQL } from './db/schema.js';
import { logger } from './logger.js';

const IN_MEMORY = ':memory:';

/**
 * SQLite database adapter
 * Repositories receive it through their constructors; nothing else touches the driver
 */
export class DatabaseAdapter {
  private db: Database.Database;

  constructor(dbPath: string) {
    try {
      if (dbPath !== IN_MEMORY) {
        mkdirSync(dirname(dbPath), { recursive: true });
      }
      this.db = new Database(dbPath);
      if (dbPath !== IN_MEMORY) {
        this.db.pragma('journal_mode = WAL');
      }
    } catch (error) {
      throw new DatabaseError('Failed to open database', { path: dbPath, error });
    }
    this.initializeSchema();
    logger.info('Database initialized', { path: dbPath });
  }

  private initializeSchema(): void {
    try {
      this.db.exec(SCHEMA_SQL);
      logger.info('Database schema initialized');
    } catch (error) {
      throw new DatabaseError('Failed to initialize database schema', { error });
    }
  }

  /**
   * Execute a query with parameters
   */
  query<T>(sql: string, params: unknown[] = []): T[] {
    try {
      const stmt = this.db.prepare(sql);
      return stmt.all(...params) as T[];
    } catch (error) {
      logger.error('Database query failed', { sql, error });
      throw new DatabaseError('Query execution failed', { sql, error });
    }
  }

  /**
   * Execute a single-row query
   */
  queryOne<T>(sql: string, params: unknown[] = []): T | null {
    try {
      const stmt = this.db.prepare(sql);
      return (stmt.get(...params) as T | undefined) ?? null;
    } catch (error) {
      logger.error('Database queryOne failed', { sql, error });
      throw new DatabaseError('QueryOne execution failed', { sql, error });
    }
  }

  /**
   * Execute an INSERT statement and return the new row id
   */
  insert(sql: string, params: unknown[] = []): number {
    try {
      const stmt = this.db.prepare(sql);
      return Number(stmt.run(...params).lastInsertRowid);
    } catch (error) {
      logger.error('Database insert failed', { sql, error });
      throw new DatabaseError('Insert failed', { sql, error });
    }
  }

  /**
   * Close database connection
   */
  close(): void {
    this.db.close();
    logger.info('Database connection closed');
  }
}
