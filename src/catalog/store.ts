/**
 * Catalog Store
 * SQLite persistence for one catalog (services + transactions).
 *
 * Iterables returned by the list* methods read lazily from an open statement.
 * better-sqlite3 keeps the connection busy until an iteration finishes, so
 * callers that query again while walking a result must materialize it first
 * (Array.from) before issuing the next statement.
 */

import Database from "better-sqlite3";
import { existsSync, mkdirSync } from "fs";
import { dirname } from "path";
import { ConfigurationError, StorageError, UniqueConstraintError, errorMessage } from "../core/errors.js";
import { log } from "../utils/log.js";
import { CREATE_SCHEMA_DDL, DROP_SCHEMA_DDL } from "./schema.js";
import type {
  NewService,
  NewTransaction,
  Service,
  ServiceRow,
  Transaction,
  TransactionRow,
} from "./types.js";

export interface OpenCatalogOptions {
  /** Open an existing catalog for reading only (diff, dump, list) */
  readonly?: boolean;
}

// =============================================================================
// Row → Domain Mappers
// =============================================================================

function rowToService(row: ServiceRow): Service {
  return { id: row.id, name: row.name, project: row.project };
}

function rowToTransaction(row: TransactionRow): Transaction {
  return {
    id: row.id,
    number: row.number,
    methodName: row.method_name,
    arguments: row.arguments,
    returns: row.returns,
    serviceId: row.service_id,
  };
}

function sqliteCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function wrapStorageError(action: string, error: unknown): StorageError {
  if (error instanceof StorageError) {
    return error;
  }
  return new StorageError(`${action}: ${errorMessage(error)}`, sqliteCode(error), { cause: error });
}

/**
 * Wraps a statement iteration so each `for..of` re-runs the query. Errors
 * raised while opening or stepping the statement surface as StorageError.
 */
export function lazyRows<Row, T>(action: string, open: () => Iterable<Row>, map: (row: Row) => T): Iterable<T> {
  return {
    *[Symbol.iterator]() {
      try {
        for (const row of open()) {
          yield map(row);
        }
      } catch (error) {
        throw wrapStorageError(action, error);
      }
    },
  };
}

// =============================================================================
// Catalog Store
// =============================================================================

export class CatalogStore {
  private readonly db: Database.Database;
  readonly path: string;
  readonly readonly: boolean;

  private constructor(db: Database.Database, path: string, readonly: boolean) {
    this.db = db;
    this.path = path;
    this.readonly = readonly;
  }

  /**
   * Open (or create, when writable) a catalog file. ":memory:" is accepted
   * for throwaway catalogs.
   */
  static open(path: string, options: OpenCatalogOptions = {}): CatalogStore {
    const readonly = options.readonly ?? false;
    const inMemory = path === ":memory:";

    if (readonly && !inMemory && !existsSync(path)) {
      throw new ConfigurationError(`Catalog not found: ${path}`);
    }

    try {
      if (!readonly && !inMemory) {
        mkdirSync(dirname(path), { recursive: true });
      }
      const db = new Database(path, { readonly, fileMustExist: readonly && !inMemory });
      db.pragma("foreign_keys = ON");
      log.debug(`Opened catalog ${path}${readonly ? " (read-only)" : ""}`);
      return new CatalogStore(db, path, readonly);
    } catch (error) {
      throw wrapStorageError(`Failed to open catalog ${path}`, error);
    }
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
      log.debug(`Closed catalog ${this.path}`);
    }
  }

  // ---------- Schema ----------

  /**
   * Drop both tables if present and recreate them. Safe before every rebuild.
   */
  resetSchema(): void {
    this.guard("Failed to reset catalog schema", () => {
      this.db.exec(DROP_SCHEMA_DDL);
      this.db.exec(CREATE_SCHEMA_DDL);
    });
  }

  // ---------- Writes ----------

  /**
   * Insert services in one SQL transaction and return them with their ids.
   * A repeated name aborts the whole batch with UniqueConstraintError.
   */
  insertServices(services: readonly NewService[]): Service[] {
    const stmt = this.guard("Failed to prepare service insert", () =>
      this.db.prepare<[string, string | null]>("INSERT INTO services (name, project) VALUES (?, ?)")
    );

    const insertAll = this.db.transaction((batch: readonly NewService[]) => {
      const inserted: Service[] = [];
      for (const service of batch) {
        try {
          const result = stmt.run(service.name, service.project);
          inserted.push({ id: Number(result.lastInsertRowid), name: service.name, project: service.project });
        } catch (error) {
          if (sqliteCode(error) === "SQLITE_CONSTRAINT_UNIQUE") {
            throw new UniqueConstraintError(`Duplicate service name: ${service.name}`, service.name, { cause: error });
          }
          throw error;
        }
      }
      return inserted;
    });

    return this.guard("Failed to insert services", () => insertAll(services));
  }

  insertTransactions(transactions: readonly NewTransaction[]): number {
    const stmt = this.guard("Failed to prepare transaction insert", () =>
      this.db.prepare<[number, string, string, string, number]>(
        "INSERT INTO transactions (number, method_name, arguments, returns, service_id) VALUES (?, ?, ?, ?, ?)"
      )
    );

    const insertAll = this.db.transaction((batch: readonly NewTransaction[]) => {
      for (const tx of batch) {
        stmt.run(tx.number, tx.methodName, tx.arguments, tx.returns, tx.serviceId);
      }
      return batch.length;
    });

    return this.guard("Failed to insert transactions", () => insertAll(transactions));
  }

  // ---------- Reads ----------

  listServices(orderByName = false): Iterable<Service> {
    const sql = `SELECT id, name, project FROM services ORDER BY ${orderByName ? "name" : "id"}`;
    const stmt = this.guard("Failed to list services", () => this.db.prepare<[], ServiceRow>(sql));
    return lazyRows("Failed to list services", () => stmt.iterate(), rowToService);
  }

  findServiceByName(name: string): Service | null {
    const row = this.guard(`Failed to look up service ${name}`, () =>
      this.db.prepare<[string], ServiceRow>("SELECT id, name, project FROM services WHERE name = ?").get(name)
    );
    return row ? rowToService(row) : null;
  }

  /**
   * Transactions of one service. Unordered means insertion (extraction file) order.
   */
  listTransactionsForService(serviceId: number, orderByNumber = false): Iterable<Transaction> {
    const sql =
      "SELECT id, number, method_name, arguments, returns, service_id FROM transactions " +
      `WHERE service_id = ? ORDER BY ${orderByNumber ? "number, id" : "id"}`;
    const stmt = this.guard("Failed to list transactions", () => this.db.prepare<[number], TransactionRow>(sql));
    return lazyRows("Failed to list transactions", () => stmt.iterate(serviceId), rowToTransaction);
  }

  countServices(): number {
    return this.guard("Failed to count services", () =>
      this.db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM services").get()?.n ?? 0
    );
  }

  countTransactions(serviceId?: number): number {
    return this.guard("Failed to count transactions", () => {
      if (serviceId === undefined) {
        return this.db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM transactions").get()?.n ?? 0;
      }
      return (
        this.db
          .prepare<[number], { n: number }>("SELECT COUNT(*) AS n FROM transactions WHERE service_id = ?")
          .get(serviceId)?.n ?? 0
      );
    });
  }

  // ---------- Helpers ----------

  private guard<T>(action: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw wrapStorageError(action, error);
    }
  }
}

/**
 * Scoped acquisition: the handle is closed on every exit path of `fn`.
 */
export function withCatalog<T>(path: string, options: OpenCatalogOptions, fn: (store: CatalogStore) => T): T {
  const store = CatalogStore.open(path, options);
  try {
    return fn(store);
  } finally {
    store.close();
  }
}
