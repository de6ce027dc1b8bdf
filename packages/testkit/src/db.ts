/**
 * SQLite fixtures
 */

import Database from "better-sqlite3";

/**
 * Create (or extend) a SQLite file by running a setup script
 */
export function seedDatabase(filePath: string, sql: string): void {
  const db = new Database(filePath);
  try {
    db.exec(sql);
  } finally {
    db.close();
  }
}

/**
 * Rows of a query, read through a fresh connection
 */
export function queryDatabase(filePath: string, sql: string): unknown[] {
  const db = new Database(filePath, { readonly: true, fileMustExist: true });
  try {
    return db.prepare(sql).all();
  } finally {
    db.close();
  }
}
