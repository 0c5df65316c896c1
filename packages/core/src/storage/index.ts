/**
 * Storage: SQLite database and migrations backing the vector store.
 */

export { openDatabase } from './database.js'
export { runMigrations, LATEST_SCHEMA_VERSION } from './migrations.js'
