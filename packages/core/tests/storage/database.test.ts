import { describe, it, expect } from 'vitest'
import { openDatabase, runMigrations, LATEST_SCHEMA_VERSION } from '../../src/storage/index.js'

describe('openDatabase', () => {
  it('creates the vector store tables', () => {
    const db = openDatabase(':memory:')

    const tables = db
      .prepare("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name")
      .all() as { name: string }[]

    expect(tables.map((t) => t.name)).toEqual(['chunk_sources', 'chunks', 'schema_version'])

    db.close()
  })

  it('enables WAL mode (on file-based DBs; in-memory falls back to "memory")', () => {
    const db = openDatabase(':memory:')
    const result = db.pragma('journal_mode') as { journal_mode: string }[]
    expect(result[0]?.journal_mode).toBe('memory')
    db.close()
  })

  it('enables foreign keys', () => {
    const db = openDatabase(':memory:')
    const result = db.pragma('foreign_keys') as { foreign_keys: number }[]
    expect(result[0]?.foreign_keys).toBe(1)
    db.close()
  })

  it('records the schema version once', () => {
    const db = openDatabase(':memory:')
    runMigrations(db)

    const rows = db.prepare('SELECT version FROM schema_version').all() as { version: number }[]
    expect(rows.map((r) => r.version)).toEqual([LATEST_SCHEMA_VERSION])
    db.close()
  })
})
