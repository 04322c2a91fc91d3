import type { Client } from 'cassandra-driver'
import { describeError, log, logError } from '../../plumbing/logger.ts'
import { getDatabaseClient } from '../client.ts'
import { getDatabaseConfig } from '../config.ts'
import type { Migration } from './types.ts'

export const ensureMigrationHistory = async (
  client: Client,
  keyspace: string,
): Promise<void> => {
  await client.execute(`
    CREATE KEYSPACE IF NOT EXISTS ${keyspace}
    WITH REPLICATION = {
      'class': 'SimpleStrategy',
      'replication_factor': 1
    }
  `)
  await client.execute(`
    CREATE TABLE IF NOT EXISTS ${keyspace}.migration_history (
      version TEXT PRIMARY KEY,
      name TEXT,
      applied_at TIMESTAMP,
      rolled_back_at TIMESTAMP
    )
  `)
}

export const getAppliedMigrations = async (
  client: Client,
  keyspace: string,
): Promise<string[]> => {
  // CQL has no IS NULL filter, so rolled back rows are dropped here
  const result = await client.execute(
    `SELECT version, rolled_back_at FROM ${keyspace}.migration_history`,
  )
  return result.rows
    .filter((row) => row.rolled_back_at == null)
    .map((row) => String(row.version))
}

export const recordMigration = async (
  client: Client,
  keyspace: string,
  migration: Migration,
  action: 'up' | 'down',
): Promise<void> => {
  const now = new Date()
  if (action === 'up') {
    await client.execute(
      `INSERT INTO ${keyspace}.migration_history (version, name, applied_at, rolled_back_at)
       VALUES (?, ?, ?, ?)`,
      [migration.version, migration.name, now, null],
      { prepare: true },
    )
    return
  }
  await client.execute(
    `UPDATE ${keyspace}.migration_history SET rolled_back_at = ? WHERE version = ?`,
    [now, migration.version],
    { prepare: true },
  )
}

const applyMigration = async (
  client: Client,
  keyspace: string,
  migration: Migration,
  direction: 'up' | 'down',
): Promise<void> => {
  log({
    message: direction === 'up' ? 'Running migration' : 'Rolling back migration',
    version: migration.version,
    name: migration.name,
  })
  try {
    await migration[direction](client, keyspace)
    await recordMigration(client, keyspace, migration, direction)
  } catch (error) {
    logError({
      message: 'Migration failed',
      version: migration.version,
      direction,
      ...describeError(error),
    })
    throw error
  }
}

/**
 * `up` applies every pending migration in version order; `down` rolls back
 * the most recent applied one.
 */
export const runMigrations = async (
  migrations: Migration[],
  direction: 'up' | 'down' = 'up',
  client: Client = getDatabaseClient(),
): Promise<string[]> => {
  const { keyspace } = getDatabaseConfig()
  await ensureMigrationHistory(client, keyspace)
  const applied = await getAppliedMigrations(client, keyspace)

  if (direction === 'up') {
    const pending = migrations
      .filter((m) => !applied.includes(m.version))
      .sort((a, b) => a.version.localeCompare(b.version))
    for (const migration of pending) {
      await applyMigration(client, keyspace, migration, 'up')
    }
    return pending.map((m) => m.version)
  }

  const last = migrations
    .filter((m) => applied.includes(m.version))
    .sort((a, b) => b.version.localeCompare(a.version))[0]
  if (!last) {
    log('No migrations to rollback')
    return []
  }
  await applyMigration(client, keyspace, last, 'down')
  return [last.version]
}
