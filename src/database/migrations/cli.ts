#!/usr/bin/env node
import 'dotenv/config'
import { initializeDatabase, shutdownDatabase } from '../client.ts'
import { loadMigrations } from './loader.ts'
import { runMigrations } from './runner.ts'

const command = process.argv[2]

const main = async (): Promise<void> => {
  if (command !== 'up' && command !== 'down') {
    console.log('Usage: migrate [up|down]')
    console.log('  up     - Apply pending migrations')
    console.log('  down   - Rollback last migration')
    process.exitCode = 1
    return
  }

  try {
    // Connect without keyspace to allow migrations to create it
    await initializeDatabase({ skipKeyspace: true })
    const versions = await runMigrations(loadMigrations(), command)
    console.log(
      versions.length > 0
        ? `Migrations ${command}: ${versions.join(', ')}`
        : 'Nothing to do',
    )
  } finally {
    await shutdownDatabase()
  }
}

main().catch((error: unknown) => {
  console.error('Migration error:', error)
  process.exitCode = 1
})
