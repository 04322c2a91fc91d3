import { getDatabaseClient, isDatabaseEnabledForEnv } from './client.ts'
import { getDatabaseConfig } from './config.ts'

export interface DatabaseHealthStatus {
  isHealthy: boolean
  message: string
  keyspaceExists?: boolean
}

export const checkDatabaseHealth = async (): Promise<DatabaseHealthStatus> => {
  if (!isDatabaseEnabledForEnv()) {
    return {
      isHealthy: true,
      message: 'Database disabled for this environment',
    }
  }

  try {
    const client = getDatabaseClient()
    const result = await client.execute(
      'SELECT keyspace_name FROM system_schema.keyspaces WHERE keyspace_name = ?',
      [getDatabaseConfig().keyspace],
      { prepare: true },
    )
    return {
      isHealthy: true,
      message: 'Database connection is healthy',
      keyspaceExists: result.rows.length > 0,
    }
  } catch (error) {
    return {
      isHealthy: false,
      message:
        error instanceof Error ? error.message : 'Database health check failed',
    }
  }
}
