import info from '../../package.json' with { type: 'json' }

const { name, version } = info

type LogFields = { message: string; [key: string]: unknown }

type LogLevel = 'info' | 'warn' | 'error'

const buildEntry = (
  level: LogLevel,
  message: string | LogFields,
): LogFields & { level: LogLevel; app: string; version: string } => {
  const fields = typeof message === 'string' ? { message } : message
  return {
    ...fields,
    level,
    app: name,
    version,
  }
}

export const log = (message: string | LogFields): void => {
  console.log(buildEntry('info', message))
}

export const logWarning = (message: string | LogFields): void => {
  console.warn(buildEntry('warn', message))
}

export const logError = (message: string | LogFields): void => {
  console.error(buildEntry('error', message))
}

/**
 * Flattens an error and its cause chain into something safe to log.
 */
export const describeError = (error: unknown): Record<string, unknown> => {
  if (!(error instanceof Error)) {
    return { error: String(error) }
  }
  const described: Record<string, unknown> = {
    error: error.message,
    name: error.name,
    stack: error.stack,
  }
  if (error.cause !== undefined) {
    described.cause = describeError(error.cause)
  }
  return described
}
