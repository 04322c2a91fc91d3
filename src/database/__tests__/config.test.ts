import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { getDatabaseConfig } from '../config.ts'

const originalEnv = process.env

const SCYLLA_KEYS = [
  'SCYLLA_HOSTS',
  'SCYLLA_PORT',
  'SCYLLA_KEYSPACE',
  'SCYLLA_LOCAL_DATACENTER',
  'SCYLLA_USERNAME',
  'SCYLLA_PASSWORD',
  'SCYLLA_SSL',
  'SCYLLA_CONNECT_TIMEOUT_MS',
]

describe('getDatabaseConfig', () => {
  beforeEach(() => {
    process.env = { ...originalEnv }
    for (const key of SCYLLA_KEYS) {
      delete process.env[key]
    }
  })

  afterEach(() => {
    process.env = originalEnv
  })

  it('should point at a local node in the federated_login keyspace by default', () => {
    expect(getDatabaseConfig()).toEqual({
      hosts: ['localhost'],
      port: 9042,
      keyspace: 'federated_login',
      localDataCenter: 'datacenter1',
      username: undefined,
      password: undefined,
      isSslEnabled: false,
      connectTimeoutMs: 10_000,
    })
  })

  it('should fall back to localhost when the host list has no entries', () => {
    process.env.SCYLLA_HOSTS = ' , ,'

    expect(getDatabaseConfig().hosts).toEqual(['localhost'])
  })

  it('should drop empty entries from the host list', () => {
    process.env.SCYLLA_HOSTS = 'node-a,, node-b ,'

    expect(getDatabaseConfig().hosts).toEqual(['node-a', 'node-b'])
  })

  it('should use the default keyspace for a blank value', () => {
    process.env.SCYLLA_KEYSPACE = '   '
    process.env.SCYLLA_LOCAL_DATACENTER = ''

    const config = getDatabaseConfig()

    expect(config.keyspace).toBe('federated_login')
    expect(config.localDataCenter).toBe('datacenter1')
  })

  it('should trim credentials and treat blank ones as absent', () => {
    process.env.SCYLLA_USERNAME = '  login_service '
    process.env.SCYLLA_PASSWORD = '   '

    const config = getDatabaseConfig()

    expect(config.username).toBe('login_service')
    expect(config.password).toBeUndefined()
  })

  it('should enable SSL only for the exact value true', () => {
    process.env.SCYLLA_SSL = 'TRUE'

    expect(getDatabaseConfig().isSslEnabled).toBe(false)
  })

  it('should read the port and timeout, keeping defaults for bad numbers', () => {
    process.env.SCYLLA_PORT = '19042'
    process.env.SCYLLA_CONNECT_TIMEOUT_MS = 'soon'

    const config = getDatabaseConfig()

    expect(config.port).toBe(19042)
    expect(config.connectTimeoutMs).toBe(10_000)
  })
})
