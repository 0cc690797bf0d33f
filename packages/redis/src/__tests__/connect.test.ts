import { beforeEach, describe, expect, it, vi } from 'vitest'

const mocks = vi.hoisted(() => {
  const connect = vi.fn()
  const instances: RedisMock[] = []

  class RedisMock {
    options: Record<string, unknown>
    connect = connect
    disconnect = vi.fn()
    quit = vi.fn().mockResolvedValue('OK')
    on = vi.fn()

    constructor(options: Record<string, unknown>) {
      this.options = { ...options }
      instances.push(this)
    }
  }

  return { connect, instances, RedisMock }
})

vi.mock('ioredis', () => ({
  Redis: mocks.RedisMock,
  default: mocks.RedisMock,
}))

import { computeRetryDelay, connectRedis, parseRedisConfig, verifyRedisConnection } from '../index.js'

describe('connectRedis', () => {
  const retryStrategy = (times: number) => times * 10

  beforeEach(() => {
    mocks.connect.mockReset()
    mocks.instances.length = 0
    vi.spyOn(console, 'info').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  it('retries failed connects and returns the first client that connects', async () => {
    mocks.connect
      .mockRejectedValueOnce(new Error('connect ECONNREFUSED'))
      .mockRejectedValueOnce(new Error('connect ECONNREFUSED'))
      .mockResolvedValueOnce(undefined)

    const client = await connectRedis({
      maxRetries: 3,
      retryDelayMs: 1,
      options: { host: 'redis.test', port: 6380, retryStrategy },
    })

    expect(mocks.connect).toHaveBeenCalledTimes(3)
    expect(mocks.instances).toHaveLength(3)
    expect(client).toBe(mocks.instances[2])
    expect(mocks.instances[0].disconnect).toHaveBeenCalledTimes(1)
    expect(mocks.instances[1].disconnect).toHaveBeenCalledTimes(1)
    expect(mocks.instances[2].disconnect).not.toHaveBeenCalled()
  })

  it('connects lazily without internal reconnects, then restores the retry strategy', async () => {
    mocks.connect.mockResolvedValueOnce(undefined)

    const client = await connectRedis({ options: { host: 'redis.test', port: 6380, retryStrategy } })

    expect(mocks.instances[0].options.lazyConnect).toBe(true)
    expect(client.options.retryStrategy).toBe(retryStrategy)
  })

  it('rethrows the last error once retries are exhausted', async () => {
    const refused = new Error('connect ECONNREFUSED')
    mocks.connect.mockRejectedValue(refused)

    await expect(
      connectRedis({ maxRetries: 2, retryDelayMs: 1, options: { host: 'redis.test', port: 6380 } })
    ).rejects.toBe(refused)

    expect(mocks.connect).toHaveBeenCalledTimes(3)
  })

  it('makes a single attempt when maxRetries is zero', async () => {
    mocks.connect.mockRejectedValue(new Error('connect ETIMEDOUT'))

    await expect(connectRedis({ maxRetries: 0, options: { host: 'redis.test' } })).rejects.toThrow(
      'connect ETIMEDOUT'
    )
    expect(mocks.connect).toHaveBeenCalledTimes(1)
  })
})

describe('verifyRedisConnection', () => {
  beforeEach(() => {
    mocks.connect.mockReset()
    mocks.instances.length = 0
    vi.spyOn(console, 'info').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  it('closes the client once connected', async () => {
    mocks.connect.mockResolvedValueOnce(undefined)

    await verifyRedisConnection({ options: { host: 'redis.test' } })

    expect(mocks.instances).toHaveLength(1)
    expect(mocks.instances[0].quit).toHaveBeenCalledTimes(1)
  })

  it('rethrows when Redis stays unreachable', async () => {
    mocks.connect.mockRejectedValue(new Error('connect ECONNREFUSED'))

    await expect(verifyRedisConnection({ maxRetries: 0, options: { host: 'redis.test' } })).rejects.toThrow(
      'connect ECONNREFUSED'
    )
    expect(mocks.instances[0].quit).not.toHaveBeenCalled()
  })
})

describe('computeRetryDelay', () => {
  it('doubles per retry and caps at 30s', () => {
    expect(computeRetryDelay(2000, 1)).toBe(2000)
    expect(computeRetryDelay(2000, 3)).toBe(8000)
    expect(computeRetryDelay(2000, 10)).toBe(30000)
  })
})

describe('parseRedisConfig', () => {
  it('reads host, port and password from REDIS_URL', () => {
    expect(parseRedisConfig({ REDIS_URL: 'redis://:test-secret@cache.internal:6390' })).toEqual({
      host: 'cache.internal',
      port: 6390,
      password: 'test-secret',
    })
  })

  it('falls back to discrete variables', () => {
    expect(parseRedisConfig({ REDIS_HOST: 'queue-host', REDIS_PORT: '6381' })).toEqual({
      host: 'queue-host',
      port: 6381,
      password: undefined,
    })
  })
})
