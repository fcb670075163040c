import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import reduct from 'reduct'
import Config from '../src/services/config'
import SessionPool from '../src/services/session-pool'
import Transports from '../src/services/transports'
import Validator from '../src/services/validator'
import VrpStore from '../src/services/vrp-store'
import StalenessExceededError from '../src/errors/staleness-exceeded-error'
import { SessionState } from '../src/rtr/session'
import { ValidationState } from '../src/types/vrp'
import { FakeCache, flush } from './helpers/fake-cache'
import { cacheResponse, endOfData, prefix, serialNotify } from './helpers/pdus'

describe('SessionPool', () => {
  let cache: FakeCache
  let pool: SessionPool
  let store: VrpStore
  let validator: Validator

  const startPool = async (opts: object) => {
    const deps = reduct()
    deps(Config).loadFromOpts(opts)
    deps(Transports).registerConnector(cache.connector)
    pool = deps(SessionPool)
    store = deps(VrpStore)
    validator = deps(Validator)
    pool.start()
    await flush()
  }

  const syncPrimary = () => cache.transportFor('primary.test').receive(
    cacheResponse(7),
    prefix('192.0.2.0/24', 24, 64496),
    endOfData(7, 42)
  )

  const syncSecondary = () => cache.transportFor('secondary.test').receive(
    cacheResponse(3),
    prefix('198.51.100.0/24', 24, 64497),
    endOfData(3, 10)
  )

  const twoCaches = {
    caches: [
      { id: 'primary', host: 'primary.test', preference: 10 },
      { id: 'secondary', host: 'secondary.test', preference: 20 }
    ]
  }

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'Date'] })
    cache = new FakeCache()
  })

  afterEach(() => {
    pool.stop()
    vi.useRealTimers()
  })

  it('is unavailable until a session synchronizes', async () => {
    await startPool(twoCaches)

    expect(store.isAvailable()).toBe(false)
    expect(() => validator.validate('192.0.2.0', 24, 64496)).toThrow(StalenessExceededError)
  })

  it('publishes the first session to synchronize', async () => {
    await startPool(twoCaches)
    syncSecondary()

    expect(store.getVersion()).toBe(1)
    expect(store.current().cacheId).toBe('secondary')
    expect(validator.validate('198.51.100.0', 24, 64497).state).toBe(ValidationState.Valid)
  })

  it('keeps the authoritative session while it stays healthy', async () => {
    await startPool(twoCaches)
    syncSecondary()
    syncPrimary()

    expect(pool.getStatus().authoritative).toBe('secondary')
    expect(store.getVersion()).toBe(1)
  })

  it('republishes deltas of the authoritative session', async () => {
    await startPool(twoCaches)
    syncPrimary()
    cache.transportFor('primary.test').receive(
      serialNotify(7, 43),
      cacheResponse(7),
      prefix('203.0.113.0/24', 24, 64499),
      endOfData(7, 43)
    )

    expect(store.getVersion()).toBe(2)
    expect(store.current().serial).toBe(43)
    expect(store.current().size).toBe(2)
  })

  it('fails over to another healthy session', async () => {
    await startPool(twoCaches)
    syncPrimary()
    syncSecondary()
    cache.transportFor('primary.test').hangUp()

    expect(pool.getStatus().authoritative).toBe('secondary')
    expect(store.getVersion()).toBe(2)
    expect(store.current().cacheId).toBe('secondary')
    expect(store.isAvailable()).toBe(true)

    vi.advanceTimersByTime(1000)
    await flush()
    cache.transportFor('primary.test').receive(cacheResponse(7), endOfData(7, 42))

    const primary = pool.getSession('primary')
    expect(primary && primary.getState()).toBe(SessionState.Established)
    expect(pool.getStatus().authoritative).toBe('secondary')
    expect(store.getVersion()).toBe(2)
  })

  it('chooses by preference, then by configuration order', async () => {
    await startPool({
      caches: [
        { id: 'c', host: 'c.test', preference: 30 },
        { id: 'b', host: 'b.test', preference: 20 },
        { id: 'a', host: 'a.test', preference: 20 }
      ]
    })
    for (const host of ['c.test', 'a.test', 'b.test']) {
      cache.transportFor(host).receive(cacheResponse(1), prefix('192.0.2.0/24', 24, 64496), endOfData(1, 1))
    }
    expect(pool.getStatus().authoritative).toBe('c')

    cache.transportFor('c.test').hangUp()

    expect(pool.getStatus().authoritative).toBe('b')
  })

  it('serves a stale snapshot up to the staleness ceiling', async () => {
    await startPool({
      caches: [{ id: 'primary', host: 'primary.test' }],
      stalenessCeiling: 60000
    })
    syncPrimary()
    cache.refuse = true
    cache.transportFor('primary.test').hangUp()

    expect(store.isAvailable()).toBe(true)
    expect(pool.getStatus().authoritative).toBe('primary')

    vi.advanceTimersByTime(59999)
    expect(store.isAvailable()).toBe(true)
    expect(validator.validate('192.0.2.0', 24, 64496).state).toBe(ValidationState.Valid)

    vi.advanceTimersByTime(1)
    expect(store.isAvailable()).toBe(false)
    expect(pool.getStatus()).toMatchObject({ available: false, authoritative: undefined, version: 1 })

    let caught: unknown
    try {
      validator.validate('192.0.2.0', 24, 64496)
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(StalenessExceededError)
    expect(caught instanceof StalenessExceededError && caught.staleness).toBe(60000)
  })

  it('becomes available again once a session resynchronizes', async () => {
    await startPool({
      caches: [{ id: 'primary', host: 'primary.test' }],
      stalenessCeiling: 60000
    })
    syncPrimary()
    cache.refuse = true
    cache.transportFor('primary.test').hangUp()
    vi.advanceTimersByTime(60000)
    expect(store.isAvailable()).toBe(false)

    cache.refuse = false
    while (cache.transports.length < 2) {
      vi.advanceTimersByTime(1000)
      await flush()
    }
    cache.last.receive(cacheResponse(7), prefix('203.0.113.0/24', 24, 64499), endOfData(7, 43))

    expect(store.isAvailable()).toBe(true)
    expect(store.getVersion()).toBe(2)
    expect(store.current().serial).toBe(43)
  })

  it('does not serve a snapshot older than the ceiling while a query is unanswered', async () => {
    await startPool({
      caches: [{ id: 'primary', host: 'primary.test' }],
      stalenessCeiling: 60000
    })
    syncPrimary()
    cache.refuse = true
    cache.transportFor('primary.test').hangUp()
    vi.advanceTimersByTime(600000)

    cache.refuse = false
    while (cache.transports.length < 2) {
      vi.advanceTimersByTime(1000)
      await flush()
    }

    const primary = pool.getSession('primary')
    expect(primary && primary.getState()).toBe(SessionState.AwaitingCacheResponse)
    expect(primary && primary.isHealthy()).toBe(true)
    expect(store.isAvailable()).toBe(false)
    expect(() => validator.validate('192.0.2.0', 24, 64496)).toThrow(StalenessExceededError)
  })

  it('withdraws a resynchronizing session once its snapshot crosses the ceiling', async () => {
    await startPool({
      caches: [{ id: 'primary', host: 'primary.test' }],
      stalenessCeiling: 60000
    })
    syncPrimary()
    cache.last.receive(serialNotify(7, 43), cacheResponse(7))

    vi.advanceTimersByTime(50000)
    cache.last.receive(prefix('203.0.113.0/24', 24, 64499))
    vi.advanceTimersByTime(9999)
    expect(store.isAvailable()).toBe(true)

    vi.advanceTimersByTime(1)
    expect(store.isAvailable()).toBe(false)
    expect(pool.getStatus().authoritative).toBeUndefined()
  })

  it('fails over when a resynchronization exceeds the sync timeout', async () => {
    await startPool(twoCaches)
    syncPrimary()
    syncSecondary()
    cache.transportFor('primary.test').receive(serialNotify(7, 43), cacheResponse(7))

    for (let i = 1; i <= 6; i++) {
      vi.advanceTimersByTime(50000)
      cache.transportFor('primary.test').receive(prefix(`10.0.${i}.0/24`, 24, 65001))
    }

    const primary = pool.getSession('primary')
    expect(primary && primary.getState()).toBe(SessionState.ReceivingDelta)
    expect(primary && primary.isHealthy()).toBe(false)
    expect(pool.getStatus().authoritative).toBe('secondary')
    expect(store.current().cacheId).toBe('secondary')
    expect(store.getVersion()).toBe(2)
  })

  it('never exposes a partly applied delta', async () => {
    await startPool(twoCaches)
    syncPrimary()
    const before = store.current()
    const transport = cache.transportFor('primary.test')
    const delta = [
      serialNotify(7, 43),
      cacheResponse(7),
      prefix('192.0.2.0/24', 24, 64496, false),
      prefix('203.0.113.0/24', 24, 64499),
      prefix('198.51.100.0/24', 24, 64499)
    ]

    for (const pdu of delta) {
      transport.receive(pdu)
      expect(store.current()).toBe(before)
      expect(validator.validate('192.0.2.0', 24, 64496).state).toBe(ValidationState.Valid)
      expect(validator.validate('203.0.113.0', 24, 64499).state).toBe(ValidationState.NotFound)
    }

    transport.receive(endOfData(7, 43))

    expect(store.getVersion()).toBe(2)
    expect(validator.validate('192.0.2.0', 24, 64496).state).toBe(ValidationState.NotFound)
    expect(validator.validate('203.0.113.0', 24, 64499).state).toBe(ValidationState.Valid)
    expect(validator.validate('198.51.100.0', 24, 64499).state).toBe(ValidationState.Valid)
    expect(Array.from(before.vrps()).map(vrp => vrp.prefix)).toEqual(['192.0.2.0'])
  })

  it('reports the authoritative session in its status', async () => {
    await startPool(twoCaches)
    syncPrimary()

    const status = pool.getStatus()
    expect(status).toMatchObject({
      available: true,
      authoritative: 'primary',
      version: 1,
      sessionId: 7,
      serial: 42,
      staleness: 0
    })
    expect(status.sessions.map(session => [session.id, session.state])).toEqual([
      ['primary', SessionState.Established],
      ['secondary', SessionState.AwaitingCacheResponse]
    ])
  })

  it('stays unavailable without any configured cache', async () => {
    await startPool({ caches: [] })

    expect(pool.getSessions()).toEqual([])
    expect(() => validator.validate('192.0.2.0', 24, 64496)).toThrow('vrp data unavailable. version=0')
  })
})
