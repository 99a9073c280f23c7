import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import { PairState } from '../types/index.js'
import { makeDevice, silentLogger } from '../test/fixtures.js'
import { DeviceCache } from './deviceCache.js'
import { PairingDetector, RefreshScheduler, type RefreshTick } from './pairing.js'

describe('PairingDetector', () => {
  function setup() {
    const devices = new DeviceCache()
    devices.upsert(makeDevice('phone-1', { name: 'Pixel', deviceType: 'phone' }))
    return { devices, detector: new PairingDetector(devices, silentLogger()) }
  }

  it('notifies once per transition into Requested', () => {
    const { detector } = setup()

    expect(detector.onPairStateChanged('phone-1', PairState.Requested)).toEqual({
      deviceId: 'phone-1',
      deviceName: 'Pixel',
      deviceType: 'phone',
    })
    expect(detector.onPairStateChanged('phone-1', PairState.Requested)).toBeNull()

    expect(detector.onPairStateChanged('phone-1', PairState.NotPaired)).toBeNull()
    expect(detector.onPairStateChanged('phone-1', PairState.Requested)).not.toBeNull()
  })

  it('drops requests for unknown devices without arming the dedup', () => {
    const { devices, detector } = setup()

    expect(detector.onPairStateChanged('tablet-1', PairState.Requested)).toBeNull()

    devices.upsert(makeDevice('tablet-1', { name: 'Tab', deviceType: 'tablet' }))
    expect(detector.onPairStateChanged('tablet-1', PairState.Requested)).toEqual({
      deviceId: 'tablet-1',
      deviceName: 'Tab',
      deviceType: 'tablet',
    })
  })

  it('re-notifies after the device is forgotten', () => {
    const { detector } = setup()
    detector.onPairStateChanged('phone-1', PairState.Requested)
    detector.forget('phone-1')

    expect(detector.onPairStateChanged('phone-1', PairState.Requested)).not.toBeNull()
  })

  it('treats observed states like reported ones', () => {
    const { detector } = setup()
    detector.onPairStateChanged('phone-1', PairState.Requested)
    detector.observe('phone-1', PairState.Paired)

    expect(detector.onPairStateChanged('phone-1', PairState.Requested)).not.toBeNull()
  })
})

describe('RefreshScheduler', () => {
  let ticks: RefreshTick[]
  let scheduler: RefreshScheduler

  beforeEach(() => {
    vi.useFakeTimers()
    ticks = []
    scheduler = new RefreshScheduler((tick) => ticks.push(tick), {
      burstWindowMs: 10_000,
      burstIntervalMs: 500,
      pollIntervalMs: 10_000,
    })
  })

  afterEach(() => {
    scheduler.stop()
    vi.useRealTimers()
  })

  it('polls at the slow cadence when idle', () => {
    scheduler.start()

    vi.advanceTimersByTime(9_999)
    expect(ticks).toEqual([])
    vi.advanceTimersByTime(1)
    expect(ticks).toEqual(['poll'])
  })

  it('bursts for the window, then falls back to polling', () => {
    scheduler.start()
    scheduler.startBurst()
    expect(scheduler.isBursting()).toBe(true)

    vi.advanceTimersByTime(10_000)
    expect(ticks).toHaveLength(19)
    expect(ticks.every((tick) => tick === 'burst')).toBe(true)
    expect(scheduler.isBursting()).toBe(false)

    vi.advanceTimersByTime(9_999)
    expect(ticks).toHaveLength(19)
    vi.advanceTimersByTime(1)
    expect(ticks.at(-1)).toBe('poll')
    expect(ticks).toHaveLength(20)
  })

  it('restarts the window on a second burst', () => {
    scheduler.start()
    scheduler.startBurst()
    vi.advanceTimersByTime(8_000)
    scheduler.startBurst()
    vi.advanceTimersByTime(8_000)

    expect(scheduler.isBursting()).toBe(true)
    expect(ticks.every((tick) => tick === 'burst')).toBe(true)
  })

  it('stays silent after stop', () => {
    scheduler.start()
    scheduler.startBurst()
    scheduler.stop()

    vi.advanceTimersByTime(30_000)
    expect(ticks).toEqual([])
    expect(scheduler.isRunning).toBe(false)
  })
})
