import { describe, it, expect } from 'vitest'
import { PairState } from '../types/index.js'
import { makeDevice } from '../test/fixtures.js'
import { DeviceCache } from './deviceCache.js'

describe('DeviceCache', () => {
  it('overwrites a record by id', () => {
    const cache = new DeviceCache()
    cache.upsert(makeDevice('a'))
    cache.upsert(makeDevice('a', { name: 'Renamed', pairState: PairState.Paired }))

    expect(cache.size).toBe(1)
    expect(cache.get('a')?.name).toBe('Renamed')
    expect(cache.get('a')?.pairState).toBe(PairState.Paired)
  })

  it('hands out copies', () => {
    const cache = new DeviceCache()
    const device = makeDevice('a')
    cache.upsert(device)
    device.name = 'changed after upsert'

    const read = cache.get('a')
    expect(read?.name).toBe('Device a')
    if (read) {
      read.capabilities.sms = false
      read.name = 'changed after get'
    }
    expect(cache.get('a')?.capabilities.sms).toBe(true)
    expect(cache.getAll().map((d) => d.name)).toEqual(['Device a'])
  })

  it('removes records and reports whether one existed', () => {
    const cache = new DeviceCache()
    cache.upsert(makeDevice('a'))

    expect(cache.remove('a')).toBe(true)
    expect(cache.remove('a')).toBe(false)
    expect(cache.has('a')).toBe(false)
    expect(cache.get('a')).toBeUndefined()
  })
})
