import { describe, it, expect, beforeEach } from 'vitest'
import { UtxoCache } from './utxoCache'
import { FakeBlockchainProvider } from '../../test/fakes'
import { createMockUtxo } from '../../test/factories'
import { NetworkError } from '../../services/errors'

describe('UtxoCache', () => {
  let provider: FakeBlockchainProvider
  let now: number
  let cache: UtxoCache

  beforeEach(() => {
    provider = new FakeBlockchainProvider()
    provider.utxos = [createMockUtxo({ value: 70000 })]
    now = 1_000_000
    cache = new UtxoCache(provider, () => now)
  })

  it('should fetch on first use', async () => {
    const utxos = await cache.fetch('addr', 60000)

    expect(utxos).toEqual(provider.utxos)
    expect(provider.fetchUnspentOutputs).toHaveBeenCalledWith('addr')
    expect(cache.peek()).toEqual({ address: 'addr', utxos: provider.utxos, timestamp: 1_000_000 })
  })

  it('should serve a fresh entry from the cache', async () => {
    await cache.fetch('addr', 60000)
    now += 59_999
    await cache.fetch('addr', 60000)

    expect(provider.fetchUnspentOutputs).toHaveBeenCalledTimes(1)
  })

  it('should refetch once the entry reaches its maximum age', async () => {
    await cache.fetch('addr', 60000)
    now += 60_000
    provider.utxos = []

    expect(await cache.fetch('addr', 60000)).toEqual([])
    expect(provider.fetchUnspentOutputs).toHaveBeenCalledTimes(2)
    expect(cache.peek()?.timestamp).toBe(1_060_000)
  })

  it('should always refetch with a maximum age of zero', async () => {
    await cache.fetch('addr', 0)
    await cache.fetch('addr', 0)

    expect(provider.fetchUnspentOutputs).toHaveBeenCalledTimes(2)
  })

  it('should not serve one address from another address entry', async () => {
    await cache.fetch('addr', 60000)
    await cache.fetch('other', 60000)

    expect(provider.fetchUnspentOutputs).toHaveBeenCalledTimes(2)
    expect(cache.peek()?.address).toBe('other')
  })

  it('should hand out copies of the cached list', async () => {
    const first = await cache.fetch('addr', 60000)
    first.pop()

    expect(await cache.fetch('addr', 60000)).toHaveLength(1)
  })

  it('should propagate provider errors and keep the previous entry', async () => {
    await cache.fetch('addr', 60000)
    provider.failNextFetch(new NetworkError('down'))

    await expect(cache.fetch('addr', 0)).rejects.toThrow(NetworkError)
    expect(cache.peek()?.timestamp).toBe(1_000_000)
  })

  it('should forget the entry on clear', async () => {
    await cache.fetch('addr', 60000)
    cache.clear()

    expect(cache.peek()).toBeNull()
    await cache.fetch('addr', 60000)
    expect(provider.fetchUnspentOutputs).toHaveBeenCalledTimes(2)
  })
})
