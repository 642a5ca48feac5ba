import { WhaleService } from '../src/services/whaleService';
import { SnapshotCache } from '../src/services/snapshotCache';
import { formatTransferLine } from '../src/services/analystService';
import { TransferRecord } from '../src/types/whale';
import { StubProvider, nativeTransfer, tokenTransfer } from './fixtures';

const hashes = (records: TransferRecord[]) => records.map((r) => r.txHash);

describe('WhaleService.fetchWhales', () => {
  let now: number;
  let provider: StubProvider;
  let cache: SnapshotCache;
  let service: WhaleService;

  beforeEach(() => {
    now = 0;
    provider = new StubProvider({
      native: [
        nativeTransfer({ hash: '0xn1', value: '150', blockNum: '0x64' }),
        nativeTransfer({ hash: '0xn2', value: '900', blockNum: '0x66' }),
        nativeTransfer({ hash: '0xn3', value: '40', blockNum: '0x67' }),
      ],
      token: [
        tokenTransfer('USDC', '250', '0x65', { hash: '0xt1' }),
        tokenTransfer('DOGE', '99999', '0x68', { hash: '0xt2' }),
        tokenTransfer('WBTC', '600', '0x63', { hash: '0xt3' }),
      ],
    });
    cache = new SnapshotCache({ ttlMs: 30000, clock: () => now });
    service = new WhaleService({ provider, cache });
  });

  it('should return tracked transfers above the threshold newest first', async () => {
    const result = await service.fetchWhales(10, 100);

    expect(hashes(result)).toEqual(['0xn2', '0xt1', '0xn1', '0xt3']);
    expect(result.map((r) => r.blockNumber)).toEqual([102, 101, 100, 99]);
  });

  it('should not call the provider again within the TTL', async () => {
    await service.fetchWhales(10, 100);
    now += 10000;
    await service.fetchWhales(10, 100);

    expect(provider.calls).toBe(1);

    now += 20000;
    await service.fetchWhales(10, 100);
    expect(provider.calls).toBe(2);
  });

  it('should post-filter a snapshot warmed with a looser threshold', async () => {
    await service.fetchWhales(10, 0);
    const strict = await service.fetchWhales(10, 500);

    expect(provider.calls).toBe(1);
    expect(hashes(strict)).toEqual(['0xn2', '0xt3']);
  });

  it('should return a subset for a higher threshold on the same snapshot', async () => {
    const loose = await service.fetchWhales(10, 100);
    const strict = await service.fetchWhales(10, 300);

    expect(strict.length).toBeLessThanOrEqual(loose.length);
    for (const record of strict) {
      expect(loose).toContain(record);
    }
  });

  it('should never return zero-value transfers', async () => {
    provider.setResponses({ native: [nativeTransfer({ hash: '0xz', value: 0 }), nativeTransfer({ hash: '0xn1' })] });

    expect(hashes(await service.fetchWhales(10, 0))).toEqual(['0xn1']);
  });

  it('should hand out string fields whatever types the provider sent', async () => {
    provider.setResponses({ native: [nativeTransfer({ hash: { x: 1 }, from: 123456789012, value: '500' })] });

    const [record] = await service.fetchWhales(10, 100);

    expect(record.txHash).toBe('');
    expect(record.fromAddress).toBe('');
    expect(formatTransferLine(record)).toBe('- 500 ETH from  to 0xB (block 100)');
  });

  it('should respect the limit', async () => {
    await expect(service.fetchWhales(2, 100)).resolves.toHaveLength(2);
    await expect(service.fetchWhales(0, 100)).resolves.toEqual([]);
    await expect(service.fetchWhales(-3, 100)).resolves.toEqual([]);
  });

  it('should clamp the fetch-cycle limit to the configured maximum', async () => {
    const capped = new WhaleService({ provider, cache: new SnapshotCache({ clock: () => now }), maxLimit: 3 });

    const result = await capped.fetchWhales(5000, 0);

    expect(hashes(result)).toEqual(['0xn3', '0xn2', '0xt1']);
  });

  it('should keep native records when the token category fails', async () => {
    provider.setResponses({
      native: [nativeTransfer({ hash: '0xn1', value: '150' })],
      token: { fail: 'HTTP 503' },
    });

    const result = await service.fetchWhales(10, 100);

    expect(hashes(result)).toEqual(['0xn1']);
    expect(cache.getState().state).toBe('warm');
  });

  it('should warm the cache with an empty snapshot when the provider has nothing', async () => {
    provider.setResponses({ native: [], token: [] });

    await expect(service.fetchWhales(20, 100)).resolves.toEqual([]);
    expect(cache.getState()).toEqual({ state: 'warm', ageMs: 0, recordCount: 0, refreshing: false });
  });

  it('should return an empty list and stay cold when every category fails', async () => {
    provider.setResponses({ native: { fail: 'timeout' }, token: { fail: 'timeout' } });

    await expect(service.fetchWhales(20, 100)).resolves.toEqual([]);
    expect(cache.getState().state).toBe('cold');
  });

  it('should hand callers a copy of the snapshot', async () => {
    const first = await service.fetchWhales(10, 100);
    first.length = 0;

    const second = await service.fetchWhales(10, 100);
    expect(second).toHaveLength(4);
  });
});
