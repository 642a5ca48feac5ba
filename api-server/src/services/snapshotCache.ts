/**
 * 巨鯨轉帳快照快取（單一槽位）
 *
 * - cold：尚未有任何成功的抓取週期
 * - warm：持有一份快照與抓取時間（單調時鐘）
 *
 * 過期時由第一個呼叫者觸發重新抓取，其餘並發呼叫者共用同一個 in-flight Promise；
 * 寫入時整份快照（紀錄 + 時間戳）一次替換。
 */
import { performance } from 'perf_hooks';
import { log } from '../utils/logger';
import { FetchCycleOptions, Snapshot, TransferRecord } from '../types/whale';

export type CacheState = 'cold' | 'warm';

// 回傳 null 代表本次週期失敗（所有類別皆失敗），保留舊快照
export type SnapshotLoader = (options: FetchCycleOptions) => Promise<readonly TransferRecord[] | null>;

export interface SnapshotCacheOptions {
  ttlMs?: number;
  clock?: () => number;
}

export interface SnapshotCacheState {
  state: CacheState;
  ageMs: number | null;
  recordCount: number;
  refreshing: boolean;
}

export class SnapshotCache {
  private snapshot: Snapshot | null = null;
  private inflight: Promise<Snapshot | null> | null = null;
  private readonly ttlMs: number;
  private readonly clock: () => number;

  constructor(options: SnapshotCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? 30000;
    this.clock = options.clock || (() => performance.now());
  }

  public getState(): SnapshotCacheState {
    const current = this.snapshot;
    return {
      state: current ? 'warm' : 'cold',
      ageMs: current ? this.clock() - current.fetchedAt : null,
      recordCount: current ? current.records.length : 0,
      refreshing: this.inflight !== null,
    };
  }

  public isFresh(): boolean {
    const current = this.snapshot;
    return current !== null && this.clock() - current.fetchedAt < this.ttlMs;
  }

  /**
   * 新鮮時直接回傳快照，否則觸發（或加入進行中的）重新抓取
   */
  public async getOrRefresh(options: FetchCycleOptions, load: SnapshotLoader): Promise<Snapshot | null> {
    if (this.isFresh()) {
      return this.snapshot;
    }

    if (!this.inflight) {
      this.inflight = this.refresh(options, load).finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  private async refresh(options: FetchCycleOptions, load: SnapshotLoader): Promise<Snapshot | null> {
    let records: readonly TransferRecord[] | null;
    try {
      records = await load(options);
    } catch (error) {
      log.error('Whale snapshot refresh failed', error);
      records = null;
    }

    if (records === null) {
      if (this.snapshot) {
        log.warn('Fetch cycle failed, serving previous snapshot', {
          ageMs: Math.round(this.clock() - this.snapshot.fetchedAt),
        });
      }
      return this.snapshot;
    }

    const next: Snapshot = Object.freeze({
      records: Object.freeze([...records]),
      fetchedAt: this.clock(),
    });
    this.snapshot = next;
    return next;
  }
}
