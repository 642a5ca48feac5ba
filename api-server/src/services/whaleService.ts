import { log } from '../utils/logger';
import { runPipeline } from './transferNormalizer';
import { SnapshotCache } from './snapshotCache';
import {
  ALL_CATEGORIES,
  FetchCycleOptions,
  RawTransfer,
  TransferProvider,
  TransferRecord
} from '../types/whale';

export interface WhaleServiceOptions {
  provider: TransferProvider;
  cache: SnapshotCache;
  maxLimit?: number;
}

export class WhaleService {
  private readonly provider: TransferProvider;
  private readonly cache: SnapshotCache;
  private readonly maxLimit: number;

  constructor(options: WhaleServiceOptions) {
    this.provider = options.provider;
    this.cache = options.cache;
    this.maxLimit = options.maxLimit ?? 1000;
  }

  /**
   * 取得最近的巨鯨轉帳
   *
   * 快照可能是以較低門檻抓取的，因此這裡再以呼叫者的 minAmount 過濾一次。
   * 永遠不因 provider 或解析錯誤而拋出，最差回傳空陣列。
   */
  async fetchWhales(limit: number, minAmount: number): Promise<TransferRecord[]> {
    if (!Number.isFinite(limit) || limit <= 0) {
      return [];
    }

    const cycle: FetchCycleOptions = {
      minAmount,
      limit: Math.min(Math.floor(limit), this.maxLimit),
    };
    const snapshot = await this.cache.getOrRefresh(cycle, (options) => this.runFetchCycle(options));
    if (!snapshot) {
      return [];
    }

    return snapshot.records
      .filter((record) => record.amount >= minAmount)
      .slice(0, limit);
  }

  /**
   * 一次抓取週期：各類別查詢 → 正規化 / 過濾 → 排序 → 截斷
   * 全部類別都失敗時回傳 null，讓快取保留舊快照
   */
  async runFetchCycle(options: FetchCycleOptions): Promise<TransferRecord[] | null> {
    const results = await this.provider.fetchRaw(ALL_CATEGORIES);

    const raws: RawTransfer[] = [];
    let succeeded = 0;
    for (const result of results) {
      if (result.ok) {
        succeeded += 1;
        raws.push(...result.transfers);
      } else {
        log.warn('Provider category unavailable', {
          category: result.category,
          reason: result.reason,
          status: result.status,
        });
      }
    }

    if (results.length > 0 && succeeded === 0) {
      return null;
    }

    const { records, rejected } = runPipeline(raws, options);
    log.debug('Whale fetch cycle complete', {
      fetched: raws.length,
      accepted: records.length,
      rejected,
      minAmount: options.minAmount,
      limit: options.limit,
    });
    return records;
  }

  getCacheState() {
    return this.cache.getState();
  }
}
