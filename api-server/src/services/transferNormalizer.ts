/**
 * 轉帳正規化與過濾
 * 將原生資產 / 代幣兩種原始紀錄轉成統一的 TransferRecord
 */
import {
  CHAIN,
  FetchCycleOptions,
  NATIVE_SYMBOL,
  NormalizeResult,
  RawTransfer,
  RejectReason,
  TRACKED_ASSETS,
  TransferRecord
} from '../types/whale';

const TRACKED = new Set<string>(TRACKED_ASSETS);

export function isTrackedAsset(symbol: string): boolean {
  return TRACKED.has(symbol);
}

// 十進位數字（可含小數與指數），排除 0x / 0b / 0o 前綴
const DECIMAL_LITERAL = /^\+?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * 解析數量；僅接受有限且非負的十進位數值
 */
export function parseAmount(value: unknown): number | null {
  let amount: number;
  if (typeof value === 'number') {
    amount = value;
  } else if (typeof value === 'string' && DECIMAL_LITERAL.test(value.trim())) {
    amount = Number(value.trim());
  } else {
    return null;
  }
  if (!Number.isFinite(amount) || amount < 0) return null;
  return amount;
}

/**
 * 解析 16 進位區塊號碼，缺少或格式錯誤時回傳 0
 */
export function parseBlockNumber(blockNum: unknown): number {
  if (typeof blockNum !== 'string' || !/^0x[0-9a-f]+$/i.test(blockNum)) return 0;
  const parsed = parseInt(blockNum.slice(2), 16);
  return Number.isSafeInteger(parsed) ? parsed : 0;
}

const textField = (value: unknown): string => (typeof value === 'string' ? value : '');

export function resolveAssetSymbol(raw: RawTransfer): { symbol: string; contract: string | null } {
  const rawContract = raw.rawContract;
  const address = typeof rawContract === 'object' && rawContract !== null && 'address' in rawContract
    ? rawContract.address
    : undefined;
  const contract = textField(address) || null;
  if (!contract) {
    return { symbol: NATIVE_SYMBOL, contract: null };
  }
  const asset = typeof raw.asset === 'string' && raw.asset ? raw.asset : 'UNKNOWN';
  return { symbol: asset.toUpperCase(), contract };
}

export function normalizeTransfer(
  raw: RawTransfer,
  minAmount: number,
  observedAt: Date = new Date()
): NormalizeResult {
  const value = raw.value;
  if (value === undefined || value === null || value === '') {
    return { accepted: false, reason: 'missing_value' };
  }

  const amount = parseAmount(value);
  if (amount === null) {
    return { accepted: false, reason: 'invalid_amount' };
  }

  // 零額轉帳視同缺值，門檻為 0 時也不會放行
  if (amount === 0) {
    return { accepted: false, reason: 'missing_value' };
  }

  if (amount < minAmount) {
    return { accepted: false, reason: 'below_threshold' };
  }

  const { symbol, contract } = resolveAssetSymbol(raw);
  if (!isTrackedAsset(symbol)) {
    return { accepted: false, reason: 'untracked_asset' };
  }

  const record: TransferRecord = Object.freeze({
    txHash: textField(raw.hash),
    fromAddress: textField(raw.from),
    toAddress: textField(raw.to),
    assetSymbol: symbol,
    assetContract: contract,
    amount,
    blockNumber: parseBlockNumber(raw.blockNum),
    chain: CHAIN,
    observedAt,
  });

  return { accepted: true, record };
}

export interface PipelineResult {
  records: TransferRecord[];
  rejected: Record<RejectReason, number>;
}

/**
 * 一次抓取週期的完整流程：正規化 → 依區塊號碼遞減排序（穩定）→ 截斷
 */
export function runPipeline(
  raws: readonly RawTransfer[],
  options: FetchCycleOptions,
  observedAt: Date = new Date()
): PipelineResult {
  const rejected: Record<RejectReason, number> = {
    missing_value: 0,
    invalid_amount: 0,
    below_threshold: 0,
    untracked_asset: 0,
  };
  const accepted: TransferRecord[] = [];

  for (const raw of raws) {
    const result = normalizeTransfer(raw, options.minAmount, observedAt);
    if (result.accepted) {
      accepted.push(result.record);
    } else {
      rejected[result.reason] += 1;
    }
  }

  // Array.prototype.sort 為穩定排序，同區塊維持輸入順序
  accepted.sort((a, b) => b.blockNumber - a.blockNumber);

  return {
    records: accepted.slice(0, Math.max(0, options.limit)),
    rejected,
  };
}
