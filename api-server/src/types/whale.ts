/**
 * 巨鯨轉帳相關類型定義
 */

// 追蹤的資產白名單（原生資產 + 少量代幣）
export const TRACKED_ASSETS = ['ETH', 'USDC', 'USDT', 'WBTC'] as const;

export const NATIVE_SYMBOL = 'ETH';
export const CHAIN = 'eth' as const;

// 查詢類別：原生資產轉帳 / 代幣轉帳
export type TransferCategory = 'native' | 'token';
export const ALL_CATEGORIES: readonly TransferCategory[] = ['native', 'token'];

// Alchemy alchemy_getAssetTransfers 回傳的原始轉帳，欄位型別未經驗證
export interface RawTransfer {
  hash?: unknown;
  from?: unknown;
  to?: unknown;
  value?: unknown;
  asset?: unknown;
  blockNum?: unknown;
  category?: unknown;
  rawContract?: unknown;
}

// 正規化後的轉帳紀錄，建立後不可變
export interface TransferRecord {
  readonly txHash: string;
  readonly fromAddress: string;
  readonly toAddress: string;
  readonly assetSymbol: string;
  readonly assetContract: string | null;
  readonly amount: number;
  readonly blockNumber: number;
  readonly chain: typeof CHAIN;
  readonly observedAt: Date;
}

// 單一類別查詢結果：成功帶回原始紀錄，失敗帶原因（不拋出）
export type CategoryResult =
  | { ok: true; category: TransferCategory; transfers: RawTransfer[] }
  | { ok: false; category: TransferCategory; reason: string; status?: number };

export type RejectReason =
  | 'missing_value'
  | 'invalid_amount'
  | 'below_threshold'
  | 'untracked_asset';

export type NormalizeResult =
  | { accepted: true; record: TransferRecord }
  | { accepted: false; reason: RejectReason };

// 一次抓取週期的參數
export interface FetchCycleOptions {
  minAmount: number;
  limit: number;
}

export interface Snapshot {
  readonly records: readonly TransferRecord[];
  readonly fetchedAt: number;
}

export interface TransferProvider {
  fetchRaw(categories?: readonly TransferCategory[]): Promise<CategoryResult[]>;
}
