/**
 * Alchemy 資產轉帳客戶端
 * 每個類別（原生 / 代幣）各發一次 alchemy_getAssetTransfers 查詢
 *
 * 失敗不拋出：回傳 { ok: false } 由呼叫端決定如何記錄
 */
import axios, { AxiosInstance } from 'axios';
import { ConfigurationError } from '../../../shared/errors/ErrorClassifier';
import {
  ALL_CATEGORIES,
  CategoryResult,
  RawTransfer,
  TransferCategory,
  TransferProvider
} from '../types/whale';

export type HttpPoster = Pick<AxiosInstance, 'post'>;

export interface AlchemyClientOptions {
  apiKey?: string;
  network?: string;
  timeoutMs?: number;
  maxCount?: number;
  http?: HttpPoster;
}

// 內部類別 → Alchemy category
const CATEGORY_MAP: Record<TransferCategory, string> = {
  native: 'external',
  token: 'erc20',
};

export function redactProviderUrl(text: string): string {
  return text.replace(/\/v2\/[a-zA-Z0-9_-]+/g, '/v2/***');
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// 僅檢查外形，欄位內容交給正規化處理
const isRawTransfer = (value: unknown): value is RawTransfer => isRecord(value);

export class AlchemyClient implements TransferProvider {
  private readonly url: string;
  private readonly maxCount: number;
  private readonly http: HttpPoster;

  constructor(options: AlchemyClientOptions) {
    if (!options.apiKey) {
      throw new ConfigurationError('ALCHEMY_API_KEY');
    }
    const network = options.network || 'eth-mainnet';
    this.url = `https://${network}.g.alchemy.com/v2/${options.apiKey}`;
    this.maxCount = options.maxCount ?? 500;
    this.http = options.http || axios.create({
      timeout: options.timeoutMs ?? 10000,
      headers: { 'Content-Type': 'application/json' },
    });
  }

  buildRequest(category: TransferCategory) {
    return {
      jsonrpc: '2.0',
      id: 1,
      method: 'alchemy_getAssetTransfers',
      params: [
        {
          fromBlock: '0x0',
          toBlock: 'latest',
          category: [CATEGORY_MAP[category]],
          withMetadata: true,
          excludeZeroValue: true,
          maxCount: `0x${this.maxCount.toString(16)}`,
          order: 'desc',
        },
      ],
    };
  }

  async fetchCategory(category: TransferCategory): Promise<CategoryResult> {
    let data: unknown;
    try {
      const response = await this.http.post(this.url, this.buildRequest(category));
      data = response.data;
    } catch (error) {
      return { category, ...describeFailure(error) };
    }

    if (!isRecord(data)) {
      return { ok: false, category, reason: 'response body is not a JSON object' };
    }
    if (isRecord(data.error)) {
      const message = typeof data.error.message === 'string' ? data.error.message : 'unknown error';
      return { ok: false, category, reason: `rpc error: ${redactProviderUrl(message)}` };
    }
    const result = data.result;
    if (!isRecord(result) || !Array.isArray(result.transfers)) {
      return { ok: false, category, reason: 'response has no result.transfers' };
    }

    const transfers = result.transfers.filter(isRawTransfer);
    return { ok: true, category, transfers };
  }

  /**
   * 各類別獨立查詢，結果依類別順序串接
   */
  async fetchRaw(categories: readonly TransferCategory[] = ALL_CATEGORIES): Promise<CategoryResult[]> {
    return Promise.all(categories.map((category) => this.fetchCategory(category)));
  }
}

function describeFailure(error: unknown): { ok: false; reason: string; status?: number } {
  if (axios.isAxiosError(error)) {
    if (error.response) {
      return {
        ok: false,
        reason: `HTTP ${error.response.status}`,
        status: error.response.status,
      };
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return { ok: false, reason: 'timeout' };
    }
    return { ok: false, reason: redactProviderUrl(error.message) };
  }
  if (error instanceof Error) {
    return { ok: false, reason: redactProviderUrl(error.message) };
  }
  return { ok: false, reason: String(error) };
}
