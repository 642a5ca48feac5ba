import {
  ALL_CATEGORIES,
  CategoryResult,
  RawTransfer,
  TransferCategory,
  TransferProvider
} from '../src/types/whale';

export const nativeTransfer = (overrides: Partial<RawTransfer> = {}): RawTransfer => ({
  hash: '0x1',
  from: '0xA',
  to: '0xB',
  value: '150',
  asset: 'ETH',
  blockNum: '0x64',
  category: 'external',
  rawContract: { address: null, value: null, decimal: '0x12' },
  ...overrides,
});

export const tokenTransfer = (
  asset: string,
  value: number | string,
  blockNum: string,
  overrides: Partial<RawTransfer> = {}
): RawTransfer => ({
  hash: `0x${asset.toLowerCase()}${blockNum}`,
  from: '0x1111111111111111111111111111111111111111',
  to: '0x2222222222222222222222222222222222222222',
  value,
  asset,
  blockNum,
  category: 'erc20',
  rawContract: { address: '0xC', value: null, decimal: '0x6' },
  ...overrides,
});

type CategoryResponse = RawTransfer[] | { fail: string };

/**
 * 可設定各類別回應並記錄呼叫次數的 provider
 */
export class StubProvider implements TransferProvider {
  public calls = 0;

  constructor(private responses: Partial<Record<TransferCategory, CategoryResponse>> = {}) {}

  setResponses(responses: Partial<Record<TransferCategory, CategoryResponse>>) {
    this.responses = responses;
  }

  async fetchRaw(categories: readonly TransferCategory[] = ALL_CATEGORIES): Promise<CategoryResult[]> {
    this.calls += 1;
    return categories.map((category): CategoryResult => {
      const response = this.responses[category] ?? [];
      if (Array.isArray(response)) {
        return { ok: true, category, transfers: response };
      }
      return { ok: false, category, reason: response.fail };
    });
  }
}
