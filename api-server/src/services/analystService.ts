/**
 * LLM 分析服務
 * 以已抓取的巨鯨轉帳組成提示詞，交給 OpenAI 相容的 chat completions 端點
 */
import axios from 'axios';
import { Errors } from '../../../shared/errors/ErrorClassifier';
import { log } from '../utils/logger';
import { TransferRecord } from '../types/whale';
import { HttpPoster } from './alchemyClient';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface AnalystClient {
  complete(messages: ChatMessage[], temperature: number): Promise<string>;
}

export interface AssetAggregate {
  count: number;
  totalVolume: number;
  maxAmount: number;
}

export interface OpenAIChatClientOptions {
  apiKey: string;
  baseUrl?: string;
  model?: string;
  timeoutMs?: number;
  http?: HttpPoster;
}

export class OpenAIChatClient implements AnalystClient {
  private readonly url: string;
  private readonly model: string;
  private readonly http: HttpPoster;

  constructor(options: OpenAIChatClientOptions) {
    this.url = `${(options.baseUrl || 'https://api.openai.com/v1').replace(/\/+$/, '')}/chat/completions`;
    this.model = options.model || 'gpt-4.1-mini';
    this.http = options.http || axios.create({
      timeout: options.timeoutMs ?? 30000,
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${options.apiKey}`,
      },
    });
  }

  async complete(messages: ChatMessage[], temperature: number): Promise<string> {
    let data: unknown;
    try {
      const response = await this.http.post(this.url, { model: this.model, messages, temperature });
      data = response.data;
    } catch (error) {
      log.error('LLM request failed', error);
      throw Errors.Upstream('LLM request failed');
    }

    const content = extractContent(data);
    if (content === null) {
      throw Errors.Upstream('LLM returned no message content');
    }
    return content.trim();
  }
}

function extractContent(data: unknown): string | null {
  if (typeof data !== 'object' || data === null || !('choices' in data)) return null;
  const { choices } = data;
  if (!Array.isArray(choices) || choices.length === 0) return null;
  const first: unknown = choices[0];
  if (typeof first !== 'object' || first === null || !('message' in first)) return null;
  const { message } = first;
  if (typeof message !== 'object' || message === null || !('content' in message)) return null;
  return typeof message.content === 'string' ? message.content : null;
}

/**
 * 地址縮寫：0x1234...abcd
 */
export function shortenAddress(address: string): string {
  if (!address) return '';
  if (address.length <= 10) return address;
  return `${address.slice(0, 6)}...${address.slice(-4)}`;
}

export function formatTransferLine(t: TransferRecord): string {
  return `- ${t.amount} ${t.assetSymbol} from ${shortenAddress(t.fromAddress)} to ${shortenAddress(t.toAddress)} (block ${t.blockNumber})`;
}

/**
 * 依資產彙總：筆數、總量、最大單筆
 */
export function aggregateByAsset(transfers: readonly TransferRecord[]): Map<string, AssetAggregate> {
  const stats = new Map<string, AssetAggregate>();
  for (const t of transfers) {
    const current = stats.get(t.assetSymbol) || { count: 0, totalVolume: 0, maxAmount: 0 };
    stats.set(t.assetSymbol, {
      count: current.count + 1,
      totalVolume: current.totalVolume + t.amount,
      maxAmount: Math.max(current.maxAmount, t.amount),
    });
  }
  return stats;
}

const SUMMARY_SYSTEM_PROMPT =
  'You are an on-chain crypto analyst helping a user understand a whale-monitoring dashboard. ' +
  'You look at large Ethereum transfers of ETH, USDC, USDT and WBTC and answer questions about possible explanations. ' +
  'Be precise, avoid overconfidence, and mention uncertainty when you don\'t know.';

const CHAT_SYSTEM_PROMPT =
  'You are an on-chain crypto analyst. ' +
  'You look at large Ethereum transfers and answer questions about possible explanations. ' +
  'Be precise, avoid overconfidence, and mention uncertainty when you don\'t know.';

export function buildSummaryMessages(transfers: readonly TransferRecord[]): ChatMessage[] {
  const lines = transfers.map(formatTransferLine).join('\n');
  const totals = [...aggregateByAsset(transfers).entries()]
    .map(([symbol, s]) => `${symbol}: ${s.count} transfers, total ${s.totalVolume}, largest ${s.maxAmount}`)
    .join('\n');

  return [
    { role: 'system', content: SUMMARY_SYSTEM_PROMPT },
    {
      role: 'user',
      content:
        `Here are recent large transfers on Ethereum:\n\n${lines}\n\n` +
        `Per-asset totals:\n${totals}\n\n` +
        'In 3-5 sentences, explain what might be going on. ' +
        'Mention whether this looks like internal movements, exchange inflows/outflows, OTC trades, ' +
        'or accumulation by a large wallet. If you are not sure, say so.',
    },
  ];
}

export function buildChatMessages(transfers: readonly TransferRecord[], question: string): ChatMessage[] {
  const lines = transfers.map(formatTransferLine).join('\n');
  return [
    { role: 'system', content: CHAT_SYSTEM_PROMPT },
    {
      role: 'user',
      content:
        `Here are recent large transfers:\n\n${lines}\n\n` +
        `The user asks: ${question}\n\n` +
        'Answer in 3-6 sentences. Base your answer strictly on the flows above and common on-chain patterns. ' +
        'If something is speculative, say that it is only a possibility.',
    },
  ];
}

export const EMPTY_SUMMARY =
  'No recent large transfers were found, so there is nothing to analyze right now.';
export const EMPTY_CHAT_ANSWER =
  'Right now I don\'t see any large transfers, so there isn\'t enough data to answer that question.';

export class AnalystService {
  constructor(private readonly client: AnalystClient) {}

  async summarize(transfers: readonly TransferRecord[]): Promise<string> {
    if (transfers.length === 0) return EMPTY_SUMMARY;
    return this.client.complete(buildSummaryMessages(transfers), 0.4);
  }

  async answer(question: string, transfers: readonly TransferRecord[]): Promise<string> {
    if (transfers.length === 0) return EMPTY_CHAT_ANSWER;
    return this.client.complete(buildChatMessages(transfers, question), 0.5);
  }
}
