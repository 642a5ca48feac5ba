import { Router } from 'express';
import { z } from 'zod';
import { WhaleService } from '../services/whaleService';
import { AnalystService } from '../services/analystService';
import { asyncHandler } from '../../../shared/utils/asyncHandler';
import { clampLimit, parseThreshold } from '../../../shared/utils/limits';
import { Errors } from '../../../shared/errors/ErrorClassifier';

export interface AlertRouteDeps {
  whales: WhaleService;
  analyst: AnalystService | null;
  maxLimit: number;
}

const DEFAULT_MIN_AMOUNT = 100;

const ChatBodySchema = z.object({
  question: z.string().trim().min(1, 'question is required'),
});

export const createAlertRoutes = ({ whales, analyst, maxLimit }: AlertRouteDeps) => {
  const router = Router();

  const readMinAmount = (raw: unknown): number => {
    const minAmount = parseThreshold(raw, DEFAULT_MIN_AMOUNT);
    if (minAmount === null) {
      throw Errors.BadRequest('min_amount must be a non-negative number');
    }
    return minAmount;
  };

  const requireAnalyst = (): AnalystService => {
    if (!analyst) {
      throw Errors.ServiceUnavailable('LLM commentary is not configured');
    }
    return analyst;
  };

  // GET /api/alerts/latest - 最近的巨鯨轉帳
  router.get('/latest', asyncHandler(async (req, res) => {
    const limit = clampLimit(req.query.limit, { defaultValue: 200, min: 0, max: maxLimit });
    const minAmount = readMinAmount(req.query.min_amount);

    const transfers = await whales.fetchWhales(limit, minAmount);
    const summary = transfers.length === 0
      ? 'No whale transfers found (or provider returned nothing).'
      : `Showing up to ${transfers.length} large transfers (filtering by amount >= ${minAmount}).`;

    res.json({ data: { transfers, count: transfers.length, summary } });
  }));

  // GET /api/alerts/summary - LLM 摘要
  router.get('/summary', asyncHandler(async (req, res) => {
    const service = requireAnalyst();
    const limit = clampLimit(req.query.limit, { defaultValue: 20, min: 0, max: maxLimit });
    const minAmount = readMinAmount(req.query.min_amount);

    const transfers = await whales.fetchWhales(limit, minAmount);
    const summary = await service.summarize(transfers);
    res.json({ data: { summary, transferCount: transfers.length } });
  }));

  // POST /api/alerts/chat - 針對目前資金流向提問
  router.post('/chat', asyncHandler(async (req, res) => {
    const service = requireAnalyst();
    const body = ChatBodySchema.safeParse(req.body);
    if (!body.success) {
      throw Errors.BadRequest('Invalid chat request', body.error.flatten().fieldErrors);
    }
    const limit = clampLimit(req.query.limit, { defaultValue: 20, min: 0, max: maxLimit });
    const minAmount = readMinAmount(req.query.min_amount);

    const transfers = await whales.fetchWhales(limit, minAmount);
    const answer = await service.answer(body.data.question, transfers);
    res.json({ data: { answer, transferCount: transfers.length } });
  }));

  return router;
};
