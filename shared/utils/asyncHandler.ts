import { Request, Response, NextFunction, RequestHandler } from 'express';

type AsyncRoute = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

/**
 * 封裝 Express 路由處理器，自動捕捉錯誤並傳遞給 next()
 */
export const asyncHandler = (fn: AsyncRoute): RequestHandler => (req, res, next) => {
  Promise.resolve(fn(req, res, next)).catch(next);
};
