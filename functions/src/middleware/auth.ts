import { Request, Response, NextFunction, RequestHandler } from 'express';
import * as logger from 'firebase-functions/logger';

export function createApiKeyValidator(resolveKey: () => string | undefined = () => process.env.API_KEY): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const header = req.headers['x-api-key'];
    const apiKey = typeof header === 'string' ? header : undefined;
    const validApiKey = resolveKey();

    if (!validApiKey) {
      logger.error('[api] API_KEY is not configured');
      res.status(500).json({
        error: 'Internal Server Error',
        message: 'API key not configured',
      });
      return;
    }

    if (!apiKey || apiKey !== validApiKey) {
      res.status(403).json({
        error: 'Forbidden',
        message: 'Invalid or missing API key',
      });
      return;
    }

    next();
  };
}
