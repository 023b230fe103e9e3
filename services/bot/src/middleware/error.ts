import type { ErrorRequestHandler } from 'express';
import { AppError } from '../errors.js';
import { logger } from '../logger.js';

export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
  const status = err instanceof AppError ? err.status : 500;
  const code = err instanceof AppError ? err.code : 'INTERNAL_ERROR';
  const message = err instanceof Error ? err.message : 'internal error';
  logger.error({ err, path: req.path }, 'ops request error');
  res.status(status).json({ error: { code, message } });
};
