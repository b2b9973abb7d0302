import type { RequestHandler } from 'express';
import { createHash, timingSafeEqual } from 'crypto';

import { UnauthorizedError } from '../../shared/errors.js';

const digest = (value: string) => createHash('sha256').update(value).digest();

/**
 * Function-level access key check. The key is accepted from the
 * `x-functions-key` header or the `code` query parameter.
 */
export const requireFunctionKey = (expectedKey: string): RequestHandler => {
  const expected = digest(expectedKey);

  return (req, _res, next) => {
    const header = req.get('x-functions-key');
    const query = typeof req.query.code === 'string' ? req.query.code : undefined;
    const provided = header ?? query;

    if (!provided || !timingSafeEqual(digest(provided), expected)) {
      next(new UnauthorizedError());
      return;
    }

    next();
  };
};
