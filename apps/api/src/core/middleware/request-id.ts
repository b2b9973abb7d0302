import type { RequestHandler } from 'express';
import { randomUUID } from 'crypto';

const REQUEST_ID_HEADER = 'x-request-id';

// Reuses the caller's request id when one is sent, so platform logs line up.
export const requestId: RequestHandler = (req, res, next) => {
  const id = req.get(REQUEST_ID_HEADER)?.trim() || randomUUID();
  req.id = id;
  res.setHeader(REQUEST_ID_HEADER, id);
  next();
};
