import type { ErrorHandler } from 'hono';
import { PrintLinkError, describeError } from '@printlink/core';
import { SimulatorStateError } from '../simulator';

export const errorHandler: ErrorHandler = (error, c) => {
  if (error instanceof SimulatorStateError) {
    return c.json({ error: { code: error.code, message: error.message } }, 409);
  }

  console.error('Error:', error);

  if (error instanceof PrintLinkError) {
    return c.json({ error: { code: error.code, message: error.message } }, 500);
  }

  return c.json({ error: { code: 'INTERNAL_ERROR', message: describeError(error) } }, 500);
};
