import { Hono } from 'hono';
import { VERSION } from '@servefs/files';

export const healthRouter = new Hono();

healthRouter.get('/health', (c) => {
  return c.json({
    status: 'ok',
    version: VERSION,
  });
});
