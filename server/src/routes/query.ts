import { Hono } from 'hono';
import type { AppDependencies } from '../lib/dependencies';
import { readJsonObject } from './request-body';

const DEFAULT_MODE = 'hybrid';

export function createQueryRoutes({ queryProxy }: AppDependencies) {
  const routes = new Hono();

  routes.post('/', async (c) => {
    const body = await readJsonObject(c);
    const { result, mode, timestamp } = await queryProxy.query(body.query, body.mode ?? DEFAULT_MODE);

    return c.json({ status: 'success', result, mode, timestamp });
  });

  return routes;
}
