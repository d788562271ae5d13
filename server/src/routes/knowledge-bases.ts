import { Hono } from 'hono';
import type { AppDependencies } from '../lib/dependencies';
import { readJsonObject } from './request-body';

export function createKnowledgeBaseRoutes({ knowledgeBases }: AppDependencies) {
  const routes = new Hono();

  routes.get('/', async (c) => {
    const summaries = await knowledgeBases.list();
    return c.json({
      knowledge_bases: summaries.map((summary) => ({
        name: summary.name,
        description: summary.description,
        created_time: summary.createdAt,
        file_count: summary.fileCount,
        path: summary.path,
      })),
    });
  });

  routes.post('/', async (c) => {
    const body = await readJsonObject(c);
    const created = await knowledgeBases.create(body);

    return c.json(
      {
        status: 'success',
        message: `Knowledge base '${created.name}' created`,
      },
      201
    );
  });

  return routes;
}
