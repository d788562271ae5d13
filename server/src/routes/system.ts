import { Hono } from 'hono';
import { toErrorMessage } from '../lib/errors';
import type { AppDependencies } from '../lib/dependencies';

const SERVICE_NAME = 'ragdesk-server';

export function createSystemRoutes({ rag, knowledgeBases, files }: AppDependencies) {
  const routes = new Hono();

  routes.get('/health', async (c) => {
    try {
      const [ragHealth, knowledgeBaseList, fileList] = await Promise.all([
        rag.health(),
        knowledgeBases.list(),
        files.list(),
      ]);

      return c.json({
        status: 'healthy',
        service: SERVICE_NAME,
        rag_service: {
          healthy: ragHealth.healthy,
          info: ragHealth.info,
          url: rag.baseUrl,
        },
        knowledge_bases: knowledgeBaseList.length,
        total_files: fileList.length,
      });
    } catch (error) {
      console.error('[api] health check failed:', error);
      return c.json({ status: 'error', service: SERVICE_NAME, error: toErrorMessage(error) });
    }
  });

  routes.get('/api/rag-service-status', async (c) => {
    const diagnostics = await rag.diagnose();
    const testResults = Object.fromEntries(
      diagnostics.results.map(({ name, ...result }) => [name, result] as const)
    );
    const successful = diagnostics.results.filter((result) => result.success).length;

    return c.json({
      rag_service_url: diagnostics.url,
      test_results: testResults,
      summary: {
        total_tests: diagnostics.results.length,
        successful_tests: successful,
        all_tests_passed: successful === diagnostics.results.length,
      },
    });
  });

  return routes;
}
