import { readFileSync } from 'fs';
import { Router } from 'express';
import swaggerUi from 'swagger-ui-express';

const OPENAPI_PATH = new URL('../../openapi.json', import.meta.url);

export type OpenApiDocument = Record<string, unknown>;

export function loadOpenApiDocument(path: URL | string = OPENAPI_PATH): OpenApiDocument {
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error(`OpenAPI document at ${path.toString()} is not a JSON object`);
  }
  return { ...parsed };
}

const REDOC_PAGE = `<!DOCTYPE html>
<html>
  <head>
    <title>LLM System with MongoDB Atlas - ReDoc</title>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
  </head>
  <body>
    <redoc spec-url="/openapi.json"></redoc>
    <script src="https://cdn.jsdelivr.net/npm/redoc@2/bundles/redoc.standalone.js"></script>
  </body>
</html>
`;

/**
 * Interactive API docs at /docs and /redoc, and the raw OpenAPI document at /openapi.json
 */
export function createDocsRoutes(document: OpenApiDocument = loadOpenApiDocument()): Router {
  const router = Router();

  router.get('/openapi.json', (_req, res) => {
    res.json(document);
  });
  router.get('/redoc', (_req, res) => {
    res.type('html').send(REDOC_PAGE);
  });
  router.use('/docs', swaggerUi.serve, swaggerUi.setup(document, { customSiteTitle: 'LLM System with MongoDB Atlas' }));

  return router;
}
