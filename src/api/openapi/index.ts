import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import swaggerUi from 'swagger-ui-express';
import YAML from 'yaml';
import { z } from 'zod';
import type { Express } from 'express';

const documentSchema = z
  .object({
    openapi: z.string().startsWith('3.'),
    info: z.object({ title: z.string(), version: z.string() }).passthrough(),
    paths: z.record(z.record(z.unknown())),
  })
  .passthrough();

export type OpenAPIDocument = z.infer<typeof documentSchema>;

let cached: OpenAPIDocument | null = null;

/** Reads spec.yaml beside this module; a malformed document fails at startup rather than on /docs. */
export function loadOpenAPIDocument(): OpenAPIDocument {
  if (cached) return cached;
  const raw: unknown = YAML.parse(readFileSync(fileURLToPath(new URL('./spec.yaml', import.meta.url)), 'utf-8'));
  cached = documentSchema.parse(raw);
  return cached;
}

export function setupOpenAPI(app: Express): void {
  const document = loadOpenAPIDocument();

  app.use(
    '/docs',
    swaggerUi.serve,
    swaggerUi.setup(document, { customSiteTitle: `${document.info.title} ${document.info.version}` }),
  );
  app.get('/openapi.json', (_req, res) => {
    res.json(document);
  });
}
