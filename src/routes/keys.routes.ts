import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { KeyGenService, createGenerationConfig } from '../services/keygen.service';
import { CONTENT_TYPES, ExportService, FILE_EXTENSIONS, parseFormat } from '../services/export.service';
import { buildAlphabet } from '../utils/alphabet';
import { isKeygenError } from '../utils/errors';
import { formatIssues } from '../utils/validation';

// One request may not ask for more than this
export const MAX_WEB_KEYS = 100_000;

const generateSchema = z.object({
  count: z.number().int().min(1).max(MAX_WEB_KEYS),
  length: z.number().int().min(1).max(1024).optional(),
  pattern: z.string().max(1024).optional(),
  groupSize: z.number().int().min(0).optional(),
  separator: z.string().max(16).optional(),
  alphabet: z.string().max(1024).optional(),
  allowAmbiguous: z.boolean().optional(),
  unique: z.boolean().optional(),
  uppercase: z.boolean().optional(),
});

const exportSchema = z.object({
  keys: z.array(z.string()).max(MAX_WEB_KEYS),
  format: z.string().default('txt'),
});

export async function keyRoutes(app: FastifyInstance): Promise<void> {
  const keyGenService = KeyGenService.getInstance();
  const exportService = ExportService.getInstance();

  // Generate a batch
  app.post('/api/keys', async (request, reply) => {
    const parsed = generateSchema.safeParse(request.body || {});
    if (!parsed.success) {
      return reply.status(400).send({ error: formatIssues(parsed.error), code: 'INVALID_CONFIG' });
    }

    const body = parsed.data;
    const cfg = createGenerationConfig({
      count: body.count,
      length: body.length,
      // blank form fields mean "not set"
      pattern: body.pattern || undefined,
      alphabet: body.alphabet || undefined,
      groupSize: body.groupSize,
      separator: body.separator,
      avoidAmbiguous: body.allowAmbiguous === undefined ? undefined : !body.allowAmbiguous,
      unique: body.unique,
      uppercase: body.uppercase,
    });

    try {
      const keys = keyGenService.generateKeys(cfg);
      return {
        keys,
        count: keys.length,
        alphabet: buildAlphabet(cfg.alphabet, cfg.avoidAmbiguous),
      };
    } catch (error) {
      if (isKeygenError(error)) {
        return reply.status(400).send({ error: error.message, code: error.code });
      }
      throw error;
    }
  });

  // Download a batch as a file
  app.post('/api/keys/export', async (request, reply) => {
    const parsed = exportSchema.safeParse(request.body || {});
    if (!parsed.success) {
      return reply.status(400).send({ error: formatIssues(parsed.error), code: 'INVALID_CONFIG' });
    }

    try {
      const format = parseFormat(parsed.data.format);
      reply.header('Content-Type', CONTENT_TYPES[format]);
      reply.header('Content-Disposition', `attachment; filename="cd_keys.${FILE_EXTENSIONS[format]}"`);
      return reply.send(exportService.serialize(parsed.data.keys, format));
    } catch (error) {
      if (isKeygenError(error)) {
        return reply.status(400).send({ error: error.message, code: error.code });
      }
      throw error;
    }
  });
}
