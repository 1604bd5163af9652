/**
 * ZOD PLUGIN
 *
 * Lets routes put zod schemas in `schema.querystring` / `schema.body` /
 * `schema.params`. The parsed (coerced, defaulted) value replaces the raw
 * input, and a failed parse reaches the error handler as a ZodError.
 */

import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { ZodTypeAny } from 'zod';

async function zodValidation(app: FastifyInstance): Promise<void> {
  app.setValidatorCompiler<ZodTypeAny>(({ schema }) => (data: unknown) => {
    const parsed = schema.safeParse(data);
    if (parsed.success) {
      return { value: parsed.data };
    }
    return { error: parsed.error };
  });
}

export const zodPlugin = fp(zodValidation, { name: 'zod-validation' });
