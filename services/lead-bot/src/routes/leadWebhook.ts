/**
 * Заявки с формы на сайте
 *
 * POST /webhook/lead — JSON или application/x-www-form-urlencoded,
 * Authorization: Bearer <WEBHOOK_SECRET>
 */

import crypto from 'crypto';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { createLogger } from '../lib/logger.js';
import type { LeadDispatcher } from '../lib/leadDispatcher.js';
import { isValidPhoneNumber, normalizePhoneNumber } from '../lib/phoneNormalization.js';
import { createExternalSession } from '../survey/exportRecord.js';
import type { StepRegistry } from '../survey/registry.js';

const logger = createLogger({ module: 'lead-webhook-route' });

export type LeadWebhookOptions = {
  secret: string;
  registry: StepRegistry;
  dispatcher: Pick<LeadDispatcher, 'dispatch'>;
};

const optionalField = z.string().trim().max(1000).optional();

const leadSchema = z.object({
  name: z.string().trim().min(1).max(100),
  phone: z.string().trim().min(1).max(32),
  level: optionalField,
  goals: optionalField,
  format: optionalField,
  expectations: optionalField,
  schedule: optionalField,
});

type LeadPayload = z.infer<typeof leadSchema>;

/** Form field → answer key of the survey. */
const FIELD_TO_ANSWER: ReadonlyArray<[keyof LeadPayload, string]> = [
  ['name', 'name'],
  ['phone', 'phone'],
  ['level', 'level'],
  ['goals', 'goal'],
  ['format', 'format'],
  ['expectations', 'expectations'],
  ['schedule', 'start_date'],
];

function isAuthorized(header: string | undefined, secret: string): boolean {
  if (!header) return false;
  const expected = Buffer.from(`Bearer ${secret}`);
  const actual = Buffer.from(header);
  return actual.length === expected.length && crypto.timingSafeEqual(actual, expected);
}

export function toAnswers(payload: LeadPayload): Record<string, string> {
  const answers: Record<string, string> = {};
  for (const [field, key] of FIELD_TO_ANSWER) {
    const value = payload[field];
    if (value) answers[key] = value;
  }
  const phone = normalizePhoneNumber(payload.phone);
  if (isValidPhoneNumber(phone)) answers.phone = phone;
  return answers;
}

export default async function leadWebhookRoutes(app: FastifyInstance, opts: LeadWebhookOptions) {
  app.post('/webhook/lead', async (request: FastifyRequest, reply: FastifyReply) => {
    if (!isAuthorized(request.headers.authorization, opts.secret)) {
      logger.warn({ ip: request.ip }, 'Invalid webhook secret');
      return reply.status(401).send({ error: 'Unauthorized' });
    }

    const parsed = leadSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      logger.warn({ issues: parsed.error.issues.map(i => i.path.join('.')) }, 'Invalid webhook data');
      return reply.status(400).send({ error: 'Invalid data' });
    }

    try {
      const session = createExternalSession({
        userId: `web:${crypto.randomUUID().replace(/-/g, '').slice(0, 12)}`,
        answers: toAnswers(parsed.data),
      }, opts.registry);

      const result = await opts.dispatcher.dispatch(session);
      const ok = result.persisted && result.notified;

      logger.info({
        leadId: result.record.leadId,
        telegramSent: result.notified,
        sheetsSaved: result.persisted,
      }, 'Website lead processed');

      return reply.status(ok ? 200 : 500).send({
        success: ok,
        message: ok ? 'Lead successfully processed' : 'Lead processed with errors',
        telegram_sent: result.notified,
        sheets_saved: result.persisted,
      });
    } catch (err) {
      logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Error processing webhook');
      return reply.status(500).send({ error: 'Internal server error' });
    }
  });

  app.get('/webhook/health', async () => ({ status: 'healthy', service: 'webhook_handler' }));
}
