// Triage routes
import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { env, isProduction } from '../env.js';
import type { TriageMatcher } from '../services/triage/index.js';
import { enforceRateLimitIfEnabled, requireAuthIfEnabled } from '../security/route-guards.js';
import { AppError, formatErrorResponse } from '../utils/errors.js';

export interface TriageRouteOptions {
  matcher: TriageMatcher;
}

// Limits are read per request so they follow the live env settings
function triageRequestSchema() {
  return z.object({
    // Checks run in order: length limits apply to the trimmed text
    symptoms: z
      .string()
      .trim()
      .max(env.TRIAGE_MAX_SYMPTOM_CHARS)
      .min(env.TRIAGE_MIN_SYMPTOM_CHARS, {
        message: `Please provide a more detailed description of your symptoms (at least ${env.TRIAGE_MIN_SYMPTOM_CHARS} characters)`,
      }),
  });
}

export const triageRoutes: FastifyPluginAsync<TriageRouteOptions> = async (server, { matcher }) => {
  // POST /v1/triage - Suggest a department for a symptom description
  server.post('/triage', async (request, reply) => {
    if (!requireAuthIfEnabled(request, reply)) {
      return;
    }
    if (!enforceRateLimitIfEnabled(request, reply, {
      routeKey: 'triage',
      maxRequests: env.RATE_LIMIT_TRIAGE_PER_WINDOW,
    })) {
      return;
    }

    const parsed = triageRequestSchema().safeParse(request.body);
    if (!parsed.success) {
      const error = AppError.validationError('Invalid request body', parsed.error.issues);
      return reply.code(error.statusCode).send(formatErrorResponse(error, !isProduction()));
    }

    const trace = matcher.explain(parsed.data.symptoms);

    // Symptom text stays out of the logs
    request.log.debug({
      department: trace.suggested_department,
      confidence: trace.confidence,
      matched_keywords: trace.matched_keywords,
      elapsed_ms: trace.elapsed_ms,
    }, 'triage completed');

    return {
      suggested_department: trace.suggested_department,
      confidence: trace.confidence,
      description: trace.description,
    };
  });

  // GET /v1/triage/departments - Rule table overview for clients
  server.get('/triage/departments', async (request, reply) => {
    if (!requireAuthIfEnabled(request, reply)) {
      return;
    }

    return {
      default_department: matcher.table.defaultDepartment,
      departments: matcher.table.entries.map(entry => ({
        department: entry.department,
        keywords: entry.keywords,
      })),
    };
  });
};
