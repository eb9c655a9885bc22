/**
 * HTTP Routes
 *
 * Meetings, recordings, roster and health endpoints. Handlers stay thin:
 * validate the request, call the service registry, return JSON.
 */

import { type Context, Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { z } from 'zod';
import type { Services } from './services';

// ═══════════════════════════════════════════════════════════════════════════════
// Request Schemas
// ═══════════════════════════════════════════════════════════════════════════════

const MeetingBodySchema = z.object({
  transcript: z.string().trim().min(1, 'transcript is required'),
  meetingDate: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'meetingDate must be YYYY-MM-DD')
    .optional(),
  filename: z.string().min(1).optional()
});

const AliasBodySchema = z.object({
  member: z.string().min(1),
  alias: z.string().min(1)
});

const ListQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(200).default(20)
});

const TaskQuerySchema = ListQuerySchema.extend({
  assignee: z.string().min(1).optional()
});

/**
 * Read and validate a JSON body. Validation errors propagate as ZodError.
 */
async function readBody<T extends z.ZodType>(c: Context, schema: T): Promise<z.infer<T>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new HTTPException(400, { message: 'Request body must be valid JSON' });
  }
  return schema.parse(body);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Routes
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Create all API routes.
 *
 * Routes:
 * - POST /meetings, GET /meetings, GET /tasks
 * - GET /recordings, GET /recordings/status
 * - POST /recordings/poll, POST /recordings/:name/process, POST /recordings/cache/clear
 * - GET /roster, POST /roster/aliases
 * - GET /health
 */
export function createRoutes(services: Services): Hono {
  const app = new Hono();

  // ─────────────────────────────────────────────────────────────────────────────
  // Meetings
  // ─────────────────────────────────────────────────────────────────────────────

  app.post('/meetings', async (c) => {
    const body = await readBody(c, MeetingBodySchema);
    const result = await services.processMeeting(body);
    return c.json(result);
  });

  app.get('/meetings', async (c) => {
    const { limit } = ListQuerySchema.parse(c.req.query());
    const meetings = await services.store.listMeetings(limit);
    return c.json({ meetings });
  });

  app.get('/tasks', async (c) => {
    const { limit, assignee } = TaskQuerySchema.parse(c.req.query());
    const tasks = await services.store.listTasks({ assignee, limit });
    return c.json({ tasks });
  });

  // ─────────────────────────────────────────────────────────────────────────────
  // Recordings
  // ─────────────────────────────────────────────────────────────────────────────

  app.get('/recordings', async (c) => {
    const recordings = await services.listRecordings();
    return c.json({ recordings });
  });

  app.get('/recordings/status', async (c) => {
    return c.json(await services.guard.status());
  });

  app.post('/recordings/poll', async (c) => {
    return c.json(await services.guard.pollCycle());
  });

  app.post('/recordings/cache/clear', (c) => {
    return c.json({ cleared: services.guard.clearSettled() });
  });

  app.post('/recordings/:name/process', async (c) => {
    const name = c.req.param('name');
    const outcome = await services.processRecordingGuarded(name);

    if (!outcome) {
      throw new HTTPException(404, { message: `Recording not found: ${name}` });
    }
    if (outcome.status === 'skipped') {
      throw new HTTPException(409, { message: `Recording is already processing: ${name}` });
    }
    return c.json(outcome);
  });

  // ─────────────────────────────────────────────────────────────────────────────
  // Roster
  // ─────────────────────────────────────────────────────────────────────────────

  app.get('/roster', (c) => {
    return c.json({ members: services.roster.members, aliases: services.roster.aliases });
  });

  app.post('/roster/aliases', async (c) => {
    const { member, alias } = await readBody(c, AliasBodySchema);

    if (!services.roster.has(member)) {
      throw new HTTPException(404, { message: `Not a roster member: ${member}` });
    }
    if (!services.roster.addAlias(member, alias)) {
      throw new HTTPException(400, { message: `Alias is empty after normalization: ${alias}` });
    }
    return c.json({ member, aliases: services.roster.aliases[member] ?? [] });
  });

  // ─────────────────────────────────────────────────────────────────────────────
  // Health
  // ─────────────────────────────────────────────────────────────────────────────

  app.get('/health', async (c) => {
    const store = await services.store.healthCheck();
    return c.json({ status: 'ok', store });
  });

  return app;
}
