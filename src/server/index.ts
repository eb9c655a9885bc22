/**
 * Server Module
 *
 * Creates and configures the Hono application.
 * Composition root that wires the routes to a service registry.
 */

import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { z } from 'zod';
import { errorMessage } from '@/providers/errors';
import { createRoutes } from './routes';
import type { Services } from './services';

/**
 * Render validation issues as `path: message`, joined.
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      if (issue.path.length === 0) return issue.message;
      return `${issue.path.join('.')}: ${issue.message}`;
    })
    .join('; ');
}

/**
 * Create the application. Every error leaves as JSON `{ error }`.
 */
export function createApp(services: Services): Hono {
  const app = new Hono();

  app.route('/', createRoutes(services));

  app.notFound((c) => c.json({ error: `Not found: ${c.req.method} ${c.req.path}` }, 404));

  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return c.json({ error: err.message }, err.status);
    }
    if (err instanceof z.ZodError) {
      return c.json({ error: formatZodError(err) }, 400);
    }
    console.error(`${c.req.method} ${c.req.path} failed: ${errorMessage(err)}`);
    return c.json({ error: 'Internal server error' }, 500);
  });

  return app;
}

export { createServices, type ServiceOverrides, Services } from './services';
