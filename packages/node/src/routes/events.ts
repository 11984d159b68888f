/**
 * Event query routes.
 *
 * GET /api/v1/events            — All events in global order
 * GET /api/v1/events/:streamId  — Events of one stream ("engine", "pair-<id>")
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListEventsQuerySchema, ListStreamEventsQuerySchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { formatZodErrors } from "../middleware/validate.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const queryResult = ListEventsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(queryResult.error),
        }),
        400,
      );
    }

    const { fromPosition, maxCount } = queryResult.data;
    const events = c.get("service").readAllEvents({ fromPosition, maxCount });
    return c.json({ data: events });
  });

  routes.get("/:streamId", (c) => {
    const queryResult = ListStreamEventsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(queryResult.error),
        }),
        400,
      );
    }

    const { fromVersion, maxCount } = queryResult.data;
    const events = c
      .get("service")
      .readStreamEvents(c.req.param("streamId"), { fromVersion, maxCount });
    return c.json({ data: events });
  });

  return routes;
}
