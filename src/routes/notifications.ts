/**
 * Notification Routes: the caller's in-app inbox.
 */

import { Hono, type MiddlewareHandler } from "hono";
import { z } from "zod";
import { getAuthContext } from "../auth/middleware.js";
import type { NotificationCenter } from "../core/notification-center.js";
import type { AppEnv } from "../middleware/context.js";
import { NotificationId } from "../types/branded.js";
import { paginationQuery, parseWith, queryBoolean } from "./shared/params.js";

const inboxQuery = z.object({
  unread_only: queryBoolean.optional(),
  ...paginationQuery,
});

export function createNotificationRouter(
  center: NotificationCenter,
  authMiddleware: MiddlewareHandler<AppEnv>
): Hono<AppEnv> {
  const router = new Hono<AppEnv>();

  router.use("/notifications/*", authMiddleware);

  router.get("/notifications/my-notifications", async (c) => {
    const { actor } = getAuthContext(c);
    const query = parseWith(inboxQuery, c.req.query());
    const inbox = await center.list(actor.id, {
      unreadOnly: query.unread_only ?? false,
      offset: query.skip,
      limit: query.limit,
    });
    return c.json({ ok: true, ...inbox });
  });

  router.get("/notifications/unread-count", async (c) => {
    const { actor } = getAuthContext(c);
    return c.json({ ok: true, unreadCount: await center.unreadCount(actor.id) });
  });

  router.put("/notifications/mark-all-read", async (c) => {
    const { actor } = getAuthContext(c);
    return c.json({ ok: true, updated: await center.markAllRead(actor.id) });
  });

  router.put("/notifications/:id/read", async (c) => {
    const { actor } = getAuthContext(c);
    const notification = await center.markRead(actor.id, NotificationId(c.req.param("id")));
    return c.json({ ok: true, notification });
  });

  router.delete("/notifications/clear-all", async (c) => {
    const { actor } = getAuthContext(c);
    return c.json({ ok: true, deleted: await center.clearAll(actor.id) });
  });

  router.delete("/notifications/:id", async (c) => {
    const { actor } = getAuthContext(c);
    const id = NotificationId(c.req.param("id"));
    await center.delete(actor.id, id);
    return c.json({ ok: true, id });
  });

  return router;
}
