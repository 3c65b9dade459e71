import type { FastifyInstance } from "fastify";
import type { ConfirmationNotice } from "../bus/payloads.js";
import type { NotificationHub } from "../notifications/notification-hub.js";

export interface EventsRouteDeps {
  notifications: NotificationHub;
  heartbeatMs?: number;
}

export async function registerEventsRoutes(
  app: FastifyInstance,
  deps: EventsRouteDeps,
): Promise<void> {
  const { notifications } = deps;
  const heartbeatMs = deps.heartbeatMs ?? 30_000;

  // GET /notifications - Unexpired confirmation prompts
  app.get<{ Querystring: { task_id?: string } }>("/notifications", async (request, reply) => {
    return reply.send(notifications.pending(request.query.task_id));
  });

  // GET /events - SSE stream of confirmation prompts
  app.get<{ Querystring: { task_id?: string } }>("/events", async (request, reply) => {
    const taskIdFilter = request.query.task_id;

    reply.raw.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
      "X-Accel-Buffering": "no",
    });

    const write = (notice: ConfirmationNotice) => {
      if (taskIdFilter && notice.taskId !== taskIdFilter) return;
      reply.raw.write(`event: confirmation\ndata: ${JSON.stringify(notice)}\n\n`);
    };

    // Prompts raised before the client connected
    for (const notice of notifications.pending(taskIdFilter)) write(notice);
    notifications.on(write);

    const heartbeat = setInterval(() => {
      reply.raw.write(`:heartbeat\n\n`);
    }, heartbeatMs);

    request.raw.on("close", () => {
      notifications.off(write);
      clearInterval(heartbeat);
    });

    reply.hijack();
  });
}
