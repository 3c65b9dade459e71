import type { FastifyInstance, FastifyReply } from "fastify";
import {
  ConfirmTaskInputSchema,
  CreateTaskInputSchema,
  FeedbackInputSchema,
  TaskListQuerySchema,
} from "@intentflow/shared";
import type { NotificationHub } from "../notifications/notification-hub.js";
import type { Orchestrator, OrchestratorError } from "../orchestrator/orchestrator.js";
import { summarizeTask } from "../orchestrator/task-view.js";

export interface TasksRouteDeps {
  orchestrator: Orchestrator;
  notifications: NotificationHub | null;
}

interface TaskParams {
  id: string;
}

const STATUS_BY_CODE: Record<OrchestratorError["code"], number> = {
  NOT_FOUND: 404,
  CONFLICT: 409,
  UNAVAILABLE: 503,
};

function sendError(reply: FastifyReply, error: OrchestratorError): FastifyReply {
  return reply.status(STATUS_BY_CODE[error.code]).send({ error: error.message, code: error.code });
}

export async function registerTasksRoutes(
  app: FastifyInstance,
  deps: TasksRouteDeps,
): Promise<void> {
  const { orchestrator, notifications } = deps;

  // POST /tasks - Submit an intent
  app.post("/tasks", async (request, reply) => {
    const parseResult = CreateTaskInputSchema.safeParse(request.body);
    if (!parseResult.success) {
      return reply.status(400).send({
        error: "Validation failed",
        details: parseResult.error.issues,
      });
    }

    const submitted = await orchestrator.submit(parseResult.data);
    if (submitted.isErr()) {
      return reply.status(500).send({ error: submitted.error.message });
    }
    return reply.status(202).send({ taskId: submitted.value.id });
  });

  // GET /tasks - List task summaries
  app.get("/tasks", async (request, reply) => {
    const parseResult = TaskListQuerySchema.safeParse(request.query);
    if (!parseResult.success) {
      return reply.status(400).send({
        error: "Validation failed",
        details: parseResult.error.issues,
      });
    }
    return reply.send(await orchestrator.list(parseResult.data));
  });

  // GET /tasks/:id - Status, plan summary, last step result
  app.get<{ Params: TaskParams }>("/tasks/:id", async (request, reply) => {
    const view = await orchestrator.view(request.params.id);
    if (view.isErr()) return sendError(reply, view.error);
    return reply.send(view.value);
  });

  // POST /tasks/:id/confirm - Spend a confirmation token
  app.post<{ Params: TaskParams }>("/tasks/:id/confirm", async (request, reply) => {
    const parseResult = ConfirmTaskInputSchema.safeParse(request.body);
    if (!parseResult.success) {
      return reply.status(400).send({
        error: "Validation failed",
        details: parseResult.error.issues,
      });
    }

    const confirmed = await orchestrator.confirm(
      request.params.id,
      parseResult.data.confirmationToken,
    );
    if (confirmed.isErr()) return sendError(reply, confirmed.error);
    return reply.send(summarizeTask(confirmed.value));
  });

  // POST /tasks/:id/cancel - Request cancellation
  app.post<{ Params: TaskParams }>("/tasks/:id/cancel", async (request, reply) => {
    const cancelled = await orchestrator.cancel(request.params.id);
    if (cancelled.isErr()) return sendError(reply, cancelled.error);
    return reply.status(202).send(summarizeTask(cancelled.value));
  });

  // POST /tasks/:id/feedback - Human rating for the learning loop
  app.post<{ Params: TaskParams }>("/tasks/:id/feedback", async (request, reply) => {
    const parseResult = FeedbackInputSchema.safeParse(request.body);
    if (!parseResult.success) {
      return reply.status(400).send({
        error: "Validation failed",
        details: parseResult.error.issues,
      });
    }

    const recorded = await orchestrator.feedback(request.params.id, parseResult.data);
    if (recorded.isErr()) return sendError(reply, recorded.error);
    return reply.status(202).send(recorded.value);
  });

  // GET /tasks/:id/audit - Audit entries with chain verification
  app.get<{ Params: TaskParams }>("/tasks/:id/audit", async (request, reply) => {
    const report = await orchestrator.auditReport(request.params.id);
    if (report.isErr()) return sendError(reply, report.error);
    return reply.send(report.value);
  });

  // GET /tasks/:id/trace - Task timeline
  app.get<{ Params: TaskParams }>("/tasks/:id/trace", async (request, reply) => {
    const traces = await orchestrator.traceOf(request.params.id);
    if (traces.isErr()) return sendError(reply, traces.error);
    return reply.send(traces.value);
  });

  // GET /tasks/:id/confirmation - Pending confirmation prompt, token included
  app.get<{ Params: TaskParams }>("/tasks/:id/confirmation", async (request, reply) => {
    const notice = notifications?.pending(request.params.id)[0];
    if (!notice) {
      return reply.status(404).send({ error: "No confirmation pending" });
    }
    return reply.send(notice);
  });
}
