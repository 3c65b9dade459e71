import type {
  TraceEntry,
  TraceActor,
  TraceEventType,
  TraceRefs,
} from "@intentflow/shared";

// ─── Factory ────────────────────────────────────────────

export function createTraceEntry(
  taskId: string,
  actor: TraceActor,
  eventType: TraceEventType,
  summary: string,
  refs?: TraceRefs,
): TraceEntry {
  return {
    timestamp: new Date().toISOString(),
    taskId,
    actor,
    eventType,
    summary,
    refs: refs ?? {},
  };
}
