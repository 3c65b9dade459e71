/** Bus topics. Every message on every topic is keyed by its correlationId (= taskId). */
export const TOPICS = {
  /** TASK_REQUEST, PLAN_PROPOSED, SECURITY_DECISION, CANCEL addressed to the orchestrator. */
  orchestratorInbox: "orchestrator.inbox",
  planningRequests: "planning.requests",
  securityRequests: "security.requests",
  executionSteps: "execution.steps",
  /** CANCEL fan-out to executors with in-flight work. */
  executionControl: "execution.control",
  stepResults: "step.results",
  memoryRequests: "memory.requests",
  memoryResults: "memory.results",
  feedback: "feedback",
  /** Confirmation prompts for the human in the loop. */
  notifications: "notifications",
} as const;

export type Topic = (typeof TOPICS)[keyof typeof TOPICS];
