export const INTENT_TYPES = [
  "code_generation",
  "code_review",
  "refactoring",
  "infrastructure_setup",
  "testing",
  "deployment",
  "documentation",
  "debugging",
  "security_scan",
  "explanation",
  "project_setup",
] as const;

export type IntentType = (typeof INTENT_TYPES)[number];

export const CAPABILITY_TYPES = [
  "code",
  "infrastructure",
  "testing",
  "devops",
  "documentation",
  "security",
  "planning",
  "review",
] as const;

export type CapabilityType = (typeof CAPABILITY_TYPES)[number];

export const PRIORITIES = ["low", "medium", "high", "critical"] as const;

export type Priority = (typeof PRIORITIES)[number];

export const PRIORITY_RANK: Readonly<Record<Priority, number>> = {
  low: 1,
  medium: 5,
  high: 8,
  critical: 10,
};

export const TASK_STATUSES = ["pending", "in_progress", "completed", "failed", "cancelled"] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

export type TerminalStatus = Extract<TaskStatus, "completed" | "failed" | "cancelled">;

export function isTerminal(status: TaskStatus): status is TerminalStatus {
  return status === "completed" || status === "failed" || status === "cancelled";
}

export type ExecutionContext = {
  sessionId: string;
  userId: string;
  projectId: string;
  workspacePath: string;
  environment: string;
  language?: string;
  framework?: string;
  metadata: Record<string, unknown>;
};

export type TaskRequest = {
  id: string;
  intent: IntentType;
  description: string;
  context: ExecutionContext;
  parameters: Record<string, unknown>;
  priority: Priority;
  /** 1..3600 */
  timeoutSeconds: number;
  maxRetries: number;
  parentTaskId?: string;
  createdAt: number;
};

export type CapabilityDescriptor = {
  name: string;
  description: string;
  requiredInputs: string[];
  outputs: string[];
  estimatedDurationSeconds: number;
};

export type ExecutionStep = {
  id: string;
  capability: CapabilityType;
  request: TaskRequest;
  dependencies: string[];
  status: TaskStatus;
  retryCount: number;
  maxRetries: number;
  estimatedDurationSeconds: number;
  mandatory: boolean;
  workerName?: string;
  startedAt?: number;
  completedAt?: number;
  error?: string;
};

export type ExecutionPlan = {
  id: string;
  request: TaskRequest;
  steps: ExecutionStep[];
  /** Sum along the critical path, not the flat sum of steps. */
  estimatedDurationSeconds: number;
  status: TaskStatus;
  createdAt: number;
  startedAt?: number;
  completedAt?: number;
};

export type ResourceUsage = {
  tokensUsed: number;
  cost: number;
};

export type TaskResult = {
  readonly taskId: string;
  readonly stepId: string;
  readonly capability: CapabilityType;
  readonly workerName?: string;
  readonly status: TaskStatus;
  readonly result?: Readonly<Record<string, unknown>>;
  readonly error?: string;
  readonly errorCode?: string;
  readonly executionTimeMs: number;
  readonly usage: Readonly<ResourceUsage>;
  readonly confidence: number;
  readonly createdAt: number;
  readonly completedAt?: number;
  readonly metadata: Readonly<Record<string, unknown>>;
};

export const MESSAGE_ROLES = ["user", "agent", "system", "error"] as const;

export type MessageRole = (typeof MESSAGE_ROLES)[number];

export type ConversationMessage = {
  id: string;
  sessionId: string;
  role: MessageRole;
  content: string;
  payload: Record<string, unknown>;
  timestamp: number;
};

export type SessionContext = {
  sessionId: string;
  userId: string;
  projectId: string;
  createdAt: number;
  lastActivity: number;
  messageCount: number;
  activeCapabilities: CapabilityType[];
  contextData: Record<string, unknown>;
};
