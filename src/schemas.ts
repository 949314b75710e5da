import { z } from "zod";
import { ValidationError } from "./errors.js";
import { CAPABILITY_TYPES, INTENT_TYPES, PRIORITIES } from "./types.js";

const nonEmpty = (field: string) =>
  z
    .string({ required_error: `${field} is required`, invalid_type_error: `${field} must be a string` })
    .trim()
    .min(1, `${field} cannot be empty`);

export const ExecutionContextSchema = z.object({
  sessionId: nonEmpty("sessionId"),
  userId: nonEmpty("userId"),
  projectId: nonEmpty("projectId"),
  workspacePath: nonEmpty("workspacePath"),
  environment: z.string().trim().min(1).default("development"),
  language: z.string().optional(),
  framework: z.string().optional(),
  metadata: z.record(z.unknown()).default({}),
});

export type ExecutionContextInput = z.input<typeof ExecutionContextSchema>;

export const TaskRequestSchema = z.object({
  id: z.string().uuid().optional(),
  intent: z.enum(INTENT_TYPES),
  description: nonEmpty("description"),
  context: ExecutionContextSchema,
  parameters: z.record(z.unknown()).default({}),
  priority: z.enum(PRIORITIES).optional(),
  timeoutSeconds: z
    .number()
    .int()
    .min(1, "timeoutSeconds must be at least 1 second")
    .max(3600, "timeoutSeconds cannot exceed 1 hour")
    .optional(),
  maxRetries: z.number().int().min(0).max(10).optional(),
  parentTaskId: z.string().min(1).optional(),
  createdAt: z.number().int().nonnegative().optional(),
});

export type TaskRequestInput = z.input<typeof TaskRequestSchema>;

/** Knobs a caller may pass through `parameters` on submit. Unknown keys are kept as opaque parameters. */
export const TaskParametersSchema = z
  .object({
    priority: z.enum(PRIORITIES).optional(),
    timeoutSeconds: z.number().int().min(1).max(3600).optional(),
    maxRetries: z.number().int().min(0).max(10).optional(),
    intent: z.enum(INTENT_TYPES).optional(),
  })
  .passthrough();

export const SubmitRequestSchema = z.object({
  message: nonEmpty("message"),
  sessionId: nonEmpty("sessionId"),
  userId: nonEmpty("userId").default("default_user"),
  projectId: nonEmpty("projectId").default("default_project"),
  workspacePath: nonEmpty("workspacePath").default("/tmp/workspace"),
  parameters: TaskParametersSchema.default({}),
});

export type SubmitRequestInput = z.input<typeof SubmitRequestSchema>;
export type SubmitRequest = z.output<typeof SubmitRequestSchema>;

export const CapabilityDescriptorSchema = z.object({
  name: nonEmpty("name"),
  description: z.string().default(""),
  requiredInputs: z.array(z.string()).default([]),
  outputs: z.array(z.string()).default([]),
  estimatedDurationSeconds: z.number().int().positive().default(60),
});

export const WorkerFileSchema = z.object({
  workers: z
    .array(
      z.object({
        name: nonEmpty("name"),
        kind: z.enum(["http", "llm"]).default("http"),
        capability: z.enum(CAPABILITY_TYPES),
        url: z.string().url().optional(),
        headers: z.record(z.string()).optional(),
        intents: z.array(z.enum(INTENT_TYPES)).optional(),
        rolePrompt: z.string().optional(),
        descriptor: CapabilityDescriptorSchema.partial().optional(),
      }),
    )
    .min(1, "workers must list at least one worker"),
});

export type WorkerFile = z.output<typeof WorkerFileSchema>;

/** An LLM reply naming an intent, tolerant of quotes, punctuation and case. */
export const IntentReplySchema = z
  .string()
  .transform((raw) => raw.trim().toLowerCase().replace(/^["'`\s]+|["'`.\s]+$/g, "").replace(/[\s-]+/g, "_"))
  .pipe(z.enum(INTENT_TYPES));

export const CancelRequestSchema = z.object({
  reason: z.string().trim().min(1).optional(),
});

/** Parse `data` with `schema`, converting zod issues into a ValidationError. */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, data: unknown, label = "input"): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((i) => ({ path: i.path.join("."), message: i.message }));
    const msg = issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join("; ");
    throw new ValidationError("VALIDATION_FAILED", `Invalid ${label}: ${msg}`, { issues });
  }
  return result.data;
}
