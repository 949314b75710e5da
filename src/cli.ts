#!/usr/bin/env node

import { Command } from "commander";
import { z } from "zod";
import { IntentClassifier } from "./classifier/classifier.js";
import { configFromEnv, configure, getConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { HttpLlmGateway } from "./llm/gateway.js";
import type { LlmGateway } from "./llm/types.js";
import { Orchestrator } from "./orchestrator.js";
import { TaskStore } from "./persistence/task-store.js";
import type { SubmitResponse } from "./reports.js";
import { ApiServer } from "./server/server.js";
import { SqliteSessionStore } from "./sessions/sqlite-store.js";
import { MemorySessionStore } from "./sessions/store.js";
import { PRIORITIES } from "./types.js";
import { setLogLevel } from "./utils/logger.js";
import { loadWorkerFile } from "./workers/loader.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", reason instanceof Error ? reason.message : reason);
});

const program = new Command();

program
  .name("orchestrate")
  .description("Classify, plan and execute developer requests across registered workers")
  .version("0.1.0")
  .option("--debug", "Enable debug logging");

program.hook("preAction", (_cmd, actionCmd) => {
  configure(configFromEnv());
  setLogLevel(getConfig().log.level);
  const opts = actionCmd.optsWithGlobals<{ debug?: boolean }>();
  if (opts.debug) setLogLevel("debug");
});

type LlmOptions = {
  llmUrl?: string;
  llmModel?: string;
  llm?: boolean;
};

type RuntimeOptions = LlmOptions & {
  workers?: string;
  db?: string;
  memory?: boolean;
};

/** A gateway when an LLM endpoint is configured and not disabled. */
function buildGateway(opts: LlmOptions): LlmGateway | undefined {
  if (opts.llm === false) return undefined;
  const { llm } = getConfig();
  if (!opts.llmUrl && !llm.apiKey) return undefined;
  return new HttpLlmGateway({ baseUrl: opts.llmUrl, model: opts.llmModel });
}

async function buildOrchestrator(opts: RuntimeOptions): Promise<Orchestrator> {
  const gateway = buildGateway(opts);
  const persistent = opts.memory !== true;
  const orch = new Orchestrator({
    gateway,
    sessions: persistent ? new SqliteSessionStore(opts.db) : new MemorySessionStore(),
    taskStore: persistent ? new TaskStore(opts.db) : undefined,
  });
  if (opts.workers) {
    for (const worker of await loadWorkerFile(opts.workers, gateway, { skipLlm: opts.llm === false })) {
      orch.register(worker);
    }
  }
  await orch.initialize();
  return orch;
}

function printResponse(res: SubmitResponse): void {
  console.log("\n--- Result ---");
  console.log(res.response);
  console.log(
    `\n[${res.status}] task ${res.taskId ?? "-"} (${res.intent ?? "unclassified"}) ` +
      `confidence ${res.confidence.toFixed(2)}, ${res.processingTimeMs}ms`,
  );
  if (res.status !== "completed") process.exitCode = 1;
}

const SubmitResponseProbe = z
  .object({
    sessionId: z.string(),
    taskId: z.string().optional(),
    intent: z.string().optional(),
    status: z.string(),
    response: z.string(),
    confidence: z.number(),
    processingTimeMs: z.number(),
  })
  .passthrough();

async function submitViaServer(baseUrl: string, body: Record<string, unknown>): Promise<void> {
  const res = await fetch(`${baseUrl.replace(/\/$/, "")}/api/chat`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
  const text = await res.text();
  if (!res.ok) {
    throw new Error(`Server returned ${res.status}: ${text.slice(0, 200)}`);
  }
  const parsed = SubmitResponseProbe.safeParse(JSON.parse(text));
  if (!parsed.success) throw new Error("Server returned an unexpected response");
  const r = parsed.data;
  console.log("\n--- Result ---");
  console.log(r.response);
  console.log(`\n[${r.status}] task ${r.taskId ?? "-"} confidence ${r.confidence.toFixed(2)}, ${r.processingTimeMs}ms`);
  if (r.status !== "completed") process.exitCode = 1;
}

function withRuntimeOptions(cmd: Command): Command {
  return cmd
    .option("-w, --workers <file>", "JSON file listing workers to register")
    .option("--db <path>", "SQLite database for sessions and task history")
    .option("--memory", "Keep sessions and tasks in memory only")
    .option("--llm-url <url>", "Base URL of an OpenAI-compatible API")
    .option("--llm-model <model>", "Model name for the LLM gateway")
    .option("--no-llm", "Never call a language model; LLM workers in the worker file are skipped");
}

// --- serve ---
withRuntimeOptions(program.command("serve"))
  .description("Start the HTTP API")
  .option("-p, --port <port>", "Port to listen on")
  .option("--host <host>", "Host to bind")
  .action(async (opts: RuntimeOptions & { port?: string; host?: string }) => {
    const orch = await buildOrchestrator(opts);
    const server = new ApiServer({
      orchestrator: orch,
      port: opts.port === undefined ? undefined : Number(opts.port),
      host: opts.host,
    });

    const addr = await server.start();
    const workers = orch.registry.list().map((w) => `${w.name} (${w.capability})`);
    console.log(`API:     http://${addr.host}:${addr.port}`);
    console.log(`Workers: ${workers.join(", ") || "(none)"}`);
    if (workers.length === 0) {
      console.log("\n  No workers registered. Requests will fail until you restart with --workers <file>.\n");
    }
    console.log("Press Ctrl+C to stop.\n");

    process.on("SIGINT", () => {
      Promise.all([server.stop(), orch.shutdown()])
        .catch((err: unknown) => console.error("Shutdown failed:", errorMessage(err)))
        .finally(() => process.exit(0));
    });
  });

// --- submit ---
withRuntimeOptions(program.command("submit"))
  .description("Submit one request and wait for the result")
  .argument("<message>", "The request, in plain language")
  .option("-s, --session <id>", "Session id", "cli")
  .option("--project <id>", "Project id")
  .option("--workspace <path>", "Workspace path", process.cwd())
  .option("--priority <level>", `One of ${PRIORITIES.join(", ")}`)
  .option("--timeout <seconds>", "Per-step timeout in seconds")
  .option("--server <url>", "Send to a running server instead of executing in-process")
  .option("--json", "Print the raw response as JSON")
  .action(
    async (
      message: string,
      opts: RuntimeOptions & {
        session: string;
        project?: string;
        workspace: string;
        priority?: string;
        timeout?: string;
        server?: string;
        json?: boolean;
      },
    ) => {
      const parameters: Record<string, unknown> = {};
      if (opts.priority) parameters.priority = opts.priority;
      if (opts.timeout) parameters.timeoutSeconds = Number(opts.timeout);
      const body = {
        message,
        sessionId: opts.session,
        projectId: opts.project,
        workspacePath: opts.workspace,
        parameters,
      };

      if (opts.server) {
        await submitViaServer(opts.server, body);
        return;
      }

      const orch = await buildOrchestrator(opts);
      try {
        const res = await orch.submit(body);
        if (opts.json) {
          console.log(JSON.stringify(res, null, 2));
          if (res.status !== "completed") process.exitCode = 1;
        } else {
          printResponse(res);
        }
      } finally {
        await orch.shutdown();
      }
    },
  );

// --- classify ---
program
  .command("classify")
  .description("Show the intent a request would be classified as")
  .argument("<text>", "Request text")
  .option("--llm-url <url>", "Base URL of an OpenAI-compatible API")
  .option("--llm-model <model>", "Model name for the LLM gateway")
  .option("--no-llm", "Keyword matching only")
  .action(async (text: string, opts: LlmOptions) => {
    const classifier = new IntentClassifier({ gateway: buildGateway(opts) });
    const result = await classifier.classifyDetailed(text);
    console.log(`${result.intent} (${result.source}, score ${result.score})`);
  });

// --- capabilities ---
program
  .command("capabilities")
  .description("List the capabilities provided by a worker file")
  .requiredOption("-w, --workers <file>", "JSON file listing workers")
  .option("--llm-url <url>", "Base URL of an OpenAI-compatible API")
  .option("--llm-model <model>", "Model name for the LLM gateway")
  .option("--no-llm", "Skip LLM workers")
  .action(async (opts: LlmOptions & { workers: string }) => {
    const gateway = buildGateway(opts);
    const orch = new Orchestrator({ gateway });
    for (const worker of await loadWorkerFile(opts.workers, gateway, { skipLlm: opts.llm === false })) {
      orch.register(worker);
    }
    for (const { type, capabilities } of orch.listCapabilities()) {
      console.log(`${type}:`);
      for (const c of capabilities) {
        console.log(`  ${c.name}: ${c.description} (~${c.estimatedDurationSeconds}s)`);
      }
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exit(1);
});
