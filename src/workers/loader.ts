import { readFile } from "node:fs/promises";
import { ConfigError, ValidationError } from "../errors.js";
import type { LlmGateway } from "../llm/types.js";
import type { WorkerFile } from "../schemas.js";
import { parseOrThrow, WorkerFileSchema } from "../schemas.js";
import { HttpWorker } from "./http-worker.js";
import { LlmWorker } from "./llm-worker.js";
import { createLogger } from "../utils/logger.js";
import type { Worker } from "./worker.js";

const log = createLogger("workers");

export type LoadOptions = {
  /** Leave out `kind: "llm"` entries instead of requiring a gateway for them. */
  skipLlm?: boolean;
};

/** Build workers from a parsed worker file. LLM workers need `gateway` unless skipped. */
export function buildWorkers(file: WorkerFile, gateway?: LlmGateway, opts: LoadOptions = {}): Worker[] {
  const entries = file.workers.filter((entry) => {
    if (entry.kind !== "llm" || !opts.skipLlm) return true;
    log.info(`Skipping LLM worker "${entry.name}"`);
    return false;
  });
  return entries.map((entry) => {
    if (entry.kind === "llm") {
      if (!gateway) {
        throw new ConfigError(`Worker "${entry.name}" needs an LLM gateway, but none is configured`);
      }
      return new LlmWorker({
        name: entry.name,
        capability: entry.capability,
        gateway,
        rolePrompt: entry.rolePrompt,
        intents: entry.intents,
        descriptor: entry.descriptor,
      });
    }
    if (!entry.url) {
      throw new ValidationError("VALIDATION_FAILED", `HTTP worker "${entry.name}" is missing "url"`);
    }
    return new HttpWorker({
      name: entry.name,
      capability: entry.capability,
      url: entry.url,
      headers: entry.headers,
      intents: entry.intents,
      descriptor: entry.descriptor,
    });
  });
}

/** Read and validate a JSON worker file (`{ "workers": [...] }`). */
export async function loadWorkerFile(path: string, gateway?: LlmGateway, opts: LoadOptions = {}): Promise<Worker[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Could not read worker file ${path}`, { cause: String(err) });
  }
  return buildWorkers(parseOrThrow(WorkerFileSchema, raw, "worker file"), gateway, opts);
}
