import Fastify, { type FastifyInstance, type FastifyReply } from "fastify";
import cors from "@fastify/cors";
import {
  TsvStateStore,
  planDispatch,
  resolveMaxChunks,
  resolvePending,
  resolveStatePaths,
  type StateSnapshot,
} from "@busco-tracker/core";
import { createLogger, isBatchError } from "@busco-tracker/shared";

type ApiError = {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
};

type CreateAppOptions = {
  annotationsPath?: string;
  buscoPath?: string;
  errorLogPath?: string;
  maxChunks?: number;
  logLevel?: string;
  cwd?: string;
};

type QueryParams = Record<string, string | string[] | undefined>;

type QueryNumber = { ok: true; value: number | undefined } | { ok: false; message: string };

const DEFAULT_PENDING_LIMIT = 100;

function failure(code: string, message: string, details?: Record<string, unknown>): ApiError {
  return details ? { error: { code, message, details } } : { error: { code, message } };
}

function unknownQueryKey(query: QueryParams, allowed: readonly string[]): string | undefined {
  return Object.keys(query).find((key) => !allowed.includes(key));
}

function readPositiveInteger(query: QueryParams, key: string): QueryNumber {
  const raw = query[key];
  if (raw === undefined) return { ok: true, value: undefined };
  const text = typeof raw === "string" ? raw.trim() : "";
  if (!/^\d+$/u.test(text) || Number(text) < 1) {
    return { ok: false, message: `${key} must be a positive integer when provided` };
  }
  return { ok: true, value: Number(text) };
}

// Latest outcome per still-failed id, counted by step. run_at strings sort chronologically.
function latestFailureSteps(store: TsvStateStore, failedIds: readonly string[]): Record<string, number> {
  const failed = new Set(failedIds);
  const latest = new Map<string, { run_at: string; step: string }>();
  for (const entry of store.outcomeEntries()) {
    if (!failed.has(entry.annotation_id)) continue;
    const current = latest.get(entry.annotation_id);
    if (!current || entry.run_at >= current.run_at) {
      latest.set(entry.annotation_id, { run_at: entry.run_at, step: entry.step });
    }
  }
  return [...latest.values()].reduce<Record<string, number>>((acc, entry) => {
    acc[entry.step] = (acc[entry.step] ?? 0) + 1;
    return acc;
  }, {});
}

export async function createApp(options: CreateAppOptions = {}): Promise<FastifyInstance> {
  const level = options.logLevel ?? process.env.LOG_LEVEL ?? "info";
  const paths = resolveStatePaths(
    { annotations: options.annotationsPath, busco: options.buscoPath, errorLog: options.errorLogPath },
    process.env,
    options.cwd ?? process.cwd(),
  );
  const maxChunks = options.maxChunks ?? resolveMaxChunks(undefined, process.env);
  const store = new TsvStateStore(paths, createLogger("busco-api-state", { level }));

  const app = Fastify({ logger: { level } });
  await app.register(cors, { origin: true });

  // The canonical logs are re-read on every request; a cycle may have appended since.
  const snapshotOrNotFound = (reply: FastifyReply): StateSnapshot | undefined => {
    try {
      return store.snapshot();
    } catch (err) {
      if (isBatchError(err) && err.code === "missing_catalog") {
        void reply.status(404).send(failure("MISSING_CATALOG", err.message, { path: paths.annotations }));
        return undefined;
      }
      throw err;
    }
  };

  app.get("/healthz", async () => ({ ok: true }));

  app.get<{ Querystring: QueryParams }>("/api/state", async (request, reply) => {
    const unknownKey = unknownQueryKey(request.query, []);
    if (unknownKey) {
      return reply.status(400).send(failure("VALIDATION_ERROR", "state query accepts no parameters"));
    }
    const snapshot = snapshotOrNotFound(reply);
    if (!snapshot) return reply;

    const pending = resolvePending(snapshot);
    return {
      total: snapshot.catalog.size,
      succeeded: snapshot.successIds.size,
      never_run: pending.never_run.length,
      failed: pending.failed.length,
      pending: pending.pending.length,
      failure_steps: latestFailureSteps(store, pending.failed),
      generated_at: new Date().toISOString(),
    };
  });

  app.get<{ Querystring: QueryParams }>("/api/pending", async (request, reply) => {
    const query = request.query;
    if (unknownQueryKey(query, ["limit"])) {
      return reply.status(400).send(failure("VALIDATION_ERROR", "pending query supports only limit"));
    }
    const limit = readPositiveInteger(query, "limit");
    if (!limit.ok) {
      return reply.status(400).send(failure("VALIDATION_ERROR", limit.message));
    }
    const snapshot = snapshotOrNotFound(reply);
    if (!snapshot) return reply;

    const pending = resolvePending(snapshot);
    const neverRun = new Set(pending.never_run);
    return {
      pending_count: pending.pending.length,
      items: pending.pending.slice(0, limit.value ?? DEFAULT_PENDING_LIMIT).map((annotationId) => ({
        annotation_id: annotationId,
        kind: neverRun.has(annotationId) ? "never_run" : "failed",
      })),
    };
  });

  app.get<{ Querystring: QueryParams }>("/api/dispatch-plan", async (request, reply) => {
    const query = request.query;
    if (unknownQueryKey(query, ["max_per_job", "max_chunks"])) {
      return reply.status(400).send(failure("VALIDATION_ERROR", "dispatch-plan query supports only max_per_job|max_chunks"));
    }
    const maxPerJob = readPositiveInteger(query, "max_per_job");
    if (!maxPerJob.ok) {
      return reply.status(400).send(failure("VALIDATION_ERROR", maxPerJob.message));
    }
    const maxChunksQuery = readPositiveInteger(query, "max_chunks");
    if (!maxChunksQuery.ok) {
      return reply.status(400).send(failure("VALIDATION_ERROR", maxChunksQuery.message));
    }
    const snapshot = snapshotOrNotFound(reply);
    if (!snapshot) return reply;

    return planDispatch(resolvePending(snapshot).pending.length, {
      maxChunks: maxChunksQuery.value ?? maxChunks,
      maxPerJob: maxPerJob.value,
    });
  });

  return app;
}
