import "dotenv/config";
import http from "http";
import { Server } from "@grpc/grpc-js";
import { AwaitCallbackConfig, loadConfig } from "./config";
import { createPool, createRedis } from "./db";
import { runMigrations } from "./db/migrate";
import { TaskRepository } from "./repositories/task.repository";
import { CallbackRepository } from "./repositories/callback.repository";
import { CorrelationRepository } from "./repositories/correlation.repository";
import { CredentialCache } from "./credentials/credential-cache";
import { HttpAuthenticator } from "./credentials/http-authenticator";
import { RedisTokenStore } from "./credentials/token-store";
import { ResilientApiClient } from "./clients/api-client";
import { CamundaRestClient } from "./clients/engine-client";
import { buildRegistry } from "./handlers";
import {
  CallbackCorrelator,
  CallbackReconciler,
  HeartbeatService,
  LeaderElector,
  Poller,
  Reaper,
  TaskDispatcher,
  TaskService,
} from "./services";
import { ExternalTaskAdapter } from "./adapter/external-task.adapter";
import { ExternalTaskWorker } from "./adapter/external-task.worker";
import { HealthService } from "./grpc/health.service";
import { createGrpcServer, startGrpcServer, stopGrpcServer } from "./grpc/server";
import { CredentialReport, createHttpApp, startHttpServer, stopHttpServer } from "./http/server";

const TAG = "[taskgate]";

const config = loadConfig();

// Wiring
const pool = createPool(config.databaseUrl);
const redis = createRedis(config.redisUrl);

pool.on("error", (err) => console.error(`${TAG} idle client error:`, err));
redis.on("error", (err) => console.warn(`${TAG} redis error:`, err.message));

const tasks = new TaskRepository(pool);
const callbacks = new CallbackRepository(pool);
const correlations = new CorrelationRepository(pool);

const credentials = new CredentialCache({
  store: new RedisTokenStore(redis),
  authenticators: Object.fromEntries(
    config.apis.map((api): [string, HttpAuthenticator] => [api.name, new HttpAuthenticator(api)]),
  ),
  safetyMarginMs: config.credentials.safetyMarginMs,
});
const apiClient = new ResilientApiClient(config.apis, credentials, config.apiClient);
const engine = new CamundaRestClient(config.engine);
const registry = buildRegistry(config.topics, config.apis);

const taskService = new TaskService(tasks, registry, { maxAttempts: config.dispatch.maxAttempts });
const leases = new HeartbeatService(
  (taskId) => tasks.renewLease(taskId, config.workerId),
  config.dispatch.heartbeatIntervalMs,
  "[lease]",
);
const dispatcher = new TaskDispatcher(tasks, registry, apiClient, leases, {
  workerId: config.workerId,
  maxConcurrency: config.dispatch.concurrency,
  retryInitialMs: config.dispatch.retryInitialMs,
  retryMaxMs: config.dispatch.retryMaxMs,
});
const correlator = new CallbackCorrelator(callbacks, correlations, engine, config.callbacks.sources);
const health = new HealthService({
  required: { postgres: () => pool.query("SELECT 1") },
  // without Redis, credentials stay per instance and the reconciler keeps no leader
  degradable: { redis: () => redis.ping() },
});
const credentialReport: CredentialReport = () =>
  Promise.all(
    config.apis.map(async (api) => ({
      api: api.name,
      account: api.defaultAccount,
      ...(await credentials.describe(api.name, api.defaultAccount)),
    })),
  );

const adapter = new ExternalTaskAdapter(engine, taskService, registry, correlations, {
  workerId: config.engine.workerId,
  lockDurationMs: config.engine.lockDurationMs,
  defaultRetries: config.engine.defaultRetries,
  retryTimeoutMs: config.engine.retryTimeoutMs,
  heartbeatIntervalMs: config.dispatch.heartbeatIntervalMs,
  awaits: Object.fromEntries(
    config.topics.flatMap((route): [string, AwaitCallbackConfig][] =>
      route.awaitCallback ? [[route.topic, route.awaitCallback]] : [],
    ),
  ),
  defaultCallbackSource: config.callbacks.sources[0]?.name,
  callbacks: correlator,
});

// Components
let grpcServer: Server | null = null;
let httpServer: http.Server | null = null;
let poller: Poller | null = null;
let reaper: Reaper | null = null;
let reconciler: CallbackReconciler | null = null;
let worker: ExternalTaskWorker | null = null;

async function main() {
  console.log(`${TAG} starting gateway... (worker: ${config.workerId})`);

  // Health checks
  await pool.query("SELECT 1");
  console.log(`${TAG} postgres connected`);

  if (config.runMigrations) {
    const applied = await runMigrations(pool);
    console.log(`${TAG} migrations up to date (${applied.length} applied)`);
  }

  try {
    await redis.ping();
    console.log(`${TAG} redis connected`);
  } catch (err) {
    console.warn(`${TAG} redis unreachable, credentials will not be shared:`, err);
  }

  // gRPC
  grpcServer = createGrpcServer(taskService, health);
  await startGrpcServer(grpcServer, config.grpcPort);

  // HTTP webhooks
  httpServer = await startHttpServer(createHttpApp(correlator, health, credentialReport), config.httpPort);

  // Reaper
  reaper = new Reaper(
    tasks,
    new LeaderElector(redis, "taskgate:reaper:leader", config.workerId, config.lease.leaderTtlSeconds),
    { leaseTimeoutSeconds: config.lease.timeoutSeconds, intervalMs: config.lease.reaperIntervalMs },
  );
  reaper.start();

  // Callback reconciliation
  reconciler = new CallbackReconciler(
    callbacks,
    correlator,
    new LeaderElector(redis, "taskgate:reconciler:leader", config.workerId, config.lease.leaderTtlSeconds),
    { sweepIntervalMs: config.callbacks.sweepIntervalMs, retentionMs: config.callbacks.retentionMs },
  );
  reconciler.start();

  // Poller
  poller = new Poller(tasks, {
    workerId: config.workerId,
    batchSize: config.dispatch.batchSize,
    idleMaxMs: config.dispatch.idlePollMaxMs,
    capacity: () => dispatcher.freeSlots(),
    onTaskReceived: (task) => dispatcher.run(task),
  });
  poller.start();

  // Engine external tasks
  worker = new ExternalTaskWorker(adapter, {
    topics: config.engine.topics,
    maxTasks: config.engine.maxTasks,
    pollIntervalMs: config.engine.pollIntervalMs,
  });
  worker.start();

  console.log(`${TAG} gateway ready`);
}

let shuttingDown = false;

async function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`${TAG} ${signal} received, shutting down...`);

  try {
    if (worker) await worker.stop();
    if (poller) await poller.stop();
    await dispatcher.drain();
    leases.stopAll();
    if (reconciler) await reconciler.stop();
    if (reaper) await reaper.stop();
    if (httpServer) await stopHttpServer(httpServer);
    await correlator.drain();
    if (grpcServer) await stopGrpcServer(grpcServer);

    await pool.end();
    await redis.quit();
    console.log(`${TAG} shutdown complete`);
    process.exit(0);
  } catch (err) {
    console.error(`${TAG} shutdown error:`, err);
    process.exit(1);
  }
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));

main().catch((err) => {
  console.error(`${TAG} fatal:`, err);
  process.exit(1);
});
