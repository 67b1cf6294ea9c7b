import "dotenv/config";
import { trace } from "@opentelemetry/api";
import { globalRegistry } from "@fanflow/sdk";
import { loadConfig } from "./config";
import { applySchema, createPool, createRedis } from "./db";
import { InstanceEntity } from "./db/instance.entity";
import { createHttpServer } from "./http/server";
import { loadModules } from "./modules";
import "./orchestrations";
import { rootTrace } from "./observability/tracing";
import { RedisQueue } from "./queue/redis-queue";
import { HistoryRepository } from "./repositories/history.repository";
import { InstanceRepository } from "./repositories/instance.repository";
import { WorkItemRepository } from "./repositories/work-item.repository";
import {
  ActivityDispatcher,
  AzureOpenAITextGenerator,
  Backpressure,
  DurableQueueBridge,
  HeartbeatService,
  InlineActivityDispatcher,
  LeaderElector,
  OrchestrationEngine,
  PiscinaActivityDispatcher,
  Poller,
  QueueConsumer,
  RandomWorkloadGenerator,
  Reaper,
  RecordProcessor,
  Scheduler,
  TextGenerator,
} from "./services";
import { runInstance } from "./task-runner";

const TAG = "[fanflow]";

const config = loadConfig();
loadModules(config.modules);

// Wiring
const pool = createPool(config.databaseUrl);
const redis = createRedis(config.redisUrl);
const rootContext = rootTrace(trace.getTracer("fanflow"));

pool.on("error", (err) => console.error(`${TAG} idle client error:`, err));

const instances = new InstanceRepository(pool);
const history = new HistoryRepository(pool);
const workItems = new WorkItemRepository(pool, config.workItemsTable);

const dispatcher: ActivityDispatcher =
  config.activityMode === "workers"
    ? new PiscinaActivityDispatcher({ modules: config.modules })
    : new InlineActivityDispatcher(globalRegistry);

const engine = new OrchestrationEngine(instances, history, dispatcher, {
  registry: globalRegistry,
  activityTimeoutMs: config.activityTimeoutMs,
});
const heartbeat = new HeartbeatService(instances);
const backpressure = new Backpressure({
  maxQueueSize: config.maxQueueSize,
  maxEventLoopLag: config.maxEventLoopLag,
  queueSize: () => dispatcher.queueSize,
});

const queue = new RedisQueue(redis, config.queueName, config.workerId, config.maxDequeueCount);

let textGenerator: TextGenerator | null = null;
if (config.openai.endpoint) {
  textGenerator = new AzureOpenAITextGenerator(config.openai);
} else {
  console.warn(`${TAG} WARNING: AZURE_OPENAI_ENDPOINT is not set. Workload generation and enrichment are disabled.`);
}

const processor = new RecordProcessor(workItems, {
  enricher: config.enrichmentEnabled ? textGenerator : null,
});

const http = createHttpServer({
  engine,
  trace: rootContext,
  publicBaseUrl: config.publicBaseUrl,
  healthCheck: async () => {
    await pool.query("SELECT 1");
    await redis.ping();
  },
});

// Components
let poller: Poller<InstanceEntity> | null = null;
let reaper: Reaper | null = null;
let scheduler: Scheduler | null = null;
let consumer: QueueConsumer | null = null;

async function main() {
  console.log(`${TAG} starting engine... (worker: ${config.workerId}, activities: ${config.activityMode})`);

  // Health checks
  await pool.query("SELECT 1");
  console.log(`${TAG} postgres connected`);

  await applySchema(pool, config.workItemsTable);
  console.log(`${TAG} schema applied`);

  await redis.ping();
  console.log(`${TAG} redis connected`);

  // Reaper
  reaper = new Reaper(
    instances,
    new LeaderElector(redis, "fanflow:reaper:leader", config.workerId, config.leaderTtlSeconds),
    config.reaperStale,
    config.reaperInterval,
  );
  reaper.start();

  // Instance poller
  poller = new Poller<InstanceEntity>({
    name: "instances",
    batchSize: 10,
    fetch: (n) => instances.dequeue(n, config.workerId),
    onReceived: (instance) => runInstance(engine, heartbeat, instance, rootContext),
    checkBackpressure: () => backpressure.check(),
  });
  poller.start();

  // Timer trigger
  const generator = textGenerator
    ? new RandomWorkloadGenerator(workItems, textGenerator, { defaultCount: config.messagesPerTick })
    : null;
  scheduler = new Scheduler(
    { generator, bridge: new DurableQueueBridge(workItems, queue) },
    new LeaderElector(redis, "fanflow:scheduler:leader", config.workerId, config.leaderTtlSeconds),
    rootContext,
    config.timerIntervalMs,
  );
  scheduler.start();

  // Queue trigger
  await queue.recoverInFlight();
  consumer = new QueueConsumer(queue, processor, rootContext, { name: `queue:${config.queueName}` });
  consumer.start();

  // HTTP
  await http.listen({ port: config.port, host: "0.0.0.0" });
  console.log(`${TAG} http listening on :${config.port}`);

  console.log(`${TAG} engine ready (orchestrators: ${globalRegistry.listOrchestrators().join(", ")})`);
}

async function shutdown(signal: string) {
  console.log(`${TAG} ${signal} received, shutting down...`);

  await http.close();
  if (consumer) await consumer.stop();
  if (scheduler) await scheduler.stop();
  if (poller) await poller.stop();
  if (reaper) await reaper.stop();
  heartbeat.stopAll();
  backpressure.disable();
  await dispatcher.destroy();

  await pool.end();
  await redis.quit();
  console.log(`${TAG} shutdown complete`);
  process.exit(0);
}

function onSignal(signal: string) {
  shutdown(signal).catch((err) => {
    console.error(`${TAG} shutdown failed:`, err);
    process.exit(1);
  });
}

process.on("SIGTERM", () => onSignal("SIGTERM"));
process.on("SIGINT", () => onSignal("SIGINT"));
process.on("SIGUSR2", () => onSignal("SIGUSR2"));

main().catch((err) => {
  console.error(`${TAG} fatal:`, err);
  process.exit(1);
});
