export { HeartbeatService } from './heartbeat.service';
export { Poller } from './poller';
export { Reaper } from './reaper';
export { LeaderElector } from './leaderelector';
export type { LeaderLock } from './leaderelector';
export { Backpressure } from './backpressure';
export { OrchestrationEngine } from './orchestration-engine';
export type { OrchestrationStatus, PurgeResult } from './orchestration-engine';
export { InlineActivityDispatcher, PiscinaActivityDispatcher } from './activity-dispatcher';
export type { ActivityDispatcher, ActivityRequest } from './activity-dispatcher';
export { DurableQueueBridge } from './queue-bridge';
export { RecordProcessor } from './record-processor';
export { RandomWorkloadGenerator } from './workload-generator';
export { Scheduler } from './scheduler';
export { QueueConsumer } from './queue-consumer';
export { AzureOpenAITextGenerator } from './text-generator';
export type { TextGenerator } from './text-generator';
