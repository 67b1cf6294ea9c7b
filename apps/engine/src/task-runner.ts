import { InstanceEntity } from './db/instance.entity';
import { OrchestrationEngine } from './services/orchestration-engine';
import { HeartbeatService } from './services/heartbeat.service';
import { TraceContext } from './observability/tracing';

const TAG = '[engine]';

export async function runInstance(
    engine: OrchestrationEngine,
    heartbeat: HeartbeatService,
    instance: InstanceEntity,
    trace: TraceContext,
): Promise<void> {
    console.log(`${TAG} processing instance ${instance.id} (${instance.name})`);
    heartbeat.start(instance.id);

    try {
        const status = await engine.run(instance, trace);
        console.log(`${TAG} instance ${instance.id} finished as ${status}`);
    } catch (err) {
        // left running on purpose: the reaper requeues it once the heartbeat goes stale
        console.error(`${TAG} instance ${instance.id} interrupted:`, err);
        throw err;
    } finally {
        heartbeat.stop(instance.id);
    }
}
