import { SerializedError } from '@fanflow/sdk';

/**
 * Lifecycle states for orchestration instances.
 * Instances progress: PENDING → RUNNING → COMPLETED/FAILED
 * A RUNNING instance whose worker died goes back to PENDING and resumes by replay.
 */
export enum instanceStatus {
    PENDING = 'pending',
    RUNNING = 'running',
    COMPLETED = 'completed',
    FAILED = 'failed',
}

export type RuntimeStatus = 'Pending' | 'Running' | 'Completed' | 'Failed';

export const runtimeStatus: Record<instanceStatus, RuntimeStatus> = {
    [instanceStatus.PENDING]: 'Pending',
    [instanceStatus.RUNNING]: 'Running',
    [instanceStatus.COMPLETED]: 'Completed',
    [instanceStatus.FAILED]: 'Failed',
};

export function isTerminal(status: instanceStatus): boolean {
    return status === instanceStatus.COMPLETED || status === instanceStatus.FAILED;
}

/**
 * One orchestration instance. `input` and `output` hold superjson strings.
 */
export type InstanceEntity = {
    id: string;
    name: string;
    status: instanceStatus;
    input: string;
    output: string | null;
    error: SerializedError | null;
    worker_id: string | null;
    heartbeat_at: Date | null;  // For dead worker detection
    retry_count: number;
    max_retries: number;
    created_at: Date;
    updated_at: Date;
    completed_at: Date | null;
};
