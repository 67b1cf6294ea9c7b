import { ActivityHandler, OrchestratorHandler } from './types';

export interface Orchestrator {
    name: string;
    handler: OrchestratorHandler;
}

export interface Activity {
    name: string;
    handler: ActivityHandler;
}

export class Registry {
    private orchestrators = new Map<string, Orchestrator>();
    private activities = new Map<string, Activity>();
    private static readonly NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;
    private static readonly MAX_NAME_LENGTH = 100;

    registerOrchestrator(name: string, handler: OrchestratorHandler): Orchestrator {
        Registry.validateName('Orchestrator', name);
        if (this.orchestrators.has(name)) {
            throw new Error(`Orchestrator "${name}" is already registered.`);
        }
        const entry: Orchestrator = { name, handler };
        this.orchestrators.set(name, entry);
        return entry;
    }

    registerActivity(name: string, handler: ActivityHandler): Activity {
        Registry.validateName('Activity', name);
        if (this.activities.has(name)) {
            throw new Error(`Activity "${name}" is already registered.`);
        }
        const entry: Activity = { name, handler };
        this.activities.set(name, entry);
        return entry;
    }

    getOrchestrator(name: string): Orchestrator | undefined {
        return this.orchestrators.get(name);
    }

    getActivity(name: string): Activity | undefined {
        return this.activities.get(name);
    }

    listOrchestrators(): string[] {
        return Array.from(this.orchestrators.keys());
    }

    listActivities(): string[] {
        return Array.from(this.activities.keys());
    }

    private static validateName(kind: string, name: string): void {
        if (!name || name.length === 0) {
            throw new Error(`${kind} name cannot be empty`);
        }
        if (name.length > Registry.MAX_NAME_LENGTH) {
            throw new Error(`${kind} name exceeds maximum length of ${Registry.MAX_NAME_LENGTH} characters`);
        }
        if (!Registry.NAME_PATTERN.test(name)) {
            throw new Error(`${kind} name must contain only alphanumeric characters, dashes, and underscores`);
        }
    }
}

export const globalRegistry = new Registry();

export function orchestrator(name: string, handler: OrchestratorHandler): Orchestrator {
    return globalRegistry.registerOrchestrator(name, handler);
}

export function activity(name: string, handler: ActivityHandler): Activity {
    return globalRegistry.registerActivity(name, handler);
}
