import { globalRegistry } from '@fanflow/sdk';
import '../orchestrations';
import { loadModules } from '../modules';
import { ActivityRequest, executeActivity } from '../services/activity-dispatcher';

const modulePaths = process.env.FANFLOW_MODULES?.split(',').filter(Boolean) || [];
if (modulePaths.length > 0) {
    loadModules(modulePaths);
}

export default async function runActivity(request: ActivityRequest): Promise<string> {
    return executeActivity(globalRegistry, request);
}
