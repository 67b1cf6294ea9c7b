import path from 'path';

const TAG = '[modules]';

/**
 * Loads modules that register extra orchestrations and activities.
 * Relative paths resolve against the working directory.
 */
export function loadModules(paths: string[]): string[] {
    const loaded: string[] = [];
    for (const p of paths) {
        const trimmed = p.trim();
        const resolved = path.isAbsolute(trimmed) ? trimmed : path.resolve(process.cwd(), trimmed);
        try {
            require(resolved);
            loaded.push(resolved);
            console.log(`${TAG} loaded ${resolved}`);
        } catch (err) {
            console.error(`${TAG} failed to load ${p}:`, err);
            throw err;
        }
    }
    return loaded;
}
