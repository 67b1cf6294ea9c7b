import { Registry } from '../src/workflow';

describe('Registry', () => {
    let registry: Registry;

    beforeEach(() => {
        registry = new Registry();
    });

    test('registers and looks up orchestrators and activities separately', () => {
        const handler = async () => 'done';
        registry.registerOrchestrator('fan-out', handler);
        registry.registerActivity('fan-out', () => 1);

        expect(registry.getOrchestrator('fan-out')?.handler).toBe(handler);
        expect(registry.getActivity('fan-out')).toBeDefined();
        expect(registry.listOrchestrators()).toEqual(['fan-out']);
        expect(registry.listActivities()).toEqual(['fan-out']);
    });

    test('rejects duplicate names', () => {
        registry.registerActivity('hello', () => 'hi');
        expect(() => registry.registerActivity('hello', () => 'hi')).toThrow('Activity "hello" is already registered.');
    });

    test('validates names', () => {
        expect(() => registry.registerOrchestrator('', async () => null)).toThrow('Orchestrator name cannot be empty');
        expect(() => registry.registerActivity('has space', () => null)).toThrow(/alphanumeric/);
        expect(() => registry.registerActivity('a'.repeat(101), () => null)).toThrow(/maximum length of 100/);
    });

    test('returns undefined for unknown names', () => {
        expect(registry.getOrchestrator('missing')).toBeUndefined();
        expect(registry.getActivity('missing')).toBeUndefined();
    });
});
