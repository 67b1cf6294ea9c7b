import { serialize, deserialize, serializeError, SerializationError } from '../src/utils/serialization';

describe('Serialization Utils', () => {
    test('should serialize and deserialize primitives', () => {
        expect(deserialize(serialize(123))).toBe(123);
        expect(deserialize(serialize('hello'))).toBe('hello');
        expect(deserialize(serialize(true))).toBe(true);
        expect(deserialize(serialize(null))).toBe(null);
    });

    test('should serialize and deserialize complex types', () => {
        const date = new Date();
        const map = new Map([['a', 1], ['b', 2]]);
        const set = new Set([1, 2, 3]);

        const input = { date, map, set };
        const output = deserialize<typeof input>(serialize(input));

        expect(output.date).toBeInstanceOf(Date);
        expect(output.date.toISOString()).toBe(date.toISOString());

        expect(output.map).toBeInstanceOf(Map);
        expect(output.map.get('a')).toBe(1);

        expect(output.set).toBeInstanceOf(Set);
        expect(output.set.has(1)).toBe(true);
    });

    test('produces identical strings for structurally equal inputs', () => {
        expect(serialize({ size: 10, label: 'x' })).toBe(serialize({ size: 10, label: 'x' }));
    });

    test('should enforce 1MB size limit', () => {
        const largeString = 'a'.repeat(1024 * 1024 + 1); // > 1MB
        expect(() => serialize(largeString)).toThrow(SerializationError);
        expect(() => serialize(largeString)).toThrow(/exceeds the 1\.00MB limit$/);
    });

    test('takes a custom size limit', () => {
        expect(() => serialize('abc', 8)).toThrow(SerializationError);
        expect(serialize('abc', 1024)).toBe('{"json":"abc"}');
    });

    test('rejects malformed input on deserialize', () => {
        expect(() => deserialize('{not json')).toThrow(SerializationError);
    });

    test('serializeError keeps name and message', () => {
        const err = new TypeError('bad input');
        expect(serializeError(err)).toEqual({ name: 'TypeError', message: 'bad input', stack: err.stack });
        expect(serializeError('plain')).toEqual({ name: 'Error', message: 'plain' });
    });
});
