import { decodeMessage, encodeMessage, toQueueMessage } from '../../src/queue/messages';
import { ValidationError } from '../../src/errors';
import { newWorkItem } from '../helpers/memory-stores';

const b64 = (s: string) => Buffer.from(s, 'utf-8').toString('base64');

describe('queue messages', () => {
    it('encodes as base64 of JSON with the wire field names', () => {
        const body = encodeMessage({ partitionKey: 'P1', rowKey: 'R1', bugId: '123', payload: 'X' });

        expect(JSON.parse(Buffer.from(body, 'base64').toString('utf-8'))).toEqual({
            PartitionKey: 'P1',
            RowKey: 'R1',
            BugId: '123',
            Payload: 'X',
        });
    });

    it('decodes what it encodes, including non-ASCII payloads', () => {
        const message = { partitionKey: 'P1', rowKey: 'R1', bugId: '123', payload: 'Überlauf → 42' };
        expect(decodeMessage(encodeMessage(message))).toEqual(message);
    });

    it('builds the message from a work item', () => {
        expect(toQueueMessage(newWorkItem({ payload: 'crash on save' }))).toEqual({
            partitionKey: 'P1',
            rowKey: 'R1',
            bugId: '123',
            payload: 'crash on save',
        });
    });

    it('ignores surrounding whitespace', () => {
        const body = `  ${b64('{"PartitionKey":"P","RowKey":"R","BugId":"1","Payload":""}')}\n`;
        expect(decodeMessage(body).payload).toBe('');
    });

    it.each([
        ['not base64', '***', 'message body is not valid base64'],
        ['empty', '', 'message body is not valid base64'],
        ['an array', b64('[1,2]'), 'message body must be a JSON object'],
        ['a string', b64('"hi"'), 'message body must be a JSON object'],
        ['missing BugId', b64('{"PartitionKey":"P","RowKey":"R","Payload":"X"}'), 'message is missing required string field "BugId"'],
        ['numeric BugId', b64('{"PartitionKey":"P","RowKey":"R","BugId":1,"Payload":"X"}'), 'message is missing required string field "BugId"'],
        ['empty RowKey', b64('{"PartitionKey":"P","RowKey":"","BugId":"1","Payload":"X"}'), 'PartitionKey and RowKey must not be empty'],
    ])('rejects %s', (_label, body, message) => {
        expect(() => decodeMessage(body)).toThrow(ValidationError);
        expect(() => decodeMessage(body)).toThrow(message);
    });

    it('rejects base64 that is not JSON', () => {
        expect(() => decodeMessage(b64('not json'))).toThrow(/^message body is not JSON/);
    });
});
