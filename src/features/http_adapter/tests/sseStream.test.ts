import { describe, expect, it } from 'vitest';
import { Connection } from '../../streaming/domain/Connection.js';
import { createEventStream, HEARTBEAT_FRAME } from '../sseStream.js';

const decoder = new TextDecoder();

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('createEventStream', () => {
    it('writes data frames and closes after the terminal event', async () => {
        const connection = new Connection('stream-1', 4);
        connection.offer({ type: 'content', data: 'hi' });
        connection.force({ type: 'done', ai_message_id: '7' });

        const stream = createEventStream(connection, {
            heartbeatIntervalMs: 60_000,
            onHeartbeat: () => undefined,
            onDisconnect: () => undefined,
        });

        expect(await new Response(stream).text()).toBe(
            'data: {"type":"content","data":"hi"}\n\n' +
            'data: {"type":"done","ai_message_id":"7"}\n\n'
        );
    });

    it('holds back heartbeats while the client is not reading', async () => {
        const connection = new Connection('stream-1', 4);
        let heartbeats = 0;
        let disconnects = 0;
        const stream = createEventStream(connection, {
            heartbeatIntervalMs: 5,
            onHeartbeat: () => {
                heartbeats += 1;
            },
            onDisconnect: () => {
                disconnects += 1;
            },
        });

        await sleep(60);
        expect(heartbeats).toBe(1);

        const reader = stream.getReader();
        const { value } = await reader.read();
        expect(decoder.decode(value)).toBe(HEARTBEAT_FRAME);

        await reader.cancel();
        expect(disconnects).toBe(1);
    });
});
