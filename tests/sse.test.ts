/**
 * Tests for the server-sent events reader
 */

import { Readable } from 'stream';
import type { ServerSentEvent } from '../src/core/entities/Agent.js';
import { extractServerSentEvents, readServerSentEvents } from '../src/infrastructure/http/sse.js';

async function collect(chunks: Array<string | Uint8Array>): Promise<ServerSentEvent[]> {
  const events: ServerSentEvent[] = [];
  for await (const event of readServerSentEvents(Readable.from(chunks))) {
    events.push(event);
  }
  return events;
}

describe('Server-sent events', () => {
  describe('extractServerSentEvents', () => {
    it('should split complete events and keep the tail', () => {
      const { events, rest } = extractServerSentEvents('event: a\ndata: 1\n\nevent: b\ndata: 2');

      expect(events).toEqual([{ event: 'a', data: '1', id: undefined }]);
      expect(rest).toBe('event: b\ndata: 2');
    });

    it('should join multi-line data and default the event name', () => {
      const { events } = extractServerSentEvents('id: 7\ndata: first\ndata: second\n\n');
      expect(events).toEqual([{ event: 'message', data: 'first\nsecond', id: '7' }]);
    });

    it('should ignore comments and blocks without data', () => {
      const { events } = extractServerSentEvents(': keep-alive\n\nevent: ping\n\nevent: x\ndata:y\n\n');
      expect(events).toEqual([{ event: 'x', data: 'y', id: undefined }]);
    });

    it('should accept CRLF line endings', () => {
      const { events } = extractServerSentEvents('event: a\r\ndata: 1\r\n\r\n');
      expect(events).toEqual([{ event: 'a', data: '1', id: undefined }]);
    });

    it('should hold back a trailing carriage return', () => {
      const { events, rest } = extractServerSentEvents('event: a\r\ndata: 1\r\n\r');
      expect(events).toEqual([]);
      expect(rest).toBe('event: a\ndata: 1\n\r');
    });
  });

  describe('readServerSentEvents', () => {
    it('should reassemble events split across chunks', async () => {
      const events = await collect(['event: response.text.delta\nda', 'ta: {"text":"hi"}\n', '\nevent: response.done\ndata: {}\n\n']);

      expect(events).toEqual([
        { event: 'response.text.delta', data: '{"text":"hi"}', id: undefined },
        { event: 'response.done', data: '{}', id: undefined },
      ]);
    });

    it('should decode multi-byte characters split across byte chunks', async () => {
      const bytes = Buffer.from('data: café\n\n', 'utf-8');
      const events = await collect([bytes.subarray(0, 10), bytes.subarray(10)]);

      expect(events).toEqual([{ event: 'message', data: 'café', id: undefined }]);
    });

    it('should deliver a final event without its blank line', async () => {
      const events = await collect(['event: response.done\ndata: {}']);
      expect(events).toEqual([{ event: 'response.done', data: '{}', id: undefined }]);
    });
  });
});
