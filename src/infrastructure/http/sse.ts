import type { ServerSentEvent } from '../../core/entities/Agent.js';

/**
 * Split complete events off the front of a buffer; the unterminated tail is
 * returned as `rest`
 */
export function extractServerSentEvents(buffer: string): { events: ServerSentEvent[]; rest: string } {
  const events: ServerSentEvent[] = [];
  // A trailing CR may be the first half of a CRLF split across chunks
  const heldCr = buffer.endsWith('\r');
  let remaining = (heldCr ? buffer.slice(0, -1) : buffer).replace(/\r\n?/g, '\n');

  while (true) {
    const separatorIndex = remaining.indexOf('\n\n');
    if (separatorIndex === -1) break;

    const rawEvent = remaining.slice(0, separatorIndex);
    remaining = remaining.slice(separatorIndex + 2);

    const event = parseEventBlock(rawEvent);
    if (event) {
      events.push(event);
    }
  }

  return { events, rest: heldCr ? `${remaining}\r` : remaining };
}

function parseEventBlock(rawEvent: string): ServerSentEvent | null {
  let eventName = 'message';
  let id: string | undefined;
  const dataLines: string[] = [];

  for (const line of rawEvent.split('\n')) {
    if (line.startsWith(':')) continue;

    const colon = line.indexOf(':');
    const field = colon === -1 ? line : line.slice(0, colon);
    let value = colon === -1 ? '' : line.slice(colon + 1);
    if (value.startsWith(' ')) value = value.slice(1);

    if (field === 'event') {
      eventName = value;
    } else if (field === 'data') {
      dataLines.push(value);
    } else if (field === 'id') {
      id = value;
    }
  }

  if (dataLines.length === 0) {
    return null;
  }
  return { event: eventName, data: dataLines.join('\n'), id };
}

/**
 * Decode a server-sent-events body into `{event, data}` records.
 *
 * Chunks may split lines and multi-byte characters anywhere. A final event
 * without its terminating blank line is still delivered.
 */
export async function* readServerSentEvents(
  body: AsyncIterable<string | Uint8Array>
): AsyncGenerator<ServerSentEvent> {
  const decoder = new TextDecoder('utf-8');
  let buffer = '';

  for await (const chunk of body) {
    buffer += typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });
    const { events, rest } = extractServerSentEvents(buffer);
    buffer = rest;
    yield* events;
  }

  const { events } = extractServerSentEvents(`${buffer}${decoder.decode()}\n\n`);
  yield* events;
}
