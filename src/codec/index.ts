/**
 * Frame codec for the NDAX WebSocket gateway.
 *
 * Every message is one JSON envelope:
 * `{ "m": <type>, "i": <sequence>, "n": "<endpoint>", "o": "<payload as JSON text>" }`
 *
 * The payload is JSON-encoded a second time into `o`. Payload bodies are opaque here;
 * schema validation happens per endpoint in `feeds`.
 */

import { DecodeError } from '../errors';
import { Frame, MessageType } from '../types';

/**
 * Raw envelope as it appears on the wire.
 */
interface WireEnvelope {
  m: number;
  i: number;
  n: string;
  o: string;
}

const KNOWN_TYPES: ReadonlySet<number> = new Set([
  MessageType.Request,
  MessageType.Reply,
  MessageType.Subscribe,
  MessageType.Event,
  MessageType.Unsubscribe,
  MessageType.Error,
]);

/**
 * Encodes a frame for sending.
 *
 * @example
 * ```typescript
 * encodeFrame(MessageType.Request, 2, 'GetProducts', { OMSId: 1 });
 * // '{"m":0,"i":2,"n":"GetProducts","o":"{\"OMSId\":1}"}'
 * ```
 */
export function encodeFrame(type: MessageType, sequence: number, endpoint: string, payload: unknown): string {
  const envelope: WireEnvelope = {
    m: type,
    i: sequence,
    n: endpoint,
    o: JSON.stringify(payload ?? {}),
  };
  return JSON.stringify(envelope);
}

/**
 * Decodes one inbound frame.
 *
 * @throws {DecodeError} If the envelope is not JSON, a field is missing or mistyped,
 * or the message type is unknown
 */
export function decodeFrame(raw: string | Buffer): Frame {
  const text = typeof raw === 'string' ? raw : raw.toString('utf8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new DecodeError('Frame is not valid JSON', text, { cause: error });
  }

  if (!isRecord(parsed)) {
    throw new DecodeError('Frame is not a JSON object', text);
  }

  const { m, i, n, o } = parsed;

  if (m === undefined || i === undefined || n === undefined) {
    const fields: Array<[string, unknown]> = [['m', m], ['i', i], ['n', n]];
    const missing = fields.filter(([, value]) => value === undefined).map(([field]) => field);
    throw new DecodeError(`Frame is missing field(s): ${missing.join(', ')}`, text);
  }

  if (!isMessageType(m)) {
    throw new DecodeError(`Unknown message type: ${String(m)}`, text);
  }

  if (typeof i !== 'number' || !Number.isInteger(i) || i < 0) {
    throw new DecodeError(`Sequence number is not a non-negative integer: ${String(i)}`, text);
  }

  if (typeof n !== 'string') {
    throw new DecodeError('Endpoint name is not a string', text);
  }

  return {
    type: m,
    sequence: i,
    endpoint: n,
    payload: decodePayload(o, text),
  };
}

/**
 * The gateway nests the payload as JSON text; some servers send it inline.
 */
function decodePayload(body: unknown, text: string): unknown {
  if (body === undefined || body === null || body === '') {
    return {};
  }
  if (typeof body !== 'string') {
    return body;
  }
  try {
    return JSON.parse(body);
  } catch (error) {
    throw new DecodeError('Payload is not valid JSON', text, { cause: error });
  }
}

function isMessageType(value: unknown): value is MessageType {
  return typeof value === 'number' && KNOWN_TYPES.has(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
