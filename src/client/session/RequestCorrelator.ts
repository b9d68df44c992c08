import { encodeFrame } from '../../codec';
import { ConnectError, RequestRejectedError, TimeoutError, toError } from '../../errors';
import { Frame, MessageType } from '../../types';

/**
 * Sends one encoded frame on the current transport.
 */
export type FrameSender = (data: string) => void;

/**
 * Per-call submit options
 */
export interface SubmitOptions {
  /** Request timeout in ms (default: correlator default) */
  timeoutMs?: number;
  /** Message type tag for the outgoing frame (default: Request) */
  type?: MessageType.Request | MessageType.Subscribe | MessageType.Unsubscribe;
}

/**
 * Correlator configuration options
 */
export interface RequestCorrelatorOptions {
  /** Default request timeout in ms (default: 10000) */
  defaultTimeoutMs?: number;
  /** First sequence number handed out (default: 2) */
  firstSequence?: number;
  /** Increment between sequence numbers (default: 2) */
  sequenceStep?: number;
  /** Clock, for submission timestamps (default: Date.now) */
  now?: () => number;
}

/**
 * A request waiting for its reply.
 */
interface PendingRequest {
  sequence: number;
  endpoint: string;
  submittedAt: number;
  timer: ReturnType<typeof setTimeout>;
  resolve: (payload: unknown) => void;
  reject: (error: Error) => void;
}

/**
 * Snapshot of an outstanding request, for diagnostics.
 */
export interface PendingRequestInfo {
  sequence: number;
  endpoint: string;
  submittedAt: number;
}

/**
 * RequestCorrelator matches replies to requests over a single multiplexed socket.
 *
 * @remarks
 * Sequence numbers are allocated synchronously and never reused by this instance,
 * so no two outstanding requests can share one. Each pending request is settled
 * exactly once: by its reply, an error frame, its timeout, or {@link failAll}.
 * A reply for a sequence that is no longer pending is reported as unmatched.
 *
 * The gateway numbers client requests with even values, starting at 2.
 */
export class RequestCorrelator {
  private readonly pending: Map<number, PendingRequest> = new Map();
  private sender: FrameSender | null = null;
  private nextSequence: number;
  private readonly sequenceStep: number;
  private readonly defaultTimeoutMs: number;
  private readonly now: () => number;

  constructor(options: RequestCorrelatorOptions = {}) {
    this.nextSequence = options.firstSequence ?? 2;
    this.sequenceStep = options.sequenceStep ?? 2;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 10_000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Routes outgoing frames to a transport.
   */
  attach(sender: FrameSender): void {
    this.sender = sender;
  }

  /**
   * Stops sending; later submits reject with ConnectError.
   */
  detach(): void {
    this.sender = null;
  }

  /**
   * Number of requests awaiting a reply.
   */
  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Outstanding requests, oldest first.
   */
  pendingRequests(): PendingRequestInfo[] {
    return Array.from(this.pending.values()).map(({ sequence, endpoint, submittedAt }) => ({
      sequence,
      endpoint,
      submittedAt,
    }));
  }

  /**
   * Sends a request and resolves with the reply payload.
   *
   * @param endpoint - Endpoint name, e.g. `GetAccountPositions`
   * @param payload - Request body
   * @returns Promise of the (unvalidated) reply payload
   * @throws {ConnectError} If no transport is attached or the send fails
   * @throws {TypeError} If the payload cannot be serialised
   * @throws {TimeoutError} If no reply arrives in time
   * @throws {RequestRejectedError} If the gateway answers with an error frame
   */
  submit(endpoint: string, payload: unknown, options: SubmitOptions = {}): Promise<unknown> {
    const sender = this.sender;
    if (!sender) {
      return Promise.reject(new ConnectError(`Cannot send ${endpoint}: not connected`));
    }

    const sequence = this.allocateSequence();
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;

    return new Promise<unknown>((resolve, reject) => {
      let data: string;
      try {
        data = encodeFrame(options.type ?? MessageType.Request, sequence, endpoint, payload);
      } catch (error) {
        reject(toError(error));
        return;
      }

      const timer = setTimeout(() => {
        if (this.pending.delete(sequence)) {
          reject(new TimeoutError('request', `${endpoint} (#${sequence}) timed out after ${timeoutMs}ms`, timeoutMs));
        }
      }, timeoutMs);

      this.pending.set(sequence, {
        sequence,
        endpoint,
        submittedAt: this.now(),
        timer,
        resolve,
        reject,
      });

      try {
        sender(data);
      } catch (error) {
        this.settle(sequence)?.reject(
          new ConnectError(`Failed to send ${endpoint}: ${error instanceof Error ? error.message : String(error)}`, {
            cause: error,
          })
        );
      }
    });
  }

  /**
   * Settles the request a Reply or Error frame answers.
   *
   * An Error frame, or a reply of the generic shape `{ result: false, errormsg }`,
   * rejects with {@link RequestRejectedError}.
   *
   * @returns false when no request is waiting for this sequence (late or duplicate reply)
   */
  resolve(frame: Frame): boolean {
    const request = this.settle(frame.sequence);
    if (!request) return false;

    if (frame.type === MessageType.Error || isRejectedReply(frame.payload)) {
      request.reject(errorFromFrame(request.endpoint, frame.payload));
    } else {
      request.resolve(frame.payload);
    }
    return true;
  }

  /**
   * Rejects every outstanding request with the given error.
   */
  failAll(error: Error): number {
    const requests = Array.from(this.pending.keys())
      .map(sequence => this.settle(sequence))
      .filter((request): request is PendingRequest => request !== undefined);

    for (const request of requests) {
      request.reject(error);
    }
    return requests.length;
  }

  private allocateSequence(): number {
    const sequence = this.nextSequence;
    this.nextSequence += this.sequenceStep;
    return sequence;
  }

  /**
   * Removes a pending request and clears its timer; the caller settles it.
   */
  private settle(sequence: number): PendingRequest | undefined {
    const request = this.pending.get(sequence);
    if (!request) return undefined;
    this.pending.delete(sequence);
    clearTimeout(request.timer);
    return request;
  }
}

function isRejectedReply(payload: unknown): boolean {
  return typeof payload === 'object' && payload !== null && 'result' in payload && payload.result === false;
}

/**
 * Builds a rejection from an error frame body (`{ errormsg, errorcode }` on this gateway).
 */
function errorFromFrame(endpoint: string, payload: unknown): RequestRejectedError {
  if (typeof payload === 'object' && payload !== null) {
    const message = 'errormsg' in payload && typeof payload.errormsg === 'string' ? payload.errormsg : 'Error frame';
    const code = 'errorcode' in payload && typeof payload.errorcode === 'number' ? payload.errorcode : null;
    return new RequestRejectedError(endpoint, message, code);
  }
  return new RequestRejectedError(endpoint, typeof payload === 'string' ? payload : 'Error frame');
}
