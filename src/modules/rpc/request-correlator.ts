import { MAX_TIMER_DELAY_MS } from '../../infra/config/env.config';
import type { NodeKey } from '../../infra/contracts/node-record.dto';
import { isJsonRpcFailure, type JsonRpcId, type JsonRpcResponse } from './json-rpc';
import { ProtocolError, RemoteRpcError, RpcTimeoutError } from './rpc-errors';

/** Largest call id before the per-node counter wraps back to 1. */
export const MAX_CALL_ID = 0x7fffffff;

/** Terminal outcome delivered through a pending call's one-shot slot. */
export type CallOutcome =
  | { kind: 'response'; response: JsonRpcResponse }
  | { kind: 'failed'; error: Error };

/** Returned by beginCall: the id to put on the wire and the slot to wait on. */
export interface PendingCallHandle {
  callId: number;
  /** Never rejects; failures arrive as `{ kind: 'failed' }`. */
  completion: Promise<CallOutcome>;
}

interface PendingCall {
  readonly nodeKey: NodeKey;
  readonly callId: number;
  readonly completion: Promise<CallOutcome>;
  readonly fulfil: (outcome: CallOutcome) => void;
  /** Epoch ms; set once awaitCall arms the timer. */
  deadline: number | null;
  settled: boolean;
}

/**
 * Tracks calls awaiting a reply, keyed by (node key, call id).
 *
 * Each pending call owns a one-shot completion slot. Replies, timeouts, transport
 * failures and disconnects all go through `settle`, so whichever arrives first wins
 * and the rest are no-ops. The record itself is removed by awaitCall (or discard)
 * exactly once, whatever the outcome.
 */
export class RequestCorrelator {
  private readonly pending = new Map<NodeKey, Map<number, PendingCall>>();
  private readonly lastCallId = new Map<NodeKey, number>();

  /**
   * Allocate a call id unique among this node's outstanding calls and store the record.
   * Ids come from a per-node counter, skipping any still pending after a wrap.
   */
  beginCall(nodeKey: NodeKey): PendingCallHandle {
    let table = this.pending.get(nodeKey);
    if (!table) {
      table = new Map();
      this.pending.set(nodeKey, table);
    }

    let callId = this.lastCallId.get(nodeKey) ?? 0;
    do {
      callId = callId >= MAX_CALL_ID ? 1 : callId + 1;
    } while (table.has(callId));
    this.lastCallId.set(nodeKey, callId);

    let fulfil: (outcome: CallOutcome) => void = () => undefined;
    const completion = new Promise<CallOutcome>((resolve) => {
      fulfil = resolve;
    });
    table.set(callId, { nodeKey, callId, completion, fulfil, deadline: null, settled: false });
    return { callId, completion };
  }

  /**
   * Deliver a reply envelope. Unknown, already-settled and foreign ids are dropped.
   * @returns true when the reply settled a pending call
   */
  resolve(nodeKey: NodeKey, callId: JsonRpcId | null, response: JsonRpcResponse): boolean {
    const call = this.lookup(nodeKey, callId);
    return call ? this.settle(call, { kind: 'response', response }) : false;
  }

  /**
   * Settle a call with a local failure (e.g. the request could not be sent).
   * @returns true when the call was still unsettled
   */
  fail(nodeKey: NodeKey, callId: number, error: Error): boolean {
    const call = this.lookup(nodeKey, callId);
    return call ? this.settle(call, { kind: 'failed', error }) : false;
  }

  /**
   * Wait for the call's outcome or the timeout, whichever comes first.
   * Timeouts beyond what a timer can hold (including Infinity) wait MAX_TIMER_DELAY_MS.
   * @returns The reply's result payload
   * @throws RpcTimeoutError, RemoteRpcError, or the error the call was failed with
   * @throws RangeError when timeoutMs is NaN or negative; the record is removed
   */
  async awaitCall(nodeKey: NodeKey, callId: number, timeoutMs: number): Promise<unknown> {
    const call = this.lookup(nodeKey, callId);
    if (!call) {
      throw new ProtocolError(`No pending call ${callId} for node ${nodeKey}`);
    }
    if (Number.isNaN(timeoutMs) || timeoutMs < 0) {
      call.settled = true;
      this.remove(call);
      throw new RangeError(`Invalid timeout ${timeoutMs}ms for call ${callId}`);
    }
    const delay = Math.min(timeoutMs, MAX_TIMER_DELAY_MS);
    call.deadline = Date.now() + delay;
    const timer = setTimeout(() => {
      this.settle(call, { kind: 'failed', error: new RpcTimeoutError(nodeKey, callId, timeoutMs) });
    }, delay);

    try {
      const outcome = await call.completion;
      if (outcome.kind === 'failed') throw outcome.error;
      const { response } = outcome;
      if (isJsonRpcFailure(response)) {
        throw new RemoteRpcError(response.error.code, response.error.message, response.error.data);
      }
      return response.result;
    } finally {
      clearTimeout(timer);
      this.remove(call);
    }
  }

  /**
   * Fail every unsettled call of a node with the given error.
   * @returns Number of calls settled
   */
  cancelAll(nodeKey: NodeKey, error: Error): number {
    const table = this.pending.get(nodeKey);
    if (!table) return 0;
    let count = 0;
    for (const call of table.values()) {
      if (this.settle(call, { kind: 'failed', error })) count++;
    }
    return count;
  }

  /** Drop a record nobody will await. No-op when already gone. */
  discard(nodeKey: NodeKey, callId: number): void {
    const call = this.lookup(nodeKey, callId);
    if (call) {
      call.settled = true;
      this.remove(call);
    }
  }

  /** Outstanding records for one node, or for all nodes. */
  pendingCount(nodeKey?: NodeKey): number {
    if (nodeKey !== undefined) return this.pending.get(nodeKey)?.size ?? 0;
    let total = 0;
    for (const table of this.pending.values()) total += table.size;
    return total;
  }

  /** Whether (nodeKey, callId) still has a record. */
  isPending(nodeKey: NodeKey, callId: number): boolean {
    return this.lookup(nodeKey, callId) !== undefined;
  }

  private lookup(nodeKey: NodeKey, callId: JsonRpcId | null): PendingCall | undefined {
    if (typeof callId !== 'number') return undefined;
    return this.pending.get(nodeKey)?.get(callId);
  }

  private settle(call: PendingCall, outcome: CallOutcome): boolean {
    if (call.settled) return false;
    call.settled = true;
    call.fulfil(outcome);
    return true;
  }

  private remove(call: PendingCall): void {
    const table = this.pending.get(call.nodeKey);
    if (table?.get(call.callId) !== call) return;
    table.delete(call.callId);
    if (table.size === 0) this.pending.delete(call.nodeKey);
  }
}
