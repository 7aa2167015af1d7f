import { timingSafeEqual } from 'node:crypto';
import { isRecord } from '../protocol/codec.js';

export type GateDecision =
  /** Not a protocol message; nothing to forward */
  | 'skip'
  /** The `ready` handshake matched; the process is trusted from now on */
  | 'authenticated'
  /** The first protocol message was not a matching `ready` */
  | 'rejected'
  /** Trusted traffic */
  | 'forward';

function nonceMatches(expected: string, actual: unknown): boolean {
  if (typeof actual !== 'string') return false;
  const a = Buffer.from(expected, 'utf8');
  const b = Buffer.from(actual, 'utf8');
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Checks that the first protocol message from a freshly launched bridge is
 * `ready` with the nonce the host handed it.
 *
 * Values without a string `type` before the handshake are skipped. Once
 * rejected the gate stays closed for the rest of that process.
 */
export class AuthGate {
  private state: 'pending' | 'open' | 'closed' = 'pending';

  constructor(private readonly nonce: string) {}

  inspect(value: unknown): GateDecision {
    if (this.state === 'open') return 'forward';
    if (this.state === 'closed') return 'rejected';

    if (!isRecord(value) || typeof value.type !== 'string') return 'skip';

    if (value.type === 'ready' && nonceMatches(this.nonce, value.nonce)) {
      this.state = 'open';
      return 'authenticated';
    }
    this.state = 'closed';
    return 'rejected';
  }

  get isAuthenticated(): boolean {
    return this.state === 'open';
  }
}
