/**
 * What the intent router hands to the validator. The interpreter is
 * untrusted, so a proposal's tool and parameters are still raw here.
 */

export type UnavailableCause =
  | 'timeout'
  | 'rate_limited'
  | 'server_error'
  | 'connection'
  | 'request_rejected'
  | 'deadline_exceeded'
  | 'not_configured'
  | 'aborted';

export type RouterDecision =
  | {
      kind: 'proposal';
      tool: string;
      parameters: Record<string, unknown>;
      confidence: number;
      rationale: string;
    }
  | { kind: 'ambiguous'; confidence: number; candidateTool?: string }
  | { kind: 'unknown'; confidence: 0; requestedTool?: string; detail: string }
  | { kind: 'unavailable'; cause: UnavailableCause; attempts: number; lastError: string };

export interface HistoryTurn {
  utterance: string;
  tool: string | null;
  reply: string | null;
}

export interface RouterContext {
  conversationId: number;
  history: HistoryTurn[];
  visibleCategories: string[];
  signal?: AbortSignal;
}
