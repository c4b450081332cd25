import type { RouterDecision } from '../router/types';
import type { RejectionReason, ToolCall, ToolName, ToolResult } from '../tools/types';
import type { ValidationVerdict } from '../validation/validator';

export interface TurnRequest {
  conversationId: number;
  userId: number;
  utterance: string;
  signal?: AbortSignal;
}

export interface TurnOutcome {
  traceId: number;
  reply: string;
  call: ToolCall;
  result: ToolResult;
  isFallback: boolean;
  rejectionReason?: RejectionReason;
}

export interface ResultSummary {
  status: ToolResult['status'];
  tool: ToolName;
  rowCount?: number;
  categories?: string[];
}

export type TurnStage = 'load' | 'validate' | 'fallback' | 'execute' | 'record';

export interface TraceFailure {
  stage: TurnStage;
  code: string;
  message: string;
}

/**
 * Everything recorded about one turn. Stored as one append-only row.
 */
export interface TraceEntry {
  conversationId: number;
  userId: number;
  accessVersion: number;
  userQuery: string;
  routerDecision: RouterDecision | null;
  verdict: ValidationVerdict | null;
  finalCall: ToolCall | null;
  resultSummary: ResultSummary | null;
  fallbackRationale: string | null;
  failure: TraceFailure | null;
  reply: string | null;
  latencyMs: number;
}

export function summarizeResult(result: ToolResult): ResultSummary {
  switch (result.status) {
    case 'access_denied':
      return { status: result.status, tool: result.tool };
    case 'no_data':
      return { status: result.status, tool: result.tool, categories: result.categories };
    case 'ok': {
      const data = result.data;
      switch (data.tool) {
        case 'metrics_top_categories':
          return { status: 'ok', tool: data.tool, rowCount: data.rows.length, categories: data.rows.map((row) => row.category) };
        case 'rating_distribution':
          return { status: 'ok', tool: data.tool, rowCount: data.distribution.total, categories: [data.distribution.category] };
        case 'sentiment_summary':
          return { status: 'ok', tool: data.tool, rowCount: data.summary.reviewCountAnalyzed, categories: [data.summary.category] };
        case 'compare_categories':
          return { status: 'ok', tool: data.tool, rowCount: 2, categories: [data.comparison.a.category, data.comparison.b.category] };
        case 'general_query':
          return { status: 'ok', tool: data.tool };
      }
    }
  }
}
