/**
 * A stage seen for the first time during a turn
 */
export interface AgentCallRecord {
  agentName: string;
  /** Timestamp of the agent's first event */
  firstSeen: number;
  branch?: string;
}

export interface EventFlowEntry {
  type: 'event';
  agentName: string;
  invocationId: string;
  branch?: string;
  timestamp: number;
  eventId: string;
}

export interface TransferFlowEntry {
  type: 'transfer';
  fromAgent: string;
  toAgent: string;
  timestamp: number;
}

export type ExecutionFlowEntry = EventFlowEntry | TransferFlowEntry;

/**
 * One counted LLM call
 */
export interface LlmCallRecord {
  /** 1-based position among the turn's calls */
  callNumber: number;
  agentName: string;
  timestamp: number;
  eventId: string;
  invocationId: string;
  hasFunctionCalls: boolean;
  /** Names of the functions the call requested */
  functionCalls: string[];
  contentLength: number;
  isFinal: boolean;
}

export interface AgentCallStats {
  totalCalls: number;
  functionCalls: number;
  totalContentLength: number;
  firstCall: number;
  lastCall: number;
}

export interface TurnSummary {
  totalAgentsUsed: number;
  totalLlmCalls: number;
  agentsWithLlmCalls: string[];
  mostActiveAgent: string | null;
}

/**
 * Everything the tracker learned about one user turn
 */
export interface TurnReport {
  response: string;
  agentsCalled: AgentCallRecord[];
  executionFlow: ExecutionFlowEntry[];
  totalAgents: number;
  llmCalls: LlmCallRecord[];
  totalLlmCalls: number;
  /** Per-agent statistics in order of each agent's first call */
  llmCallStats: Record<string, AgentCallStats>;
  summary: TurnSummary;
  /** Failure message when the event stream threw */
  error?: string;
}
