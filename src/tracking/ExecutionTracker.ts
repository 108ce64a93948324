import { extractEventText, getFunctionCalls, type ExecutionEvent, type Logger } from '@contentflow/core';
import type {
  AgentCallRecord,
  AgentCallStats,
  ExecutionFlowEntry,
  LlmCallRecord,
  TurnReport,
} from './types';

export const FALLBACK_RESPONSE =
  "I'm processing your request, but didn't receive a complete response. Please try again.";

export function errorResponse(message: string): string {
  return `An error occurred: ${message}. Please try again.`;
}

/**
 * Report with zero counts and the given response
 */
export function emptyReport(response: string): TurnReport {
  return {
    response,
    agentsCalled: [],
    executionFlow: [],
    totalAgents: 0,
    llmCalls: [],
    totalLlmCalls: 0,
    llmCallStats: {},
    summary: {
      totalAgentsUsed: 0,
      totalLlmCalls: 0,
      agentsWithLlmCalls: [],
      mostActiveAgent: null,
    },
  };
}

/**
 * Agent with strictly the most calls; the first one wins a tie
 */
export function findMostActiveAgent(stats: Record<string, AgentCallStats>): string | null {
  let best: string | null = null;
  let bestCalls = 0;
  for (const [agentName, agentStats] of Object.entries(stats)) {
    if (best === null || agentStats.totalCalls > bestCalls) {
      best = agentName;
      bestCalls = agentStats.totalCalls;
    }
  }
  return best;
}

export interface ExecutionTrackerOptions {
  logger?: Logger;
}

/**
 * Aggregates the event stream of one turn into a TurnReport
 *
 * Consumption stops at the first final event with text; the rest of the
 * stream is never pulled. The tracker never throws: a failing stream
 * produces an error report carrying the failure message in `error`.
 */
export class ExecutionTracker {
  private logger?: Logger;

  constructor(options: ExecutionTrackerOptions = {}) {
    this.logger = options.logger;
  }

  async track(events: AsyncIterable<ExecutionEvent>): Promise<TurnReport> {
    const agentsCalled: AgentCallRecord[] = [];
    const seenAgents = new Set<string>();
    const executionFlow: ExecutionFlowEntry[] = [];
    const llmCalls: LlmCallRecord[] = [];
    // Authors may be any string, including __proto__
    const llmCallStats = new Map<string, AgentCallStats>();
    let response = '';

    try {
      for await (const event of events) {
        this.logger?.debug(`Event from ${event.author}`, {
          id: event.id,
          branch: event.branch,
          final: event.final,
        });

        if (!seenAgents.has(event.author)) {
          seenAgents.add(event.author);
          agentsCalled.push({ agentName: event.author, firstSeen: event.timestamp, branch: event.branch });
        }

        executionFlow.push({
          type: 'event',
          agentName: event.author,
          invocationId: event.invocationId,
          branch: event.branch,
          timestamp: event.timestamp,
          eventId: event.id,
        });

        const text = extractEventText(event.content?.parts);

        if (text && event.author !== 'user') {
          const functionCalls = getFunctionCalls(event).map((call) => call.name);
          llmCalls.push({
            callNumber: llmCalls.length + 1,
            agentName: event.author,
            timestamp: event.timestamp,
            eventId: event.id,
            invocationId: event.invocationId,
            hasFunctionCalls: functionCalls.length > 0,
            functionCalls,
            contentLength: text.length,
            isFinal: event.final,
          });

          let stats = llmCallStats.get(event.author);
          if (!stats) {
            stats = {
              totalCalls: 0,
              functionCalls: 0,
              totalContentLength: 0,
              firstCall: event.timestamp,
              lastCall: event.timestamp,
            };
            llmCallStats.set(event.author, stats);
          }
          stats.totalCalls += 1;
          stats.totalContentLength += text.length;
          stats.lastCall = event.timestamp;
          if (functionCalls.length > 0) {
            stats.functionCalls += 1;
          }
        }

        const transferTo = event.actions.transferToAgent;
        if (transferTo) {
          executionFlow.push({
            type: 'transfer',
            fromAgent: event.author,
            toAgent: transferTo,
            timestamp: event.timestamp,
          });
        }

        if (event.final && text) {
          response = text.trim();
          break;
        }
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger?.error('Turn failed', error);
      return { ...emptyReport(errorResponse(message)), error: message };
    }

    const agentsWithLlmCalls = [...llmCallStats.keys()];
    const statsByAgent: Record<string, AgentCallStats> = Object.fromEntries(llmCallStats);

    return {
      response: response || FALLBACK_RESPONSE,
      agentsCalled,
      executionFlow,
      totalAgents: agentsCalled.length,
      llmCalls,
      totalLlmCalls: llmCalls.length,
      llmCallStats: statsByAgent,
      summary: {
        totalAgentsUsed: agentsCalled.length,
        totalLlmCalls: llmCalls.length,
        agentsWithLlmCalls,
        mostActiveAgent: findMostActiveAgent(statsByAgent),
      },
    };
  }
}

/**
 * Track one turn's events with a default tracker
 */
export function trackExecution(
  events: AsyncIterable<ExecutionEvent>,
  options: ExecutionTrackerOptions = {}
): Promise<TurnReport> {
  return new ExecutionTracker(options).track(events);
}
