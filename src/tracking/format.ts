import type { ExecutionFlowEntry, TurnReport } from './types';

const RULE = '='.repeat(60);
const THIN_RULE = '-'.repeat(40);

export const NO_STATS_MESSAGE = 'No LLM call statistics available.';

/**
 * Multi-line LLM call report for a turn
 */
export function formatLlmCallStats(report?: TurnReport): string {
  if (!report) {
    return NO_STATS_MESSAGE;
  }

  const output: string[] = [
    RULE,
    '🤖 LLM CALL STATISTICS',
    RULE,
    `📊 Total LLM Calls: ${report.totalLlmCalls}`,
    `🎯 Total Agents Used: ${report.summary.totalAgentsUsed}`,
    `⭐ Most Active Agent: ${report.summary.mostActiveAgent ?? 'None'}`,
    '',
  ];

  const stats = Object.entries(report.llmCallStats);
  if (stats.length > 0) {
    output.push('📋 Per-Agent Statistics:', THIN_RULE);

    // Equal counts keep first-call order
    const sorted = [...stats].sort(([, a], [, b]) => b.totalCalls - a.totalCalls);
    for (const [agentName, agentStats] of sorted) {
      output.push(
        '',
        `🔹 Agent: ${agentName}`,
        `   • Total Calls: ${agentStats.totalCalls}`,
        `   • Function Calls: ${agentStats.functionCalls}`,
        `   • Total Content Length: ${agentStats.totalContentLength} chars`,
        `   • First Call: ${formatTimestamp(agentStats.firstCall)}`,
        `   • Last Call: ${formatTimestamp(agentStats.lastCall)}`
      );
    }
  }

  if (report.llmCalls.length > 0) {
    output.push('', RULE, '📞 Individual LLM Calls:', RULE);

    for (const call of report.llmCalls) {
      output.push(
        '',
        `#${call.callNumber} - ${call.agentName}`,
        `   • Event ID: ${call.eventId}`,
        `   • Content Length: ${call.contentLength} chars`,
        `   • Has Function Calls: ${call.hasFunctionCalls}`
      );
      if (call.functionCalls.length > 0) {
        output.push(`   • Functions: ${call.functionCalls.join(', ')}`);
      }
      output.push(
        `   • Is Final Response: ${call.isFinal}`,
        `   • Timestamp: ${formatTimestamp(call.timestamp)}`
      );
    }
  }

  output.push('', RULE);
  return output.join('\n');
}

/**
 * ISO time for wall-clock timestamps, the raw number for logical ones
 */
export function formatTimestamp(timestamp: number): string {
  const date = new Date(timestamp);
  return Number.isNaN(date.getTime()) ? String(timestamp) : date.toISOString();
}

function formatFlowEntry(entry: ExecutionFlowEntry): string {
  if (entry.type === 'transfer') {
    return `[${entry.fromAgent} ⇒ ${entry.toAgent}]`;
  }
  return entry.agentName;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/**
 * Short summary shown under a chat reply
 */
export function formatTurnFooter(report: TurnReport, maxFlowEntries = 5): string {
  const lines = [`📊 ${plural(report.totalLlmCalls, 'LLM call')} across ${plural(report.totalAgents, 'agent')}`];

  const perAgent = Object.entries(report.llmCallStats).map(
    ([agentName, stats]) => `${agentName} (${plural(stats.totalCalls, 'call')})`
  );
  if (perAgent.length > 0) {
    lines.push(`🤖 ${perAgent.join(', ')}`);
  }

  if (report.executionFlow.length > 0) {
    const shown = report.executionFlow.slice(0, maxFlowEntries).map(formatFlowEntry);
    const more = report.executionFlow.length - shown.length;
    lines.push(`🔄 ${shown.join(' → ')}${more > 0 ? ` (+${more} more)` : ''}`);
  }

  return lines.join('\n');
}
