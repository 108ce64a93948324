import chalk from 'chalk';
import { ORCHESTRATOR_NAME } from '../agents/orchestrator';
import { STAGES } from '../agents/stages/index';
import type { SessionManager } from '../session/SessionManager';
import { formatTurnFooter } from '../tracking/format';
import type { TurnReport } from '../tracking/types';
import type { WorkflowStatus } from '../workflow/status';

/**
 * Command result
 */
export interface CommandResult {
  success: boolean;
  message: string;
  data?: unknown;
}

/**
 * Canned requests that walk through the pipeline
 */
export const QUICK_ACTIONS: readonly string[] = [
  'Give me ideas for a blog post about remote work',
  'Create an outline from the best idea',
  'Write a draft based on the outline',
  'Review the draft and give expert feedback',
  'Optimize the draft for SEO',
];

export const SHELL_COMMANDS = ['status', 'state', 'stats', 'agents', 'quick', 'new', 'clear', 'help'] as const;

export type ShellCommand = (typeof SHELL_COMMANDS)[number];

export function isShellCommand(value: string): value is ShellCommand {
  return SHELL_COMMANDS.some((command) => command === value);
}

const PREVIEW_LENGTH = 200;

function preview(value: unknown): string {
  const text = typeof value === 'string' ? value : JSON.stringify(value);
  const oneLine = text.replace(/\s+/g, ' ').trim();
  return oneLine.length > PREVIEW_LENGTH ? `${oneLine.slice(0, PREVIEW_LENGTH)}…` : oneLine;
}

export interface CommandHandlerOptions {
  userId?: string;
  /** Line printer, console.log by default */
  print?: (line: string) => void;
}

/**
 * Handles chat messages and shell commands for one CLI user
 *
 * A session is created on first use and replaced by `new` and `clear`.
 */
export class CommandHandler {
  private sessionManager: SessionManager;
  private userId: string;
  private print: (line: string) => void;
  private sessionId: string | null = null;
  private lastReport: TurnReport | null = null;

  constructor(sessionManager: SessionManager, options: CommandHandlerOptions = {}) {
    this.sessionManager = sessionManager;
    this.userId = options.userId ?? 'cli_user';
    // eslint-disable-next-line no-console
    this.print = options.print ?? ((line) => console.log(line));
  }

  getSessionId(): string | null {
    return this.sessionId;
  }

  getLastReport(): TurnReport | null {
    return this.lastReport;
  }

  /**
   * Handle a shell command
   */
  async handleCommand(command: string, args: string[]): Promise<CommandResult> {
    switch (command.toLowerCase()) {
      case 'status':
        return this.handleStatus();
      case 'state':
        return this.handleState();
      case 'stats':
        return this.handleStats();
      case 'agents':
        return this.handleAgents();
      case 'quick':
        return this.handleQuick(args[0]);
      case 'new':
        return this.handleNew();
      case 'clear':
        return this.handleClear();
      case 'help':
        return this.handleHelp();
      default:
        return {
          success: false,
          message: `Unknown command: ${command}. Type 'help' for available commands.`,
        };
    }
  }

  /**
   * Send a chat message through the orchestrator
   */
  async handleChat(message: string, options: { showStats?: boolean } = {}): Promise<CommandResult> {
    if (!message.trim()) {
      return { success: false, message: 'Please enter a message.' };
    }

    const sessionId = await this.ensureSession();
    this.print(chalk.cyan('\n🤖 Working on it...\n'));

    const report = await this.sessionManager.runAgentWithTracking(this.userId, sessionId, message);
    this.lastReport = report;

    this.print(chalk.white(report.response));
    this.print('');
    this.print(chalk.gray(formatTurnFooter(report)));
    this.print('');

    if (options.showStats) {
      this.print(this.sessionManager.formatLlmCallStats(report));
    }

    if (report.error !== undefined) {
      return { success: false, message: report.error, data: report };
    }
    return { success: true, message: 'Response received', data: report };
  }

  private async ensureSession(): Promise<string> {
    if (!this.sessionId) {
      this.sessionId = await this.sessionManager.createSession(this.userId);
    }
    return this.sessionId;
  }

  private async handleStatus(): Promise<CommandResult> {
    const sessionId = await this.ensureSession();
    const status = await this.sessionManager.getWorkflowStatus(this.userId, sessionId);

    this.print(chalk.cyan('\n📊 Workflow Status\n'));
    this.printStatus(status);
    this.print('');

    return { success: true, message: `Current step: ${status.currentStep}`, data: status };
  }

  /**
   * Print the flags of a workflow status
   */
  printStatus(status: WorkflowStatus): void {
    const rows: Array<[string, boolean]> = [
      ['Ideas generated', status.ideasGenerated],
      ['Outline created', status.outlineCreated],
      ['Draft written', status.draftWritten],
      ['Feedback received', status.feedbackReceived],
      ['SEO optimized', status.seoOptimized],
    ];
    for (const [label, done] of rows) {
      this.print(`  ${done ? chalk.green('✓') : chalk.gray('○')} ${label}`);
    }
    this.print(chalk.white(`\n  Current step: ${status.currentStep}`));
  }

  private async handleState(): Promise<CommandResult> {
    const sessionId = await this.ensureSession();
    const state = await this.sessionManager.getSessionState(this.userId, sessionId);
    const keys = Object.keys(state);

    this.print(chalk.cyan('\n🗂  Session Artifacts\n'));
    if (keys.length === 0) {
      this.print(chalk.gray('  No artifacts yet.'));
    }
    for (const key of keys) {
      this.print(chalk.white(`  ${key}`));
      this.print(chalk.gray(`    ${preview(state[key])}`));
    }
    this.print('');

    return { success: true, message: `${keys.length} artifacts`, data: state };
  }

  private handleStats(): CommandResult {
    this.print(this.sessionManager.formatLlmCallStats(this.lastReport ?? undefined));
    return { success: true, message: 'Statistics displayed' };
  }

  private handleAgents(): CommandResult {
    this.print(chalk.cyan('\n🧩 Agents\n'));
    this.print(`  ${chalk.white(ORCHESTRATOR_NAME)} ${chalk.gray('routes each request to a stage')}`);
    STAGES.forEach((stage, index) => {
      this.print(`  ${index + 1}. ${chalk.white(stage.name)} ${chalk.gray(`→ ${stage.outputKey}`)}`);
      this.print(chalk.gray(`     ${stage.description}`));
    });
    this.print('');

    return { success: true, message: `${STAGES.length} stages`, data: STAGES };
  }

  private async handleQuick(arg?: string): Promise<CommandResult> {
    const index = Number(arg) - 1;
    const action = Number.isInteger(index) ? QUICK_ACTIONS[index] : undefined;

    if (!action) {
      this.print(chalk.cyan('\n⚡ Quick Actions\n'));
      QUICK_ACTIONS.forEach((text, i) => this.print(chalk.white(`  ${i + 1}. ${text}`)));
      this.print('');
      return {
        success: arg === undefined,
        message: arg === undefined ? 'Quick actions listed' : `Usage: quick <1-${QUICK_ACTIONS.length}>`,
      };
    }

    this.print(chalk.gray(`> ${action}`));
    return this.handleChat(action);
  }

  private async handleNew(): Promise<CommandResult> {
    this.sessionId = await this.sessionManager.createSession(this.userId);
    this.lastReport = null;
    this.print(chalk.green(`\n✓ New session: ${this.sessionId}\n`));
    return { success: true, message: 'New session created', data: this.sessionId };
  }

  private async handleClear(): Promise<CommandResult> {
    if (this.sessionId) {
      await this.sessionManager.clearSession(this.userId, this.sessionId);
    }
    this.sessionId = null;
    this.lastReport = null;
    this.print(chalk.green('\n✓ Session cleared\n'));
    return { success: true, message: 'Session cleared' };
  }

  private handleHelp(): CommandResult {
    this.print(chalk.cyan('\n📖 Available Commands\n'));
    this.print(chalk.white('  <message>             Send a message to the content team'));
    this.print(chalk.white('  status                Show workflow progress'));
    this.print(chalk.white('  state                 Show the artifacts of this session'));
    this.print(chalk.white('  stats                 Show LLM call statistics of the last turn'));
    this.print(chalk.white('  agents                List the agents'));
    this.print(chalk.white(`  quick [1-${QUICK_ACTIONS.length}]           List or run a quick action`));
    this.print(chalk.white('  new                   Start a new session'));
    this.print(chalk.white('  clear                 Delete the current session'));
    this.print(chalk.white('  help                  Show this help message'));
    this.print(chalk.white('  exit / quit           Exit the CLI'));
    this.print('');

    return { success: true, message: 'Help displayed' };
  }
}
