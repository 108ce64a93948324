import * as readline from 'readline';
import chalk from 'chalk';
import { createLogger } from '@contentflow/core';
import { CommandHandler, isShellCommand } from './CommandHandler';

const logger = createLogger('ShellInterface');

/**
 * Interactive chat shell
 *
 * Lines starting with a shell command run that command; anything else is
 * sent to the orchestrator as a chat message.
 */
export class ShellInterface {
  private rl: readline.Interface | null = null;
  private commandHandler: CommandHandler;
  private isRunning: boolean = false;

  constructor(commandHandler: CommandHandler) {
    this.commandHandler = commandHandler;
  }

  /**
   * Start the shell
   */
  async start(): Promise<void> {
    this.printBanner();

    this.rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: chalk.cyan('contentflow> '),
    });

    this.isRunning = true;

    this.rl.on('line', async (line) => {
      await this.processInput(line.trim());
      if (this.isRunning && this.rl) {
        this.rl.prompt();
      }
    });

    this.rl.on('close', () => {
      this.shutdown();
    });

    process.on('SIGINT', () => {
      console.log(chalk.yellow('\n\nReceived SIGINT. Shutting down...'));
      this.shutdown();
    });

    this.rl.prompt();

    logger.debug('Shell interface started');
  }

  private async processInput(input: string): Promise<void> {
    if (!input) {
      return;
    }

    if (input === 'exit' || input === 'quit') {
      this.shutdown();
      return;
    }

    const [command, ...args] = input.split(/\s+/);

    try {
      const result = isShellCommand(command.toLowerCase())
        ? await this.commandHandler.handleCommand(command, args)
        : await this.commandHandler.handleChat(input);

      if (!result.success) {
        console.log(chalk.red(`\nError: ${result.message}\n`));
      }
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      console.log(chalk.red(`\nUnexpected error: ${errorMessage}\n`));
      logger.error('Command processing error', error);
    }
  }

  private printBanner(): void {
    console.log('');
    console.log(chalk.cyan('╔══════════════════════════════════════════════════════════════╗'));
    console.log(chalk.cyan('║                                                              ║'));
    console.log(chalk.cyan('║    ') + chalk.white.bold('contentflow') + chalk.gray(' - Multi-Agent Content Creation') + chalk.cyan('                ║'));
    console.log(chalk.cyan('║                                                              ║'));
    console.log(chalk.cyan('║    ') + chalk.gray('Ideas → Outline → Draft → Feedback → SEO') + chalk.cyan('                  ║'));
    console.log(chalk.cyan('║                                                              ║'));
    console.log(chalk.cyan('╚══════════════════════════════════════════════════════════════╝'));
    console.log('');
    console.log(chalk.gray('  Type a message to start, "help" for commands, "exit" to quit.'));
    console.log('');
  }

  private shutdown(): void {
    if (!this.isRunning) {
      return;
    }
    this.isRunning = false;

    console.log(chalk.cyan('\n👋 Goodbye!\n'));

    if (this.rl) {
      const rl = this.rl;
      this.rl = null;
      rl.close();
    }

    process.exit(0);
  }
}
