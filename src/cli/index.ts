import { Command } from 'commander';
import chalk from 'chalk';
import { ModelFactory, createJsonLogger, createLogger, setDefaultLogLevel, type Logger } from '@contentflow/core';
import { ShellInterface } from './ShellInterface';
import { CommandHandler } from './CommandHandler';
import { config, pipelineInput, validateConfig } from '../../config/env';
import { modelConfigs } from '../../config/models';
import { ORCHESTRATOR_NAME } from '../agents/orchestrator';
import { STAGES } from '../agents/stages/index';
import { createPipeline } from '../pipeline/createPipeline';

setDefaultLogLevel(config.logging.level);

const logger = createLogger('CLI');

const SAMPLE_MESSAGE = 'Give me some ideas for a blog post about artificial intelligence';

function pipelineLogger(): Logger {
  return config.logging.format === 'json'
    ? createJsonLogger({ context: config.appName })
    : createLogger(config.appName);
}

/**
 * Build the pipeline from the environment and wrap it in a command handler
 */
async function createHandler(): Promise<CommandHandler> {
  const { sessionManager } = await createPipeline({
    config: pipelineInput(),
    agentSettings: modelConfigs,
    logger: pipelineLogger(),
  });
  return new CommandHandler(sessionManager);
}

/**
 * Print configuration problems; returns whether the configuration is usable
 */
function reportConfig(): boolean {
  const validation = validateConfig();
  if (!validation.valid) {
    console.log(chalk.yellow('\n⚠️ Configuration Warning:\n'));
    for (const error of validation.errors) {
      console.log(chalk.yellow(`  - ${error}`));
    }
    console.log(chalk.gray('\n  Copy .env.example to .env and fill in the required values.\n'));
  }
  return validation.valid;
}

async function main(): Promise<void> {
  const program = new Command();

  program
    .name('contentflow')
    .description('Multi-agent content creation: ideas, outline, draft, feedback and SEO')
    .version('0.1.0');

  program
    .command('chat', { isDefault: true })
    .alias('i')
    .description('Start the interactive chat shell')
    .action(async () => {
      reportConfig();
      const shell = new ShellInterface(await createHandler());
      await shell.start();
    });

  program
    .command('ask <message>')
    .description('Send one message and print the response')
    .option('-s, --stats', 'Print detailed LLM call statistics')
    .action(async (message: string, options: { stats?: boolean }) => {
      await runSingleCommand(async (handler) => handler.handleChat(message, { showStats: options.stats }));
    });

  program
    .command('test')
    .description('Send a sample message and show the workflow status')
    .action(async () => {
      await runSingleCommand(async (handler) => {
        console.log(chalk.cyan(`\n🗨️  Sending test message: ${SAMPLE_MESSAGE}`));
        const result = await handler.handleChat(SAMPLE_MESSAGE);
        await handler.handleCommand('status', []);
        return result;
      });
    });

  program
    .command('check-env')
    .description('Check environment configuration and provider packages')
    .action(async () => {
      const valid = reportConfig();
      const installed = await ModelFactory.getAvailableProviders();
      const available = installed.includes(config.model.provider);

      console.log(chalk.cyan('\n⚙️ Environment\n'));
      console.log(chalk.white(`  Provider: ${config.model.provider} (${config.model.name})`));
      console.log(
        chalk.white(`  Provider package: ${available ? chalk.green('installed') : chalk.red('missing')}`)
      );
      console.log(chalk.white(`  Installed providers: ${installed.join(', ') || 'none'}`));
      console.log(chalk.white(`  Configuration: ${valid ? chalk.green('valid') : chalk.red('invalid')}`));
      console.log('');

      if (!valid || !available) {
        process.exit(1);
      }
    });

  program
    .command('info')
    .description('Show pipeline settings and agents')
    .action(() => {
      console.log(chalk.cyan('\nℹ️  contentflow\n'));
      console.log(chalk.white(`  App name: ${config.appName}`));
      console.log(chalk.white(`  Model: ${config.model.provider}/${config.model.name}`));
      console.log(chalk.white(`  Delegation: ${config.pipeline.delegationMode}`));
      console.log(chalk.white(`  Router steps: ${config.pipeline.maxSteps}`));
      console.log(chalk.white(`  Router: ${ORCHESTRATOR_NAME}`));
      for (const stage of STAGES) {
        console.log(chalk.white(`    - ${stage.name} → ${stage.outputKey}`));
      }
      console.log('');
    });

  await program.parseAsync();
}

/**
 * Run one command against a fresh pipeline, exiting with 1 on failure
 */
async function runSingleCommand(
  run: (handler: CommandHandler) => Promise<{ success: boolean; message: string }>
): Promise<void> {
  try {
    const result = await run(await createHandler());

    if (!result.success) {
      console.log(chalk.red(`\nError: ${result.message}\n`));
      process.exit(1);
    }
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    console.log(chalk.red(`\nError: ${errorMessage}\n`));
    logger.error('Command execution error', error);
    process.exit(1);
  }
}

main().catch((error) => {
  logger.error('Fatal error', error);
  console.error(chalk.red('Fatal error:'), error);
  process.exit(1);
});
