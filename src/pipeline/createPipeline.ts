import {
  EventBus,
  InMemorySessionService,
  ModelFactory,
  Runner,
  createLogger,
  parseConfig,
  type ChatModel,
  type Logger,
  type PipelineConfig,
  type PipelineConfigInput,
  type RouterAgent,
} from '@contentflow/core';
import { ORCHESTRATOR_NAME, createOrchestrator } from '../agents/orchestrator';
import { createStageAgents, type StageOverrides } from '../agents/stages/index';
import { SessionManager } from '../session/SessionManager';

export interface PipelineOptions {
  config: PipelineConfigInput;
  /** Model used instead of the one built from `config.model` */
  model?: ChatModel;
  /** Per-agent sampling settings, keyed by agent name */
  agentSettings?: StageOverrides;
  logger?: Logger;
  eventBus?: EventBus;
  now?: () => number;
}

/**
 * The wired-up pipeline
 */
export interface ContentPipeline {
  config: PipelineConfig;
  orchestrator: RouterAgent;
  runner: Runner;
  sessionService: InMemorySessionService;
  sessionManager: SessionManager;
  eventBus: EventBus;
}

/**
 * Build the stages, the orchestrator, the runner and the session manager
 */
export async function createPipeline(options: PipelineOptions): Promise<ContentPipeline> {
  const config = parseConfig(options.config);
  const logger = options.logger ?? createLogger('Pipeline');
  const eventBus = options.eventBus ?? new EventBus({ debug: false });
  const model = options.model ?? (await ModelFactory.create(config.model));
  const settings = options.agentSettings ?? {};

  const stages = createStageAgents({ model, logger }, settings);
  const orchestrator = createOrchestrator({ model, logger }, stages, {
    mode: config.delegationMode,
    maxSteps: config.maxSteps,
    skipSummarization: config.skipSummarization,
    ...settings[ORCHESTRATOR_NAME],
  });

  const sessionService = new InMemorySessionService({ maxMessages: config.maxMessages, now: options.now });
  const runner = new Runner({
    appName: config.appName,
    agent: orchestrator,
    sessionService,
    eventBus,
    logger: logger.child('runner'),
    now: options.now,
  });
  const sessionManager = new SessionManager({
    runner,
    sessionService,
    eventBus,
    logger: logger.child('session'),
  });

  logger.debug('Pipeline ready', {
    appName: config.appName,
    provider: config.model.provider,
    model: config.model.name,
    mode: config.delegationMode,
  });

  return { config, orchestrator, runner, sessionService, sessionManager, eventBus };
}
