import 'reflect-metadata';
import 'dotenv/config';
import { createApp } from './app';
import { container } from './container';
import { validateAndExitOnErrors } from './config/validateEnv';
import { IAgentStateRepository } from './domain/repositories/IAgentStateRepository';
import { AgentRegistry } from './infrastructure/council/AgentRegistry';
import { IterationOrchestrator } from './infrastructure/council/IterationOrchestrator';
import { CouncilEventEmitter } from './infrastructure/council/events/CouncilEventEmitter';
import { CouncilController } from './interfaces/controllers/CouncilController';
import { GracefulShutdown } from './infrastructure/GracefulShutdown';
import { logger } from './infrastructure/logging/Logger';

const PORT = parseInt(process.env.PORT || '3000', 10);
const HOST = process.env.HOST || '0.0.0.0';

async function startServer() {
  validateAndExitOnErrors();

  const registry = container.get<AgentRegistry>('AgentRegistry');
  const agentState = container.get<IAgentStateRepository>('AgentStateRepository');
  await registry.load(agentState);

  const orchestrator = container.get<IterationOrchestrator>('IterationOrchestrator');
  const pending = await orchestrator.recover();
  if (pending) {
    logger.info('Recovered iteration on startup', {
      iterationIndex: pending.iterationIndex,
      status: pending.status
    });
  }

  const events = container.get<CouncilEventEmitter>('CouncilEventEmitter');
  events.subscribe('state', (event) => {
    logger.debug('Council state changed', { ...event });
  });

  const app = createApp(container.get<CouncilController>('CouncilController'));

  const server = app.listen(PORT, HOST, () => {
    logger.info(`Campaign council server running on port ${PORT}`, {
      host: HOST,
      environment: process.env.NODE_ENV || 'development'
    });
  });

  // generation calls from several agents can take a while
  server.requestTimeout = 120000;

  const gracefulShutdown = new GracefulShutdown(server);
  gracefulShutdown.register('wait for running iteration', () => orchestrator.drain());
  gracefulShutdown.register('persist agent state', () => registry.persist(agentState));
}

startServer().catch(error => {
  logger.error('Server startup failed', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
