import 'reflect-metadata';
import path from 'path';
import { Container } from 'inversify';
import { CouncilConfig, getCouncilConfig } from './config/councilConfig';
import { IAgentStateRepository } from './domain/repositories/IAgentStateRepository';
import { IIterationRepository } from './domain/repositories/IIterationRepository';
import { IWeightHistoryRepository } from './domain/repositories/IWeightHistoryRepository';
import { ICouncilService } from './domain/services/ICouncilService';
import { IContentRenderer } from './domain/services/IContentRenderer';
import { IGenerationService } from './domain/services/IGenerationService';
import { IOutcomeProvider } from './domain/services/IOutcomeProvider';
import { ITrendService } from './domain/services/ITrendService';
import { FileAgentStateRepository, readRosterFile } from './infrastructure/repositories/FileAgentStateRepository';
import { FileWeightHistoryRepository } from './infrastructure/repositories/FileWeightHistoryRepository';
import { FileIterationRepository } from './infrastructure/repositories/FileIterationRepository';
import {
  InMemoryAgentStateRepository,
  InMemoryIterationRepository,
  InMemoryWeightHistoryRepository
} from './infrastructure/repositories/InMemoryCouncilRepositories';
import { OpenAIGenerationService } from './infrastructure/generation/OpenAIGenerationService';
import { ClaudeGenerationService } from './infrastructure/generation/ClaudeGenerationService';
import { GeminiGenerationService } from './infrastructure/generation/GeminiGenerationService';
import { MockGenerationService } from './infrastructure/generation/MockGenerationService';
import { SampleTrendService } from './infrastructure/trends/SampleTrendService';
import { TemplateContentRenderer } from './infrastructure/content/TemplateContentRenderer';
import { SimulatedEngagementProvider } from './infrastructure/outcomes/SimulatedEngagementProvider';
import { AgentRegistry } from './infrastructure/council/AgentRegistry';
import { ProposalStage } from './infrastructure/council/ProposalStage';
import { CritiqueStage } from './infrastructure/council/CritiqueStage';
import { ArbitrationStage } from './infrastructure/council/ArbitrationStage';
import { LearningLoop } from './infrastructure/council/LearningLoop';
import { IterationOrchestrator } from './infrastructure/council/IterationOrchestrator';
import { CouncilEventEmitter } from './infrastructure/council/events/CouncilEventEmitter';
import { RunIterationUseCase } from './application/useCases/RunIterationUseCase';
import { SubmitOutcomeUseCase } from './application/useCases/SubmitOutcomeUseCase';
import { CouncilController } from './interfaces/controllers/CouncilController';

/**
 * Builds the council container. Configuration is read from the environment unless
 * one is supplied.
 */
export function createContainer(config?: CouncilConfig): Container {
  const container = new Container();

  if (config) {
    container.bind<CouncilConfig>('CouncilConfig').toConstantValue(config);
  } else {
    container.bind<CouncilConfig>('CouncilConfig').toDynamicValue(() => getCouncilConfig()).inSingletonScope();
  }

  // Repositories - file snapshots by default, in-memory when COUNCIL_STORAGE=memory
  container.bind<IAgentStateRepository>('AgentStateRepository').toDynamicValue((context) => {
    const { storage, stateDir, agentsPath } = context.container.get<CouncilConfig>('CouncilConfig');
    return storage === 'memory'
      ? new InMemoryAgentStateRepository(() => readRosterFile(agentsPath))
      : new FileAgentStateRepository(path.join(stateDir, 'agents.json'), agentsPath);
  }).inSingletonScope();

  container.bind<IWeightHistoryRepository>('WeightHistoryRepository').toDynamicValue((context) => {
    const { storage, stateDir } = context.container.get<CouncilConfig>('CouncilConfig');
    return storage === 'memory'
      ? new InMemoryWeightHistoryRepository()
      : new FileWeightHistoryRepository(path.join(stateDir, 'history.jsonl'));
  }).inSingletonScope();

  container.bind<IIterationRepository>('IterationRepository').toDynamicValue((context) => {
    const { storage, stateDir } = context.container.get<CouncilConfig>('CouncilConfig');
    return storage === 'memory'
      ? new InMemoryIterationRepository()
      : new FileIterationRepository(path.join(stateDir, 'iterations'));
  }).inSingletonScope();

  // Generation backends - only the configured one is ever constructed
  container.bind<IGenerationService>('OpenAIGenerationService').to(OpenAIGenerationService);
  container.bind<IGenerationService>('ClaudeGenerationService').to(ClaudeGenerationService);
  container.bind<IGenerationService>('GeminiGenerationService').to(GeminiGenerationService);
  container.bind<IGenerationService>('MockGenerationService').to(MockGenerationService);

  container.bind<IGenerationService>('GenerationService').toDynamicValue((context) => {
    const { generationProvider } = context.container.get<CouncilConfig>('CouncilConfig');
    switch (generationProvider) {
      case 'openai':
        return context.container.get<IGenerationService>('OpenAIGenerationService');
      case 'claude':
        return context.container.get<IGenerationService>('ClaudeGenerationService');
      case 'gemini':
        return context.container.get<IGenerationService>('GeminiGenerationService');
      default:
        return context.container.get<IGenerationService>('MockGenerationService');
    }
  }).inSingletonScope();

  // Collaborators around the council
  container.bind<ITrendService>('TrendService').to(SampleTrendService).inSingletonScope();
  container.bind<IContentRenderer>('ContentRenderer').to(TemplateContentRenderer).inSingletonScope();
  container.bind<IOutcomeProvider>('SimulatedOutcomeProvider').toDynamicValue(() => new SimulatedEngagementProvider());

  // Council
  container.bind<AgentRegistry>('AgentRegistry').to(AgentRegistry).inSingletonScope();
  container.bind<ProposalStage>('ProposalStage').to(ProposalStage);
  container.bind<CritiqueStage>('CritiqueStage').to(CritiqueStage);
  container.bind<ArbitrationStage>('ArbitrationStage').to(ArbitrationStage);
  container.bind<LearningLoop>('LearningLoop').to(LearningLoop);
  container.bind<CouncilEventEmitter>('CouncilEventEmitter').to(CouncilEventEmitter).inSingletonScope();
  container.bind<IterationOrchestrator>('IterationOrchestrator').to(IterationOrchestrator).inSingletonScope();
  container.bind<ICouncilService>('ICouncilService').toDynamicValue(
    (context) => context.container.get<IterationOrchestrator>('IterationOrchestrator')
  );

  // Use Cases
  container.bind<RunIterationUseCase>('RunIterationUseCase').to(RunIterationUseCase);
  container.bind<SubmitOutcomeUseCase>('SubmitOutcomeUseCase').to(SubmitOutcomeUseCase);

  container.bind<CouncilController>('CouncilController').to(CouncilController);

  return container;
}

const container = createContainer();

export { container };
