import { Request, Response } from 'express';
import { injectable, inject } from 'inversify';
import { RunIterationUseCase } from '../../application/useCases/RunIterationUseCase';
import { SubmitOutcomeUseCase } from '../../application/useCases/SubmitOutcomeUseCase';
import { ICouncilService } from '../../domain/services/ICouncilService';
import { IterationStatus } from '../../domain/entities/IterationRecord';
import {
  compareQuerySchema,
  iterationIndexParamsSchema,
  outcomeSchema,
  parseRequest,
  runIterationBodySchema
} from '../validation/schemas';

@injectable()
export class CouncilController {
  constructor(
    @inject('RunIterationUseCase') private runIterationUseCase: RunIterationUseCase,
    @inject('SubmitOutcomeUseCase') private submitOutcomeUseCase: SubmitOutcomeUseCase,
    @inject('ICouncilService') private councilService: ICouncilService
  ) {}

  async listAgents(_req: Request, res: Response): Promise<void> {
    const agents = this.councilService.listAgents().map(agent => ({
      ...agent.toRecord(),
      winRate: agent.getWinRate()
    }));
    res.status(200).json({ success: true, data: agents });
  }

  async getHistory(_req: Request, res: Response): Promise<void> {
    const history = await this.councilService.getHistory();
    res.status(200).json({ success: true, data: history });
  }

  async getWeightSeries(_req: Request, res: Response): Promise<void> {
    const series = await this.councilService.getWeightSeries();
    res.status(200).json({ success: true, data: series });
  }

  async runIteration(req: Request, res: Response): Promise<void> {
    const body = parseRequest(runIterationBodySchema, req.body);

    // client went away before a response was written
    const controller = new AbortController();
    const onClose = () => {
      if (!res.writableFinished) {
        controller.abort();
      }
    };
    res.on('close', onClose);

    try {
      const record = await this.runIterationUseCase.execute({
        context: body.context,
        outcome: body.outcome,
        deferOutcome: body.deferOutcome,
        signal: controller.signal
      });
      res.status(record.status === IterationStatus.COMPLETED ? 201 : 202).json({ success: true, data: record });
    } finally {
      res.off('close', onClose);
    }
  }

  async getIteration(req: Request, res: Response): Promise<void> {
    const { index } = parseRequest(iterationIndexParamsSchema, req.params);
    const record = await this.councilService.getIteration(index);
    res.status(200).json({ success: true, data: record });
  }

  async submitOutcome(req: Request, res: Response): Promise<void> {
    const { index } = parseRequest(iterationIndexParamsSchema, req.params);
    const outcome = parseRequest(outcomeSchema, req.body);
    const record = await this.submitOutcomeUseCase.execute({ iterationIndex: index, outcome });
    res.status(200).json({ success: true, data: record });
  }

  async compareIterations(req: Request, res: Response): Promise<void> {
    const { a, b } = parseRequest(compareQuerySchema, req.query);
    const comparison = await this.councilService.compareIterations(a, b);
    res.status(200).json({ success: true, data: comparison });
  }
}
