import { Request, Response } from 'express';
import { CouncilController } from '../../interfaces/controllers/CouncilController';
import { RunIterationUseCase } from '../../application/useCases/RunIterationUseCase';
import { SubmitOutcomeUseCase } from '../../application/useCases/SubmitOutcomeUseCase';
import { errorHandler, notFoundHandler } from '../../interfaces/middleware/errorMiddleware';
import { ICouncilService, IterationComparison, RunIterationOptions } from '../../domain/services/ICouncilService';
import { IOutcomeProvider } from '../../domain/services/IOutcomeProvider';
import { Agent } from '../../domain/entities/Agent';
import { CampaignContext } from '../../domain/entities/CampaignContext';
import { IterationRecord, IterationStatus } from '../../domain/entities/IterationRecord';
import { EngagementOutcome } from '../../domain/valueObjects/EngagementOutcome';
import { WeightHistoryEntry } from '../../domain/valueObjects/WeightHistoryEntry';
import { AppError, ErrorCode } from '../../domain/errors/AppError';
import { IterationStateError } from '../../domain/errors/CouncilErrors';
import { makeRecord } from '../helpers/councilFixtures';

class FakeCouncilService implements ICouncilService {
  readonly contexts: CampaignContext[] = [];
  readonly signals: Array<AbortSignal | undefined> = [];
  readonly submitted: Array<[number, EngagementOutcome]> = [];
  readonly compared: Array<[number, number]> = [];

  async runIteration(
    context: CampaignContext,
    outcomeProvider: IOutcomeProvider,
    options: RunIterationOptions = {}
  ): Promise<IterationRecord> {
    this.contexts.push(context);
    this.signals.push(options.signal);
    const pending = makeRecord({ context });
    const outcome = await outcomeProvider.estimate(pending);
    return outcome ? { ...pending, status: IterationStatus.COMPLETED, outcome } : pending;
  }

  async submitOutcome(iterationIndex: number, outcome: EngagementOutcome): Promise<IterationRecord> {
    this.submitted.push([iterationIndex, outcome]);
    return makeRecord({ iterationIndex, status: IterationStatus.COMPLETED, outcome });
  }

  async getIteration(iterationIndex: number): Promise<IterationRecord> {
    if (iterationIndex !== 1) {
      throw AppError.notFound(`Iteration ${iterationIndex} not found`);
    }
    return makeRecord();
  }

  listAgents(): ReadonlyArray<Agent> {
    return [new Agent('viral', 'Viral Hunter', 'reach', 'bold', ['go viral'], 1.2, 3, 1)];
  }

  async getHistory(): Promise<WeightHistoryEntry[]> {
    return [];
  }

  async getWeightSeries(): Promise<Record<string, number[]>> {
    return { viral: [1.2] };
  }

  async compareIterations(a: number, b: number): Promise<IterationComparison> {
    this.compared.push([a, b]);
    throw new IterationStateError(`Iteration ${b} has no outcome yet`);
  }
}

interface MockResponse {
  statusCode?: number;
  body?: unknown;
  writableFinished: boolean;
  headersSent: boolean;
  status: jest.Mock;
  json: jest.Mock;
  on: jest.Mock;
  off: jest.Mock;
}

function mockResponse(): MockResponse {
  const res: MockResponse = {
    writableFinished: false,
    headersSent: false,
    status: jest.fn(),
    json: jest.fn(),
    on: jest.fn(),
    off: jest.fn()
  };
  res.status.mockImplementation((code: number) => {
    res.statusCode = code;
    return res;
  });
  res.json.mockImplementation((body: unknown) => {
    res.body = body;
    return res;
  });
  return res;
}

function asRequest(parts: { body?: unknown; params?: Record<string, string>; query?: Record<string, string> }): Request {
  return { params: {}, query: {}, path: '/api/council', method: 'POST', ...parts } as unknown as Request;
}

function asResponse(res: MockResponse): Response {
  return res as unknown as Response;
}

const context = {
  brandName: 'Acme',
  industry: 'Technology',
  productInfo: 'Task planner',
  targetAudience: 'Students'
};

describe('CouncilController', () => {
  let service: FakeCouncilService;
  let controller: CouncilController;
  const simulated: IOutcomeProvider = {
    estimate: async () => ({ overallScore: 6.1, source: 'simulated' })
  };

  beforeEach(() => {
    service = new FakeCouncilService();
    controller = new CouncilController(
      new RunIterationUseCase(service, simulated),
      new SubmitOutcomeUseCase(service),
      service
    );
  });

  it('should list agents with their win rate', async () => {
    const res = mockResponse();

    await controller.listAgents(asRequest({}), asResponse(res));

    expect(res.statusCode).toBe(200);
    expect(res.body).toMatchObject({
      success: true,
      data: [{ id: 'viral', weight: 1.2, wins: 3, losses: 1, winRate: 0.75 }]
    });
  });

  it('should answer 201 for an iteration completed with a supplied outcome', async () => {
    const res = mockResponse();

    await controller.runIteration(asRequest({ body: { context, outcome: { overallScore: 8 } } }), asResponse(res));

    expect(res.statusCode).toBe(201);
    expect(res.body).toMatchObject({ success: true, data: { outcome: { overallScore: 8, source: 'supplied' } } });
    expect(service.signals[0]).toBeInstanceOf(AbortSignal);
    expect(res.off).toHaveBeenCalledWith('close', expect.any(Function));
  });

  it('should fall back to the simulated outcome', async () => {
    const res = mockResponse();

    await controller.runIteration(asRequest({ body: { context } }), asResponse(res));

    expect(res.body).toMatchObject({ data: { outcome: { overallScore: 6.1, source: 'simulated' } } });
  });

  it('should answer 202 when the outcome is deferred', async () => {
    const res = mockResponse();

    await controller.runIteration(asRequest({ body: { context, deferOutcome: true } }), asResponse(res));

    expect(res.statusCode).toBe(202);
    expect(res.body).toMatchObject({ data: { status: IterationStatus.AWAITING_OUTCOME } });
  });

  it('should abort the iteration when the client disconnects early', async () => {
    const res = mockResponse();
    res.on.mockImplementation((event: string, listener: () => void) => {
      if (event === 'close') {
        listener();
      }
      return res;
    });

    await controller.runIteration(asRequest({ body: { context, deferOutcome: true } }), asResponse(res));

    expect(service.signals[0]?.aborted).toBe(true);
  });

  it('should reject a body asking for both a supplied and a deferred outcome', async () => {
    const res = mockResponse();

    await expect(
      controller.runIteration(
        asRequest({ body: { context, outcome: { overallScore: 8 }, deferOutcome: true } }),
        asResponse(res)
      )
    ).rejects.toMatchObject({ code: ErrorCode.VALIDATION_ERROR, statusCode: 400 });
    expect(service.contexts).toEqual([]);
  });

  it('should reject a context missing required fields', async () => {
    const res = mockResponse();

    await expect(
      controller.runIteration(asRequest({ body: { context: { brandName: 'Acme' } } }), asResponse(res))
    ).rejects.toMatchObject({
      message: 'Validation failed',
      details: [
        { field: 'context.industry', message: '"context.industry" is required' },
        { field: 'context.productInfo', message: '"context.productInfo" is required' },
        { field: 'context.targetAudience', message: '"context.targetAudience" is required' }
      ]
    });
  });

  it('should submit an outcome as supplied for the iteration in the path', async () => {
    const res = mockResponse();

    await controller.submitOutcome(
      asRequest({ params: { index: '4' }, body: { overallScore: 7.5 } }),
      asResponse(res)
    );

    expect(service.submitted).toEqual([[4, { overallScore: 7.5, source: 'supplied' }]]);
    expect(res.statusCode).toBe(200);
  });

  it('should reject an out-of-range outcome score', async () => {
    await expect(
      controller.submitOutcome(asRequest({ params: { index: '1' }, body: { overallScore: 12 } }), asResponse(mockResponse()))
    ).rejects.toMatchObject({
      details: [{ field: 'overallScore', message: 'Outcome score must be between 0 and 10' }]
    });
  });

  it('should parse numeric path and query parameters', async () => {
    const res = mockResponse();
    await controller.getIteration(asRequest({ params: { index: '1' } }), asResponse(res));
    expect(res.body).toMatchObject({ data: { iterationIndex: 1 } });

    await expect(
      controller.compareIterations(asRequest({ query: { a: '1', b: '2' } }), asResponse(mockResponse()))
    ).rejects.toBeInstanceOf(IterationStateError);
    expect(service.compared).toEqual([[1, 2]]);

    await expect(
      controller.getIteration(asRequest({ params: { index: 'latest' } }), asResponse(mockResponse()))
    ).rejects.toMatchObject({ code: ErrorCode.VALIDATION_ERROR });
  });
});

describe('errorHandler', () => {
  it('should answer with the status and code of an AppError', () => {
    const res = mockResponse();
    const next = jest.fn();

    errorHandler(
      new IterationStateError('Iteration 1 is still waiting for its outcome', { iterationIndex: 1 }),
      asRequest({}),
      asResponse(res),
      next
    );

    expect(res.statusCode).toBe(409);
    expect(res.body).toEqual({
      success: false,
      error: 'Iteration 1 is still waiting for its outcome',
      code: ErrorCode.ITERATION_STATE,
      details: { iterationIndex: 1 }
    });
    expect(next).not.toHaveBeenCalled();
  });

  it('should hide unexpected errors outside development', () => {
    const res = mockResponse();

    errorHandler(new Error('boom'), asRequest({}), asResponse(res), jest.fn());

    expect(res.statusCode).toBe(500);
    expect(res.body).toEqual({ success: false, error: 'Internal server error', code: ErrorCode.INTERNAL_ERROR });
  });

  it('should answer unknown routes with a not-found error', () => {
    const res = mockResponse();

    notFoundHandler(asRequest({}), asResponse(res));

    expect(res.statusCode).toBe(404);
    expect(res.body).toEqual({ success: false, error: 'Route not found', code: ErrorCode.NOT_FOUND });
  });
});
