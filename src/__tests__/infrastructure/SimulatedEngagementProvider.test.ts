import { SimulatedEngagementProvider } from '../../infrastructure/outcomes/SimulatedEngagementProvider';
import { Critique, CritiqueCategory } from '../../domain/entities/Critique';
import { makeRecord } from '../helpers/councilFixtures';

describe('SimulatedEngagementProvider', () => {
  it('should produce the lowest estimate from minimal draws', async () => {
    const provider = new SimulatedEngagementProvider(() => 0);

    const outcome = await provider.estimate(makeRecord());

    expect(outcome).toEqual({
      overallScore: 1.9,
      predictedReach: 3050,
      riskScore: 10,
      source: 'simulated',
      metrics: { likes: 2000, shares: 100, comments: 50, sentiment: 0.6 }
    });
  });

  it('should stay below the success threshold even at maximal draws', async () => {
    const provider = new SimulatedEngagementProvider(() => 0.999999);

    const outcome = await provider.estimate(makeRecord());

    expect(outcome.metrics).toEqual({ likes: 8000, shares: 500, comments: 200, sentiment: 0.9 });
    expect(outcome.overallScore).toBe(6.4);
  });

  it('should derive the risk score from non-degraded risk critiques on the chosen proposal', async () => {
    const provider = new SimulatedEngagementProvider(() => 0.5);
    const record = makeRecord({
      critiques: [
        new Critique('a', 'guardian', '1:viral:0', CritiqueCategory.RISK, 'edgy'),
        new Critique('b', 'analyst', '1:viral:0', CritiqueCategory.GOAL_CONFLICT, 'wrong audience'),
        new Critique('c', 'platform', '1:viral:0', CritiqueCategory.MISSED_OPPORTUNITY, '', true),
        new Critique('d', 'viral', '1:guardian:0', CritiqueCategory.RISK, 'dull')
      ]
    });

    const outcome = await provider.estimate(record);

    expect(outcome.riskScore).toBe(3.33);
  });

  it('should report no risk when the chosen proposal drew no critiques', async () => {
    const provider = new SimulatedEngagementProvider(() => 0.5);

    const outcome = await provider.estimate(makeRecord({ critiques: [] }));

    expect(outcome.riskScore).toBe(0);
  });
});
