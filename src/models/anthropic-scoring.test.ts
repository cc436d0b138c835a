import { describe, it, expect } from 'vitest';
import { AnthropicScoringModel, extractJsonObject } from './anthropic-scoring.js';
import { FakeMessages, message, text } from '../test-utils/mocks.js';

describe('anthropic scoring adapter', () => {
  it('should extract the JSON object from surrounding prose', () => {
    expect(extractJsonObject('Verdict:\n{"riskLevel":"low","reasons":[]}\nThanks')).toEqual({ riskLevel: 'low', reasons: [] });
    expect(() => extractJsonObject('no verdict here')).toThrow('watchdog reply contained no JSON object');
  });

  it('should score deterministically and pass the abort signal through', async () => {
    const messages = new FakeMessages(message([text('{"riskLevel":"medium","reasons":["out_of_policy"],"notes":"n"}')]));
    const model = new AnthropicScoringModel(messages, { model: 'watchdog', maxTokens: 128 });
    const controller = new AbortController();
    const request = { correlationId: 'turn-1', promptSummary: 'p', answerSummary: 'a', toolsUsed: [], anomalyCount: 0 };

    const raw = await model.score(request, controller.signal);

    expect(raw).toEqual({ riskLevel: 'medium', reasons: ['out_of_policy'], notes: 'n' });
    expect(messages.bodies[0].temperature).toBe(0);
    expect(messages.bodies[0].messages).toEqual([{ role: 'user', content: JSON.stringify(request) }]);
    expect(messages.signals[0]).toBe(controller.signal);
  });
});
