/**
 * Rate-limited Visual Service Tests
 */

import { ServiceTimeoutError, createRateLimitedVisualService, type VisualAnalysisRequest } from '@payverify/shared';
import { FakeVisualService, PAGE_SET } from './helpers';

function request(documentId: string): VisualAnalysisRequest {
  return {
    documentId,
    filename: `${documentId}.pdf`,
    page: PAGE_SET.pages[0],
    systemPrompt: 'system',
    userPrompt: 'user',
    responseSchema: { name: 'test_response', strict: true, schema: { type: 'object' } },
  };
}

describe('createRateLimitedVisualService', () => {
  it('keeps at most maxConcurrent requests in flight', async () => {
    let active = 0;
    let peak = 0;
    const inner = new FakeVisualService(async (req) => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 10));
      active--;
      return { documentId: req.documentId };
    });
    const service = createRateLimitedVisualService(inner, 2);

    const answers = await Promise.all(['a', 'b', 'c', 'd', 'e'].map((id) => service.analyze(request(id))));

    expect(answers).toEqual([
      { documentId: 'a' },
      { documentId: 'b' },
      { documentId: 'c' },
      { documentId: 'd' },
      { documentId: 'e' },
    ]);
    expect(peak).toBe(2);
    expect(inner.requests).toHaveLength(5);
  });

  it('does not call the service once the caller has given up', async () => {
    const inner = new FakeVisualService(async () => ({}));
    const service = createRateLimitedVisualService(inner, 1);
    const controller = new AbortController();
    controller.abort();

    await expect(service.analyze(request('a'), controller.signal)).rejects.toThrow(ServiceTimeoutError);
    expect(inner.requests).toHaveLength(0);
  });
});
