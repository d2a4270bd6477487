/**
 * Fallback Orchestrator Tests
 */

import {
  FallbackOrchestrator,
  MethodFailureError,
  ServiceUnavailableError,
  nextState,
  paystubProfile,
} from '@payverify/shared';
import { NO_ADDRESS, PAGE_SET, ScriptedAdapter, VALIDATION, documentInput, paystubAnswer } from './helpers';

function employee(name: string) {
  return { name, address: NO_ADDRESS, ssn_masked: null };
}

function run(adapters: ScriptedAdapter[], enhancementMode: boolean, signal = new AbortController().signal) {
  return new FallbackOrchestrator(adapters).run(paystubProfile, documentInput('paystub'), PAGE_SET, signal, {
    enhancementMode,
    validation: VALIDATION,
  });
}

describe('nextState', () => {
  it('stops once the merge is sufficient', () => {
    expect(nextState('try_structured', true, true, false)).toBe('done');
  });

  it('goes straight to the visual method in enhancement mode', () => {
    expect(nextState('try_structured', true, true, true)).toBe('try_visual');
  });

  it('advances after a failed attempt', () => {
    expect(nextState('try_structured', false, true, false)).toBe('try_text');
    expect(nextState('try_text', true, false, false)).toBe('try_visual');
  });

  it('always ends after the visual method', () => {
    expect(nextState('try_visual', true, false, true)).toBe('done');
  });
});

describe('FallbackOrchestrator', () => {
  it('skips costlier methods once the cheap one is sufficient', async () => {
    const structured = new ScriptedAdapter('structured_table', {
      answer: paystubAnswer({ employee: employee('Jane Q Doe'), gross_pay_current: 4056.31 }),
    });
    const text = new ScriptedAdapter('raw_text', { answer: paystubAnswer() });
    const visual = new ScriptedAdapter('visual_analysis', { answer: paystubAnswer() });

    const result = await run([structured, text, visual], false);

    expect(text.calls).toBe(0);
    expect(visual.calls).toBe(0);
    expect(result.attempts).toHaveLength(1);
    expect(result.visualMode).toBeNull();
    expect(result.signals.visualAnalysisUsed).toBe(false);
  });

  it('falls through every method and merges what each one found', async () => {
    const structured = new ScriptedAdapter('structured_table', { error: new MethodFailureError('No tables detected') });
    const text = new ScriptedAdapter('raw_text', { answer: paystubAnswer({ employee: employee('Jane Q Doe') }) });
    const visual = new ScriptedAdapter('visual_analysis', { answer: paystubAnswer({ net_pay_current: 2769.8 }) });

    const result = await run([structured, text, visual], false);

    expect(result.attempts.map((a) => [a.method, a.outcome, a.mode])).toEqual([
      ['structured_table', 'failed', 'fallback'],
      ['raw_text', 'partial_success', 'fallback'],
      ['visual_analysis', 'partial_success', 'fallback'],
    ]);
    expect(result.merged.get('employee.name')?.source).toBe('raw_text');
    expect(result.merged.get('financials.net_pay_current')?.source).toBe('visual_analysis');
    expect(result.visualMode).toBe('fallback');
    expect(result.signals.visualAnalysisUsed).toBe(true);
  });

  it('keeps earlier values and only fills gaps from later methods', async () => {
    const structured = new ScriptedAdapter('structured_table', {
      answer: paystubAnswer({ employee: employee('Jane Q Doe'), gross_pay_current: 4056.31 }),
    });
    const visual = new ScriptedAdapter('visual_analysis', {
      answer: paystubAnswer({ employee: employee('J. Doe'), net_pay_current: 2769.8 }),
    });

    const result = await run([structured, visual], true);

    expect(result.merged.value('employee.name')).toBe('Jane Q Doe');
    expect(result.merged.get('financials.net_pay_current')).toEqual({
      value: '2769.80',
      source: 'visual_analysis',
      confidence: 0.9,
    });
    expect(result.overrides).toEqual([]);
    expect(visual.modes).toEqual(['enhancement']);
    expect(visual.mergedSeen[0]).toEqual({
      'employee.name': 'Jane Q Doe',
      'financials.gross_pay_current': '4056.31',
    });
  });

  it('replaces a contradicted field with the later reading', async () => {
    const structured = new ScriptedAdapter('structured_table', {
      answer: paystubAnswer({
        employee: employee('Sam Lee'),
        gross_pay_current: 5000,
        earnings: [
          {
            description: 'Regular',
            rate: null,
            hours: null,
            current_amount: 4900,
            ytd_amount: null,
            is_employer_contribution: false,
          },
        ],
      }),
    });
    const visual = new ScriptedAdapter('visual_analysis', { answer: paystubAnswer({ gross_pay_current: 4900 }) });

    const result = await run([structured, visual], true);

    expect(result.overrides).toEqual([
      {
        field: 'financials.gross_pay_current',
        replaced_source: 'structured_table',
        source: 'visual_analysis',
        reason: 'gross_earnings_mismatch',
      },
    ]);
    expect(result.merged.value('financials.gross_pay_current')).toBe('4900.00');
    expect(result.merged.get('earnings')?.source).toBe('structured_table');
  });

  it('records an unavailable visual service and keeps the merge', async () => {
    const text = new ScriptedAdapter('raw_text', { answer: paystubAnswer({ employee: employee('Jane Q Doe') }) });
    const visual = new ScriptedAdapter('visual_analysis', {
      error: new ServiceUnavailableError('Vision service returned 503'),
    });

    const result = await run([text, visual], false);

    expect(result.attempts.map((a) => a.outcome)).toEqual(['partial_success', 'unavailable']);
    expect(result.attempts[1].error).toEqual({
      kind: 'service_unavailable',
      message: 'Vision service returned 503',
    });
    expect(result.merged.value('employee.name')).toBe('Jane Q Doe');
    expect(result.signals.visualAnalysisUsed).toBe(false);
  });

  it('abandons a method still running at the deadline', async () => {
    const controller = new AbortController();
    const structured = new ScriptedAdapter('structured_table', { waitFor: new Promise<void>(() => undefined) });
    const text = new ScriptedAdapter('raw_text', { answer: paystubAnswer() });
    setTimeout(() => controller.abort(), 10);

    const result = await run([structured, text], false, controller.signal);

    expect(result.timedOut).toBe(true);
    expect(result.attempts).toHaveLength(1);
    expect(result.attempts[0]).toMatchObject({
      method: 'structured_table',
      outcome: 'unavailable',
      error: { kind: 'pipeline_timeout' },
    });
    expect(text.calls).toBe(0);
  });

  it('attempts nothing when the deadline has already passed', async () => {
    const controller = new AbortController();
    controller.abort();
    const structured = new ScriptedAdapter('structured_table', { answer: paystubAnswer() });

    const result = await run([structured], false, controller.signal);

    expect(result.timedOut).toBe(true);
    expect(result.attempts).toEqual([]);
    expect(structured.calls).toBe(0);
  });
});
