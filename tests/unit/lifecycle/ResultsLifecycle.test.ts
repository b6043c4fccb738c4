import { describe, it, expect } from 'vitest';
import { ResultsLifecycle } from '../../../src/lifecycle/ResultsLifecycle';
import type { ReportEvent } from '../../../src/types/events';

const suiteFinished: ReportEvent = {
  eventType: 'testSuiteFinished',
  timestamp: 1,
  payload: { uuid: 'suite-1' }
};

describe('ResultsLifecycle', () => {
  it('should deliver events to listeners in registration order', () => {
    const lifecycle = new ResultsLifecycle();
    const calls: string[] = [];
    lifecycle.addListener(event => calls.push(`first:${event.eventType}`));
    lifecycle.addListener(event => calls.push(`second:${event.eventType}`));

    lifecycle.fire(suiteFinished);

    expect(calls).toEqual(['first:testSuiteFinished', 'second:testSuiteFinished']);
  });

  it('should keep delivering when a listener throws', () => {
    const lifecycle = new ResultsLifecycle();
    const received: ReportEvent[] = [];
    lifecycle.addListener(() => {
      throw new Error('listener failure');
    });
    lifecycle.addListener(event => received.push(event));

    expect(() => lifecycle.fire(suiteFinished)).not.toThrow();
    expect(received).toEqual([suiteFinished]);
  });

  it('should stop delivering to unsubscribed listeners', () => {
    const lifecycle = new ResultsLifecycle();
    const received: ReportEvent[] = [];
    const unsubscribe = lifecycle.addListener(event => received.push(event));

    lifecycle.fire(suiteFinished);
    unsubscribe();
    lifecycle.fire(suiteFinished);

    expect(received).toHaveLength(1);
  });

  it('should start without an output directory', () => {
    const lifecycle = new ResultsLifecycle();
    expect(lifecycle.getOutputDirectory()).toBeNull();

    lifecycle.setOutputDirectory('/tmp/results');
    expect(lifecycle.getOutputDirectory()).toBe('/tmp/results');
  });
});
