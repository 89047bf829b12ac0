import { describe, it, expect, vi } from 'vitest';

vi.mock('../logger', () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

import { ProgressReporter } from './progress';

describe('ProgressReporter', () => {
  it('delivers rounded values with the latest message', () => {
    const sink = vi.fn();
    const progress = new ProgressReporter(sink);

    progress.report(10.4, 'Extracting files...');
    progress.report(24.6);

    expect(sink.mock.calls).toEqual([
      [10, 'Extracting files...'],
      [25, 'Extracting files...'],
    ]);
  });

  it('clamps to 0..100', () => {
    const sink = vi.fn();
    const progress = new ProgressReporter(sink);

    progress.report(-5, 'low');
    progress.report(140, 'high');

    expect(sink.mock.calls.map(([value]) => value)).toEqual([0, 100]);
  });

  it('never goes backwards', () => {
    const sink = vi.fn();
    const progress = new ProgressReporter(sink);

    progress.report(60, 'ahead');
    progress.report(40, 'behind');

    expect(sink).toHaveBeenLastCalledWith(60, 'behind');
  });

  it('keeps going when the sink throws', () => {
    const seen: number[] = [];
    const progress = new ProgressReporter((value) => {
      seen.push(value);
      if (value === 50) throw new Error('display closed');
    });

    expect(() => progress.report(50, 'half')).not.toThrow();
    progress.report(40);

    expect(seen).toEqual([50, 50]);
  });

  it('works without a sink', () => {
    expect(() => new ProgressReporter().report(35)).not.toThrow();
  });
});
