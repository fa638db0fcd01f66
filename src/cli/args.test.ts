import { describe, it, expect } from 'vitest';
import { overridesFromArgs, parseArgs } from './args.js';

describe('parseArgs', () => {
  it('collects KEY=value pairs with uppercased keys', () => {
    expect(parseArgs(['targets=10.0.0.1', 'PORTS=80,554', 'verbose', '=x', 'PATHS=/a=b'])).toEqual({
      TARGETS: '10.0.0.1',
      PORTS: '80,554',
      PATHS: '/a=b',
    });
  });

  it('lets later pairs win', () => {
    expect(parseArgs(['CONCURRENCY=4', 'concurrency=8'])).toEqual({ CONCURRENCY: '8' });
  });
});

describe('overridesFromArgs', () => {
  it('turns arguments into scan overrides', () => {
    expect(
      overridesFromArgs({ TARGETS: '10.0.0.1;10.0.0.2', PORTS: '80, 554', PATHS: 'video,/mjpeg', CONCURRENCY: '16' }, {})
    ).toEqual({
      targets: '10.0.0.1;10.0.0.2',
      ports: [80, 554],
      paths: ['/video', '/mjpeg'],
      concurrency: 16,
    });
  });

  it('takes targets from the environment when none are given', () => {
    expect(overridesFromArgs({}, { CAMSWEEP_TARGETS: '192.168.0.0/24' })).toEqual({ targets: '192.168.0.0/24' });
    expect(overridesFromArgs({ TARGETS: '10.0.0.1' }, { CAMSWEEP_TARGETS: '192.168.0.0/24' })).toEqual({
      targets: '10.0.0.1',
    });
  });

  it('returns no overrides for no arguments', () => {
    expect(overridesFromArgs({}, {})).toEqual({});
  });

  it('rejects bad ports and concurrency', () => {
    expect(() => overridesFromArgs({ PORTS: '80,http' }, {})).toThrow('Invalid port in PORTS: http');
    expect(() => overridesFromArgs({ PORTS: '70000' }, {})).toThrow('Invalid port in PORTS: 70000');
    expect(() => overridesFromArgs({ CONCURRENCY: '0' }, {})).toThrow('Invalid CONCURRENCY: 0');
  });
});
