import { afterEach, describe, expect, it, vi } from 'vitest';

import { getStartupChecks, summarizeStartupChecks } from '../startup';

function check(name: string, report = getStartupChecks()) {
  return report.checks.find((c) => c.name === name);
}

describe('startup checks', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('runs every check in order', () => {
    expect(getStartupChecks().checks.map((c) => c.name)).toEqual([
      'browser-capabilities',
      'rendering-context',
      'viewport-size',
      'web-workers',
      'runtime-config',
    ]);
  });

  it('passes with valid environment', () => {
    const report = getStartupChecks();
    expect(report.ok).toBe(true);
    expect(check('rendering-context', report)?.message).toBe('WebGL2 context available');
    expect(summarizeStartupChecks(report)).toBe('Startup checks: all passed');
  });

  it('prefers WebGPU when the browser exposes it', () => {
    vi.stubGlobal('navigator', { gpu: {} });
    expect(check('rendering-context')?.message).toBe('WebGPU available');
  });

  it('fails when no rendering context is available', () => {
    vi.spyOn(HTMLCanvasElement.prototype, 'getContext').mockReturnValue(null);

    const report = getStartupChecks();
    const rendering = check('rendering-context', report);
    expect(rendering?.passed).toBe(false);
    expect(rendering?.message).toBe('Neither WebGPU nor WebGL2 is available');
    expect(report.ok).toBe(false);
    expect(summarizeStartupChecks(report)).toBe('Startup checks: failed (rendering-context)');
  });

  it('fails when requestAnimationFrame is unavailable', () => {
    vi.stubGlobal('requestAnimationFrame', undefined);

    const report = getStartupChecks();
    expect(check('browser-capabilities', report)?.message).toBe('requestAnimationFrame is missing');
    expect(report.ok).toBe(false);
  });

  it('fails on an empty viewport', () => {
    vi.stubGlobal('innerWidth', 0);
    expect(check('viewport-size')?.passed).toBe(false);
  });

  it('does not fail startup without Web Workers', () => {
    vi.stubGlobal('Worker', undefined);
    const report = getStartupChecks();
    const workers = check('web-workers', report);
    expect(workers?.passed).toBe(false);
    expect(workers?.required).toBe(false);
    expect(report.ok).toBe(true);
  });

  it('reports Web Workers when present', () => {
    vi.stubGlobal('Worker', class {});
    expect(check('web-workers')?.passed).toBe(true);
  });

  it('fails on an invalid runtime config', () => {
    const report = getStartupChecks({ chunkSize: 0 });
    const config = check('runtime-config', report);
    expect(config?.passed).toBe(false);
    expect(config?.message).toMatch(/^chunkSize must be greater than 0/);
    expect(summarizeStartupChecks(report)).toBe('Startup checks: failed (runtime-config)');
  });
});
