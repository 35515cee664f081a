/**
 * Environment checks run before the viewer boots. Required checks block
 * startup; optional ones only change how the viewer runs.
 */

import { validateAndLoadConfig, type RuntimeConfig } from './config';

export interface StartupCheck {
  name: string;
  passed: boolean;
  message: string;
  required?: boolean;
}

export interface StartupReport {
  checks: StartupCheck[];
  ok: boolean;
}

function checkBrowserCapabilities(): StartupCheck {
  if (typeof window === 'undefined' || typeof document === 'undefined') {
    return {
      name: 'browser-capabilities',
      passed: false,
      message: 'Browser APIs are not available (document/window missing)',
      required: true,
    };
  }

  if (typeof window.requestAnimationFrame !== 'function') {
    return {
      name: 'browser-capabilities',
      passed: false,
      message: 'requestAnimationFrame is missing',
      required: true,
    };
  }

  return { name: 'browser-capabilities', passed: true, message: 'Browser capabilities are present', required: true };
}

function checkRenderingContext(): StartupCheck {
  if (typeof document === 'undefined') {
    return {
      name: 'rendering-context',
      passed: false,
      message: 'Document API is not available',
      required: true,
    };
  }

  if (typeof navigator !== 'undefined' && 'gpu' in navigator) {
    return { name: 'rendering-context', passed: true, message: 'WebGPU available', required: true };
  }

  const canvas = document.createElement('canvas');
  const context = canvas.getContext('webgl2');

  return {
    name: 'rendering-context',
    passed: Boolean(context),
    message: context ? 'WebGL2 context available' : 'Neither WebGPU nor WebGL2 is available',
    required: true,
  };
}

function checkViewport(): StartupCheck {
  if (typeof window === 'undefined') {
    return {
      name: 'viewport-size',
      passed: false,
      message: 'Window object is not available',
      required: true,
    };
  }

  const validViewport =
    Number.isFinite(window.innerWidth) &&
    Number.isFinite(window.innerHeight) &&
    window.innerWidth > 0 &&
    window.innerHeight > 0;

  return {
    name: 'viewport-size',
    passed: validViewport,
    message: validViewport ? 'Viewport dimensions are valid' : 'Invalid viewport dimensions',
    required: true,
  };
}

function checkWorkers(): StartupCheck {
  const available = typeof Worker === 'function';
  return {
    name: 'web-workers',
    passed: available,
    message: available ? 'Web Workers available' : 'Web Workers unavailable; meshes build on the main thread',
    required: false,
  };
}

function checkConfig(overrides: Partial<RuntimeConfig>): StartupCheck {
  const { valid, errors } = validateAndLoadConfig(overrides);
  return {
    name: 'runtime-config',
    passed: valid,
    message: valid ? 'Runtime config is valid' : errors.join('; '),
    required: true,
  };
}

export function getStartupChecks(overrides: Partial<RuntimeConfig> = {}): StartupReport {
  const checks: StartupCheck[] = [
    checkBrowserCapabilities(),
    checkRenderingContext(),
    checkViewport(),
    checkWorkers(),
    checkConfig(overrides),
  ];

  return {
    checks,
    ok: checks.every((check) => (check.required === false ? true : check.passed)),
  };
}

export function summarizeStartupChecks(report: StartupReport): string {
  if (report.ok) {
    return 'Startup checks: all passed';
  }

  const failures = report.checks.filter((c) => !c.passed && c.required !== false).map((c) => c.name).join(', ');
  return `Startup checks: failed (${failures})`;
}
