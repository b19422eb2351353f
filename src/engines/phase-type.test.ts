import { describe, it, expect } from 'vitest';
import { resolvePhaseType } from './phase-type.js';
import { ConfigurationError } from '../utils/errors.js';
import type { PhaseTypeTemplate } from '../types/index.js';

function phaseType(overrides: Partial<PhaseTypeTemplate>): PhaseTypeTemplate {
  return {
    phaseType: 'design',
    aliases: [],
    keywords: [],
    tasks: [],
    ...overrides,
  };
}

const registry: PhaseTypeTemplate[] = [
  phaseType({ phaseType: 'design', aliases: ['UI/UX Design', 'Architecture'], keywords: ['design'] }),
  phaseType({ phaseType: 'backend', aliases: ['Backend Development'], keywords: ['backend', 'api'] }),
  phaseType({ phaseType: 'frontend', aliases: ['Frontend Development'], keywords: ['frontend', 'ui'] }),
];

describe('resolvePhaseType', () => {
  it('matches aliases case-insensitively', () => {
    expect(resolvePhaseType({ id: 'p', name: 'backend development' }, registry).phaseType).toBe('backend');
    expect(resolvePhaseType({ id: 'p', name: '  UI/UX DESIGN ' }, registry).phaseType).toBe('design');
  });

  it('prefers an alias over an earlier keyword match', () => {
    // "frontend development" contains no design keyword, but "ui/ux design"
    // would match the frontend 'ui' keyword if aliases were not tried first
    expect(resolvePhaseType({ id: 'p', name: 'UI/UX Design' }, registry).phaseType).toBe('design');
  });

  it('falls back to keywords in registry order', () => {
    expect(resolvePhaseType({ id: 'p', name: 'API Gateway' }, registry).phaseType).toBe('backend');
    expect(resolvePhaseType({ id: 'p', name: 'System Design Review' }, registry).phaseType).toBe('design');
  });

  it('rejects a phase no type claims', () => {
    expect(() => resolvePhaseType({ id: 'ops', name: 'Marketing Launch' }, registry)).toThrow(ConfigurationError);
    expect(() => resolvePhaseType({ id: 'ops', name: 'Marketing Launch' }, registry)).toThrow(
      "No phase type matches phase 'Marketing Launch' (ops)"
    );
  });
});
