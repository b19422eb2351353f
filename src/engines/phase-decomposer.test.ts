import { describe, it, expect } from 'vitest';
import {
  analyzeDecomposition,
  decomposePhases,
  selectTemplate,
  instantiatePhases,
  findPhaseCriticalPath,
  findParallelOpportunities,
  estimateTotalDuration,
} from './phase-decomposer.js';
import { ConfigurationError, CycleError, DependencyError } from '../utils/errors.js';
import type { AnalysisResult, Phase, PhaseTemplate, PhaseTemplateEntry } from '../types/index.js';

function analysis(overrides: Partial<AnalysisResult> = {}): AnalysisResult {
  return {
    complexity: 'medium',
    keywords: [],
    technologyStack: [],
    patterns: [],
    implicitRequirements: [],
    ...overrides,
  };
}

function entry(id: string, estimatedDuration: string | undefined, dependencies: string[] = []): PhaseTemplateEntry {
  return {
    id,
    name: id,
    description: `${id} phase`,
    ...(estimatedDuration !== undefined && { estimatedDuration }),
    dependencies,
    artifacts: [`${id}.md`],
  };
}

function template(overrides: Partial<PhaseTemplate>): PhaseTemplate {
  return {
    name: 'web_app',
    description: '',
    domains: [],
    baseDuration: '1 day',
    complexityAdjustments: {},
    domainPriorities: [],
    phases: [],
    ...overrides,
  };
}

const webApp = template({
  name: 'web_app',
  domains: ['web', 'Web Application'],
  complexityAdjustments: { low: 0.5, high: 1.5 },
  domainPriorities: ['frontend', 'ghost'],
  phases: [
    entry('design', '3 days'),
    entry('backend', '1 week', ['design']),
    entry('frontend', '5 days', ['design']),
    entry('integration', '2 days', ['backend', 'frontend']),
  ],
});

const fallback = template({
  name: 'default',
  phases: [entry('plan', '2 days'), entry('build', undefined, ['plan'])],
});

const registries = {
  phaseTemplates: { web_app: webApp, default: fallback },
  domainIndex: { web_app: 'web_app', web: 'web_app', 'web application': 'web_app', default: 'default' },
};

function phase(id: string, days: number, dependencies: string[] = []): Phase {
  return {
    id,
    name: id,
    description: '',
    estimatedDuration: days === 1 ? '1 day' : `${days} days`,
    dependencies,
    deliverables: [],
  };
}

describe('selectTemplate', () => {
  it('looks domains up case-insensitively', () => {
    expect(selectTemplate('WEB', registries).name).toBe('web_app');
    expect(selectTemplate(' Web Application ', registries).name).toBe('web_app');
  });

  it('falls back to the default template', () => {
    expect(selectTemplate('robotics', registries).name).toBe('default');
    expect(selectTemplate(undefined, registries).name).toBe('default');
  });

  it('requires a default template for unknown domains', () => {
    const withoutDefault = { phaseTemplates: { web_app: webApp }, domainIndex: { web: 'web_app' } };
    expect(() => selectTemplate('robotics', withoutDefault)).toThrow(ConfigurationError);
  });
});

describe('instantiatePhases', () => {
  it('keeps template durations at medium complexity', () => {
    const phases = instantiatePhases(webApp, 'medium');
    expect(phases.map((p) => p.estimatedDuration)).toEqual(['3 days', '1.0 weeks', '5 days', '2 days']);
    expect(phases[3]?.dependencies).toEqual(['backend', 'frontend']);
    expect(phases[0]?.deliverables).toEqual(['design.md']);
  });

  it('scales and truncates durations by the complexity multiplier', () => {
    expect(instantiatePhases(webApp, 'high').map((p) => p.estimatedDuration)).toEqual([
      '4 days',
      '1.4 weeks',
      '1.0 weeks',
      '3 days',
    ]);
    expect(instantiatePhases(webApp, 'low').map((p) => p.estimatedDuration)).toEqual([
      '1 day',
      '3 days',
      '2 days',
      '1 day',
    ]);
  });

  it('uses the base duration for phases without one', () => {
    expect(instantiatePhases(fallback, 'medium')[1]?.estimatedDuration).toBe('1 day');
  });
});

describe('findPhaseCriticalPath', () => {
  it('follows the longest cumulative duration', () => {
    const phases = [
      phase('design', 3),
      phase('backend', 7, ['design']),
      phase('frontend', 5, ['design']),
      phase('integration', 2, ['backend', 'frontend']),
    ];
    expect(findPhaseCriticalPath(phases)).toEqual(['design', 'backend', 'integration']);
  });

  it('keeps the first root on ties', () => {
    expect(findPhaseCriticalPath([phase('a', 2), phase('b', 2)])).toEqual(['a']);
  });

  it('compares across roots', () => {
    const phases = [phase('short', 1), phase('long', 4), phase('tail', 1, ['short'])];
    expect(findPhaseCriticalPath(phases)).toEqual(['long']);
  });

  it('returns nothing for no phases', () => {
    expect(findPhaseCriticalPath([])).toEqual([]);
  });
});

describe('findParallelOpportunities', () => {
  it('groups phases with identical dependency sets', () => {
    const phases = [
      phase('design', 1),
      phase('backend', 1, ['design']),
      phase('frontend', 1, ['design']),
      phase('docs', 1, ['design']),
      phase('integration', 1, ['frontend', 'backend']),
      phase('release', 1, ['backend', 'frontend']),
    ];
    expect(findParallelOpportunities(phases)).toEqual([
      ['backend', 'frontend', 'docs'],
      ['integration', 'release'],
    ]);
  });

  it('needs two phases', () => {
    expect(findParallelOpportunities([phase('solo', 1)])).toEqual([]);
  });
});

describe('estimateTotalDuration', () => {
  it('sums the critical path', () => {
    const phases = [phase('a', 3), phase('b', 4, ['a']), phase('c', 10, [])];
    expect(estimateTotalDuration(phases, ['a', 'b'])).toBe('1.0 weeks');
  });

  it('reports an empty plan as zero days', () => {
    expect(estimateTotalDuration([], [])).toBe('0 days');
  });
});

describe('decomposePhases', () => {
  it('decomposes a known domain', () => {
    const result = decomposePhases(analysis({ domain: 'web' }), registries);

    expect(result.template).toBe('web_app');
    expect(result.phases.map((p) => p.id)).toEqual(['design', 'backend', 'frontend', 'integration']);
    expect(result.criticalPath).toEqual(['design', 'backend', 'integration']);
    expect(result.totalEstimatedDuration).toBe('1.7 weeks');
    expect(result.parallelOpportunities).toEqual([['backend', 'frontend']]);
    expect(result.priorityPhases).toEqual(['frontend']);
  });

  it('decomposes an unknown domain with the default template', () => {
    const result = decomposePhases(analysis({ complexity: 'high' }), registries);

    expect(result.template).toBe('default');
    expect(result.criticalPath).toEqual(['plan', 'build']);
    expect(result.totalEstimatedDuration).toBe('3 days');
  });

  it('rejects dependencies on unknown phases', () => {
    const broken = template({ name: 'default', phases: [entry('a', '1 day', ['ghost'])] });
    expect(() =>
      decomposePhases(
        analysis(),
        { phaseTemplates: { default: broken }, domainIndex: {} }
      )
    ).toThrow(DependencyError);
  });

  it('rejects cyclic templates', () => {
    const cyclic = template({ name: 'default', phases: [entry('a', '1 day', ['b']), entry('b', '1 day', ['a'])] });
    expect(() =>
      decomposePhases(
        analysis(),
        { phaseTemplates: { default: cyclic }, domainIndex: {} }
      )
    ).toThrow(new CycleError('phase', ['a', 'b', 'a']));
  });

  it('returns an empty plan for an empty template', () => {
    const empty = template({ name: 'default', phases: [] });
    const result = decomposePhases(
      analysis(),
      { phaseTemplates: { default: empty }, domainIndex: {} }
    );
    expect(result).toEqual({
      template: 'default',
      phases: [],
      totalEstimatedDuration: '0 days',
      criticalPath: [],
      parallelOpportunities: [],
      priorityPhases: [],
    });
  });
});

describe('analyzeDecomposition', () => {
  const phase = (id: string, estimatedDuration: string, dependencies: string[] = []): Phase => ({
    id,
    name: id,
    description: '',
    estimatedDuration,
    dependencies,
    deliverables: [],
  });

  it('derives the plan fields from the phases alone', () => {
    const result = analyzeDecomposition({
      template: 'custom',
      phases: [phase('a', '2 days'), phase('b', '3 days', ['a']), phase('c', '1 day', ['a'])],
      priorityPhases: ['c', 'missing'],
    });

    expect(result).toEqual({
      template: 'custom',
      phases: [phase('a', '2 days'), phase('b', '3 days', ['a']), phase('c', '1 day', ['a'])],
      totalEstimatedDuration: '5 days',
      criticalPath: ['a', 'b'],
      parallelOpportunities: [['b', 'c']],
      priorityPhases: ['c'],
    });
  });

  it('rejects unknown dependencies and cycles', () => {
    expect(() =>
      analyzeDecomposition({ template: 'custom', phases: [phase('a', '1 day', ['ghost'])], priorityPhases: [] })
    ).toThrow(DependencyError);
    expect(() =>
      analyzeDecomposition({
        template: 'custom',
        phases: [phase('a', '1 day', ['b']), phase('b', '1 day', ['a'])],
        priorityPhases: [],
      })
    ).toThrow(CycleError);
  });
});
