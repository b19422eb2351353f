/**
 * Tool dispatch through handleToolCall, against the packaged registries
 */
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { handleToolCall, registerTools } from '../../src/tools/index.js';
import { createContainer, type ServiceContainer } from '../../src/services/index.js';
import { DEFAULT_CONFIG_DIR } from '../../src/registry/index.js';

const DESCRIPTION = 'A web dashboard in React with a REST backend for managing team workflows';

/** Text of the first content block */
function textOf(result: { content: Array<{ type: string; text: string }> }): string {
  return result.content[0]?.text ?? '';
}

/** Parse JSON from tool call result */
function parseResult(result: { content: Array<{ type: string; text: string }> }): Record<string, unknown> {
  return JSON.parse(textOf(result)) as Record<string, unknown>;
}

describe('tools', () => {
  let container: ServiceContainer;

  beforeEach(() => {
    container = createContainer({ configDir: DEFAULT_CONFIG_DIR });
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  it('should register the four tools', () => {
    expect(registerTools().map((tool) => tool.name)).toEqual([
      'strategos_analyze',
      'strategos_plan',
      'strategos_templates',
      'strategos_health',
    ]);
  });

  describe('strategos_analyze', () => {
    it('should classify the description', async () => {
      const result = parseResult(await handleToolCall('strategos_analyze', { description: DESCRIPTION }, container));

      expect(result['analysis']).toEqual({
        domain: 'web',
        complexity: 'low',
        keywords: ['backend', 'react', 'rest', 'web'],
        technologyStack: ['javascript'],
        patterns: ['dashboard', 'multi_tenant'],
        implicitRequirements: [
          'Data visualization and reporting capabilities',
          'Data isolation and tenant management',
          'Responsive design and cross-browser compatibility',
        ],
        domainScores: { web: 0.75, api: 0.25 },
      });
      expect(result['template']).toBe('web_app');
      expect(result['refinementPrompt']).toContain('- **Domain**: web (candidates: web (0.75), api (0.25))');
    });

    it('should reject a short description', async () => {
      const result = parseResult(await handleToolCall('strategos_analyze', { description: 'short' }, container));
      expect(result['code']).toBe('VALIDATION_ERROR');
      expect(result['message']).toBe('Validation failed: Project description must be at least 10 characters');
    });
  });

  describe('strategos_plan', () => {
    it('should decompose the analyzed project', async () => {
      const result = parseResult(
        await handleToolCall('strategos_plan', { description: DESCRIPTION, stage: 'decomposition' }, container)
      );

      expect(result['stage']).toBe('decomposition');
      expect(result['nextStage']).toBe('task_graph');
      expect(result['decomposition']).toEqual({
        template: 'web_app',
        phases: [
          expect.objectContaining({ id: 'design', estimatedDuration: '3 days' }),
          expect.objectContaining({ id: 'backend', estimatedDuration: '1.3 weeks' }),
          expect.objectContaining({ id: 'frontend', estimatedDuration: '1.3 weeks' }),
          expect.objectContaining({ id: 'integration', estimatedDuration: '4 days' }),
          expect.objectContaining({ id: 'testing', estimatedDuration: '4 days' }),
          expect.objectContaining({ id: 'deployment', estimatedDuration: '2 days' }),
        ],
        totalEstimatedDuration: '3.1 weeks',
        criticalPath: ['design', 'backend', 'integration', 'testing', 'deployment'],
        parallelOpportunities: [['backend', 'frontend']],
        priorityPhases: ['frontend', 'backend'],
      });
    });

    it('should answer in YAML when asked', async () => {
      const text = textOf(
        await handleToolCall(
          'strategos_plan',
          { description: DESCRIPTION, stage: 'analysis', format: 'yaml' },
          container
        )
      );
      expect(text.startsWith('stage: analysis\n')).toBe(true);
      expect(text).toContain('nextStage: decomposition\n');
    });

    it('should report a missing upstream result as a precondition failure', async () => {
      const result = parseResult(await handleToolCall('strategos_plan', { stage: 'task_graph' }, container));
      expect(result['code']).toBe('PRECONDITION_FAILED');
      expect(result['httpStatus']).toBe(412);
      expect(result['message']).toBe("Stage 'decomposition' requires: description or analysis");
      expect(result['requestId']).toMatch(/^req-/);
    });

    it('should reject an unknown stage', async () => {
      const result = parseResult(
        await handleToolCall('strategos_plan', { description: DESCRIPTION, stage: 'deploy' }, container)
      );
      expect(result['code']).toBe('VALIDATION_ERROR');
    });
  });

  describe('strategos_templates', () => {
    it('should list one template by name', async () => {
      const result = parseResult(await handleToolCall('strategos_templates', { template: 'api_service' }, container));
      const templates = result['templates'] as Array<{ name: string; phases: Array<{ id: string }> }>;

      expect(templates.map((t) => t.name)).toEqual(['api_service']);
      expect(templates[0]?.phases.map((p) => p.id)).toEqual([
        'design',
        'data_model',
        'implementation',
        'security',
        'testing',
        'deployment',
      ]);
      expect(result['domains']).toMatchObject({ api: 'api_service', web: 'web_app' });
    });

    it('should report an unknown template', async () => {
      const result = parseResult(await handleToolCall('strategos_templates', { template: 'nope' }, container));
      expect(result['code']).toBe('NOT_FOUND');
      expect(result['message']).toBe('Template not found: nope');
    });
  });

  describe('strategos_health', () => {
    it('should report loaded registries', async () => {
      const result = parseResult(await handleToolCall('strategos_health', { verbose: true }, container));
      expect(result['status']).toBe('healthy');
      expect(result['version']).toBe('0.1.0');
      expect(result['metrics']).toEqual({ templates: 5, domains: 29, phaseTypes: 8, profiles: 7 });
    });

    it('should report a registry that fails to load', async () => {
      container.setFactory('loadRegistries', () => Promise.reject(new Error('boom')));
      const result = parseResult(await handleToolCall('strategos_health', { verbose: true }, container));
      expect(result['status']).toBe('unhealthy');
      expect(result['checks']).toEqual({ registries: { status: 'unhealthy', message: 'Registry error: boom' } });
      expect(result).not.toHaveProperty('metrics');
    });

    it('should advertise only the statuses it reports', () => {
      const health = registerTools().find((tool) => tool.name === 'strategos_health');
      expect(health?.description).toContain('- Overall health status (healthy or unhealthy)');
    });
  });

  describe('dispatch errors', () => {
    it('should reject an unknown tool', async () => {
      const result = parseResult(await handleToolCall('strategos_nope', {}, container));
      expect(result['code']).toBe('UNKNOWN_TOOL');
      expect(result['httpStatus']).toBe(400);
    });

    it('should reject arguments that are not an object', async () => {
      const result = parseResult(await handleToolCall('strategos_plan', ['x'], container));
      expect(result['code']).toBe('INVALID_ARGUMENTS');
      expect(result['details']).toEqual({ received: 'array' });
    });
  });
});
