import { describe, it, expect, beforeAll } from 'vitest';
import { registerResources, handleResourceRead } from '../../src/resources/index.js';
import { loadRegistries } from '../../src/registry/index.js';
import { NotFoundError, ValidationError } from '../../src/utils/errors.js';
import type { Registries } from '../../src/types/index.js';

describe('resources', () => {
  let registries: Registries;

  beforeAll(async () => {
    registries = await loadRegistries();
  });

  it('should list templates, phase types and the profile list', () => {
    const uris = registerResources(registries).map((resource) => resource.uri);
    expect(uris).toHaveLength(14);
    expect(uris[0]).toBe('strategos://templates/api_service');
    expect(uris).toContain('strategos://phase-types/backend');
    expect(uris[uris.length - 1]).toBe('strategos://profiles/all');
  });

  it('should read a template', () => {
    const { contents } = handleResourceRead('strategos://templates/web_app', registries);
    expect(contents[0]?.mimeType).toBe('application/json');
    expect(JSON.parse(contents[0]?.text ?? '{}')).toMatchObject({ name: 'web_app' });
  });

  it('should read a phase type, ignoring a trailing slash', () => {
    const { contents } = handleResourceRead('strategos://phase-types/testing/', registries);
    expect(JSON.parse(contents[0]?.text ?? '{}')).toMatchObject({ phaseType: 'testing' });
  });

  it('should read every profile', () => {
    const { contents } = handleResourceRead('strategos://profiles/all', registries);
    const profiles: unknown = JSON.parse(contents[0]?.text ?? '[]');
    expect(Array.isArray(profiles) && profiles.length).toBe(7);
  });

  it('should reject malformed URIs', () => {
    expect(() => handleResourceRead('not a uri', registries)).toThrow(ValidationError);
    expect(() => handleResourceRead('other://templates/web_app', registries)).toThrow(
      'Invalid protocol: other:. Expected "strategos:". URI: other://templates/web_app'
    );
    expect(() => handleResourceRead('strategos://templates', registries)).toThrow(/missing resource type or ID/);
    expect(() => handleResourceRead('strategos://templates/a/b', registries)).toThrow(/too many path segments/);
    expect(() => handleResourceRead('strategos://widgets/a', registries)).toThrow(/Unknown resource type: widgets/);
  });

  it('should report unknown ids', () => {
    expect(() => handleResourceRead('strategos://templates/nope', registries)).toThrow(NotFoundError);
    expect(() => handleResourceRead('strategos://phase-types/nope', registries)).toThrow('Phase type not found: nope');
    expect(() => handleResourceRead('strategos://profiles/first', registries)).toThrow(NotFoundError);
  });
});
