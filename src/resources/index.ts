import type { Resource, TextResourceContents } from '@modelcontextprotocol/sdk/types.js';
import type { Registries } from '../types/index.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';

const PROTOCOL = 'strategos:';
const URI_FORMAT = 'strategos://{type}/{id}';

/**
 * Register the loaded registries as MCP resources.
 *
 * Every phase template, every phase type and the profile list is
 * addressable as `strategos://{type}/{id}`.
 *
 * @example
 * ```typescript
 * const resources = registerResources(registries);
 * // [
 * //   { uri: 'strategos://templates/web_app', name: 'web_app', ... },
 * //   { uri: 'strategos://phase-types/backend', name: 'backend', ... },
 * //   { uri: 'strategos://profiles/all', name: 'Resource profiles', ... }
 * // ]
 * ```
 */
export function registerResources(registries: Registries): Resource[] {
  const templates = Object.values(registries.phaseTemplates).map((template) => ({
    uri: `strategos://templates/${template.name}`,
    name: template.name,
    description: `Phase template: ${template.phases.length} phases${template.domains.length > 0 ? ` (${template.domains.join(', ')})` : ''}`,
    mimeType: 'application/json',
  }));

  const phaseTypes = registries.phaseTypes.map((phaseType) => ({
    uri: `strategos://phase-types/${phaseType.phaseType}`,
    name: phaseType.phaseType,
    description: `Task template: ${phaseType.tasks.length} tasks`,
    mimeType: 'application/json',
  }));

  return [
    ...templates,
    ...phaseTypes,
    {
      uri: 'strategos://profiles/all',
      name: 'Resource profiles',
      description: `${registries.profiles.length} resource profiles in assignment order`,
      mimeType: 'application/json',
    },
  ];
}

function jsonContents(uri: string, value: unknown): { contents: TextResourceContents[] } {
  return {
    contents: [
      {
        uri,
        mimeType: 'application/json',
        text: JSON.stringify(value, null, 2),
      },
    ],
  };
}

/**
 * Read a resource by URI.
 *
 * URI parsing is strict:
 * - Protocol must be exactly "strategos:"
 * - Path must contain exactly 2 segments (type and id)
 * - Trailing slashes are normalized
 *
 * @throws ValidationError for a malformed URI or unknown resource type
 * @throws NotFoundError when the id names nothing loaded
 */
export function handleResourceRead(
  uri: string,
  registries: Registries
): { contents: TextResourceContents[] } {
  let url: URL;
  try {
    url = new URL(uri);
  } catch {
    throw new ValidationError(`Invalid URI format: ${uri}. Expected format: ${URI_FORMAT}`);
  }

  if (url.protocol !== PROTOCOL) {
    throw new ValidationError(`Invalid protocol: ${url.protocol}. Expected "${PROTOCOL}". URI: ${uri}`);
  }

  // For non-special schemes the first segment lands in host, the rest in pathname
  const segments = [url.host, ...url.pathname.split('/')].filter((segment) => segment.length > 0);
  const [type, id, ...extra] = segments;

  if (type === undefined || id === undefined) {
    throw new ValidationError(`Invalid URI: missing resource type or ID. Expected format: ${URI_FORMAT}. URI: ${uri}`);
  }
  if (extra.length > 0) {
    throw new ValidationError(`Invalid URI: too many path segments. Expected format: ${URI_FORMAT}. URI: ${uri}`);
  }

  switch (type) {
    case 'templates': {
      const template = registries.phaseTemplates[id];
      if (!template) {
        throw new NotFoundError('Template', id);
      }
      return jsonContents(uri, template);
    }

    case 'phase-types': {
      const phaseType = registries.phaseTypes.find((candidate) => candidate.phaseType === id);
      if (!phaseType) {
        throw new NotFoundError('Phase type', id);
      }
      return jsonContents(uri, phaseType);
    }

    case 'profiles': {
      if (id !== 'all') {
        throw new NotFoundError('Profile list', id);
      }
      return jsonContents(uri, registries.profiles);
    }

    default:
      throw new ValidationError(
        `Unknown resource type: ${type}. Valid types are: templates, phase-types, profiles`
      );
  }
}
