import type { Tool, TextContent } from '@modelcontextprotocol/sdk/types.js';
import { stringify } from 'yaml';
import type { ServiceContainer } from '../services/index.js';
import { logger } from '../utils/logger.js';
import {
  classifyError,
  createErrorResponse,
  StrategosError,
  ErrorCode,
} from '../utils/errors.js';

import { analyzeTool, handleAnalyze } from './analyze.js';
import { planTool, handlePlan } from './plan.js';
import { templatesTool, handleTemplates } from './templates.js';
import { healthTool, handleHealth } from './health.js';

/**
 * Register all MCP tools
 *
 * - strategos_analyze: Classify a project description
 * - strategos_plan: Run the planning stages
 * - strategos_templates: List the loaded registries
 * - strategos_health: Health check
 */
export function registerTools(): Tool[] {
  return [analyzeTool, planTool, templatesTool, healthTool];
}

/**
 * Validate that args is a proper object (not null, not array).
 */
function validateArgs(args: unknown): args is Record<string, unknown> {
  return (
    args !== null &&
    typeof args === 'object' &&
    !Array.isArray(args)
  );
}

function textContent(value: unknown, format: 'json' | 'yaml' = 'json'): { content: TextContent[] } {
  return {
    content: [
      {
        type: 'text',
        text: format === 'yaml' ? stringify(value) : JSON.stringify(value, null, 2),
      },
    ],
  };
}

/**
 * Handle tool calls with input validation, request tracking, and structured error responses.
 */
export async function handleToolCall(
  name: string,
  args: unknown,
  container: ServiceContainer
): Promise<{ content: TextContent[] }> {
  return logger.withRequestContext(
    { toolName: name },
    async () => {
      const requestId = logger.getRequestId();

      try {
        if (!validateArgs(args)) {
          logger.warn('Invalid arguments received', undefined, {
            argType: typeof args,
            isNull: args === null,
            isArray: Array.isArray(args),
          });
          throw new StrategosError(
            'Arguments must be a non-null object',
            ErrorCode.INVALID_ARGUMENTS,
            { details: { received: Array.isArray(args) ? 'array' : typeof args } }
          );
        }

        logger.debug('Tool call started', undefined, {
          argKeys: Object.keys(args),
        });

        let result: unknown;
        let format: 'json' | 'yaml' = 'json';

        switch (name) {
          case 'strategos_analyze':
            result = handleAnalyze(args, await container.getRegistries());
            break;

          case 'strategos_plan':
            result = handlePlan(args, await container.getRegistries());
            if (args['format'] === 'yaml') format = 'yaml';
            break;

          case 'strategos_templates':
            result = handleTemplates(args, await container.getRegistries());
            break;

          case 'strategos_health':
            result = await handleHealth(args, container);
            break;

          default:
            logger.warn('Unknown tool requested', undefined, { tool: name });
            throw new StrategosError(
              `Unknown tool: ${name}. Available: ${registerTools().map((tool) => tool.name).join(', ')}`,
              ErrorCode.UNKNOWN_TOOL,
              { details: { tool: name } }
            );
        }

        const elapsedMs = logger.getElapsedMs();
        logger.debug('Tool call completed', undefined, { elapsedMs });

        return textContent(result, format);
      } catch (error) {
        const elapsedMs = logger.getElapsedMs();
        const classified = classifyError(error);

        logger.error('Tool call failed', error, {
          code: classified.code,
          httpStatus: classified.httpStatus,
          isRetryable: classified.isRetryable,
          elapsedMs,
        });

        return textContent(createErrorResponse(error, requestId));
      }
    }
  );
}
