/**
 * Structured logging utility for Strategos
 * Provides context-aware logging with request ID tracking via AsyncLocalStorage
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomBytes } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log context that can be passed to any log method
 */
export interface LogContext {
  [key: string]: unknown;
}

/**
 * Request context stored in AsyncLocalStorage for tracking across async calls
 */
interface RequestContext {
  requestId: string;
  toolName?: string | undefined;
  stage?: string | undefined;
  domain?: string | undefined;
  startTime: number;
}

const requestStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Format: req-{8 chars of base64url}
 */
function generateRequestId(): string {
  return `req-${randomBytes(6).toString('base64url')}`;
}

function formatError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      errorName: error.name,
      errorMessage: error.message,
      errorStack: error.stack,
    };
  }
  return { errorValue: String(error) };
}

/**
 * Format a log message with timestamp, level, request context, and optional data
 */
function formatMessage(level: LogLevel, message: string, context?: LogContext): string {
  const timestamp = new Date().toISOString();
  const reqContext = requestStorage.getStore();

  const fullContext: LogContext = {};

  if (reqContext) {
    fullContext.requestId = reqContext.requestId;
    if (reqContext.toolName) fullContext.tool = reqContext.toolName;
    if (reqContext.stage) fullContext.stage = reqContext.stage;
    if (reqContext.domain) fullContext.domain = reqContext.domain;
  }

  if (context) {
    Object.assign(fullContext, context);
  }

  const contextStr = Object.keys(fullContext).length > 0
    ? ` ${JSON.stringify(fullContext)}`
    : '';

  return `[${timestamp}] [${level.toUpperCase()}] ${message}${contextStr}`;
}

function getElapsedMs(): number | undefined {
  const reqContext = requestStorage.getStore();
  return reqContext ? Date.now() - reqContext.startTime : undefined;
}

/**
 * Logger with support for structured context and request ID tracking.
 *
 * Every level writes to stderr: under the stdio transport stdout carries
 * the MCP protocol.
 */
export const logger = {
  /**
   * Log a debug message (only when LOG_LEVEL=debug)
   */
  debug(message: string, error?: unknown, context?: LogContext): void {
    if (process.env.LOG_LEVEL === 'debug') {
      const fullContext = error ? { ...context, ...formatError(error) } : context;
      console.error(formatMessage('debug', message, fullContext));
    }
  },

  info(message: string, context?: LogContext): void {
    console.error(formatMessage('info', message, context));
  },

  warn(message: string, error?: unknown, context?: LogContext): void {
    const fullContext = error ? { ...context, ...formatError(error) } : context;
    console.warn(formatMessage('warn', message, fullContext));
  },

  error(message: string, error?: unknown, context?: LogContext): void {
    const fullContext = error ? { ...context, ...formatError(error) } : context;
    console.error(formatMessage('error', message, fullContext));
  },

  /**
   * Run a function within a request context.
   * All logs within the callback will include the request ID and other context.
   *
   * @example
   * ```typescript
   * const plan = await logger.withRequestContext(
   *   { toolName: 'strategos_plan', stage: 'mission_map' },
   *   async () => {
   *     logger.info('Planning'); // Automatically includes requestId, tool, stage
   *     return runPipeline(request, registries);
   *   }
   * );
   * ```
   */
  async withRequestContext<T>(
    options: {
      requestId?: string | undefined;
      toolName?: string | undefined;
      stage?: string | undefined;
      domain?: string | undefined;
    },
    fn: () => Promise<T>
  ): Promise<T> {
    const context: RequestContext = {
      requestId: options.requestId ?? generateRequestId(),
      toolName: options.toolName,
      stage: options.stage,
      domain: options.domain,
      startTime: Date.now(),
    };

    return requestStorage.run(context, fn);
  },

  getRequestId(): string | undefined {
    return requestStorage.getStore()?.requestId;
  },

  /**
   * Get elapsed time since request start in milliseconds
   */
  getElapsedMs,

  /**
   * Update the current request context (e.g., to add the domain once analysis has run)
   */
  updateContext(updates: Partial<Omit<RequestContext, 'requestId' | 'startTime'>>): void {
    const current = requestStorage.getStore();
    if (current) {
      if (updates.toolName !== undefined) current.toolName = updates.toolName;
      if (updates.stage !== undefined) current.stage = updates.stage;
      if (updates.domain !== undefined) current.domain = updates.domain;
    }
  },
};
