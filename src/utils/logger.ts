/**
 * Structured logging with request-scoped context carried through AsyncLocalStorage.
 *
 * Output goes to stderr so it never mixes with the stdio protocol stream.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomBytes } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

interface RequestContext {
  requestId: string;
  toolName?: string | undefined;
  sessionId?: string | undefined;
  stage?: string | undefined;
  startTime: number;
}

const requestStorage = new AsyncLocalStorage<RequestContext>();

/**
 * req-{8 chars of base64url}
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

function formatMessage(level: LogLevel, message: string, context?: LogContext): string {
  const timestamp = new Date().toISOString();
  const reqContext = requestStorage.getStore();

  const fullContext: LogContext = {};

  if (reqContext) {
    fullContext.requestId = reqContext.requestId;
    if (reqContext.toolName) fullContext.tool = reqContext.toolName;
    if (reqContext.sessionId) fullContext.sessionId = reqContext.sessionId;
    if (reqContext.stage) fullContext.stage = reqContext.stage;
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

export const logger = {
  /**
   * Only emitted when LOG_LEVEL=debug
   */
  debug(message: string, error?: unknown, context?: LogContext): void {
    if (process.env.LOG_LEVEL === 'debug') {
      const fullContext = error ? { ...context, ...formatError(error) } : context;
      console.error(formatMessage('debug', message, fullContext));
    }
  },

  info(message: string, context?: LogContext): void {
    if (process.env.LOG_LEVEL === 'warn' || process.env.LOG_LEVEL === 'error') return;
    console.error(formatMessage('info', message, context));
  },

  warn(message: string, error?: unknown, context?: LogContext): void {
    if (process.env.LOG_LEVEL === 'error') return;
    const fullContext = error ? { ...context, ...formatError(error) } : context;
    console.warn(formatMessage('warn', message, fullContext));
  },

  error(message: string, error?: unknown, context?: LogContext): void {
    const fullContext = error ? { ...context, ...formatError(error) } : context;
    console.error(formatMessage('error', message, fullContext));
  },

  /**
   * Run a function within a request context.
   * Every log line written inside the callback carries the request id and the given ids.
   *
   * @example
   * ```typescript
   * await logger.withRequestContext({ toolName: 'etp_message', sessionId }, async () => {
   *   logger.info('Processing turn'); // includes requestId, tool, sessionId
   *   return engine.processMessage(sessionId, text);
   * });
   * ```
   */
  async withRequestContext<T>(
    options: {
      requestId?: string | undefined;
      toolName?: string | undefined;
      sessionId?: string | undefined;
    },
    fn: () => Promise<T>
  ): Promise<T> {
    const context: RequestContext = {
      requestId: options.requestId ?? generateRequestId(),
      toolName: options.toolName,
      sessionId: options.sessionId,
      startTime: Date.now(),
    };

    return requestStorage.run(context, fn);
  },

  getRequestId(): string | undefined {
    return requestStorage.getStore()?.requestId;
  },

  getElapsedMs,

  /**
   * Update the current request context, e.g. once a new session id is assigned
   */
  updateContext(updates: Partial<Omit<RequestContext, 'requestId' | 'startTime'>>): void {
    const current = requestStorage.getStore();
    if (current) {
      if (updates.toolName !== undefined) current.toolName = updates.toolName;
      if (updates.sessionId !== undefined) current.sessionId = updates.sessionId;
      if (updates.stage !== undefined) current.stage = updates.stage;
    }
  },
};
