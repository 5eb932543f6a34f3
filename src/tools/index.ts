import type { Tool, TextContent } from '@modelcontextprotocol/sdk/types.js';
import type { Services } from '../services/index.js';
import { logger } from '../utils/logger.js';
import { classifyError, createErrorResponse, EtpError, ErrorCode } from '../utils/errors.js';

import { messageTool, handleMessage } from './message.js';
import { sessionTool, handleSession } from './session.js';
import { documentTool, handleDocument } from './document.js';
import { healthTool, handleHealth } from './health.js';

/**
 * Register all MCP tools
 *
 * - etp_message: one conversation turn
 * - etp_session: get, list, delete sessions
 * - etp_document: assembled document for a session
 * - etp_health: health check
 */
export function registerTools(): Tool[] {
  return [messageTool, sessionTool, documentTool, healthTool];
}

/**
 * Validate that args is a proper object (not null, not array).
 */
function validateArgs(args: unknown): args is Record<string, unknown> {
  return args !== null && typeof args === 'object' && !Array.isArray(args);
}

function textResult(value: unknown): { content: TextContent[] } {
  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify(value, null, 2),
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
  services: Services
): Promise<{ content: TextContent[] }> {
  const sessionId = validateArgs(args) && typeof args['sessionId'] === 'string' ? args['sessionId'] : undefined;

  return logger.withRequestContext({ toolName: name, sessionId }, async () => {
    const requestId = logger.getRequestId();

    try {
      if (!validateArgs(args)) {
        logger.warn('Invalid arguments received', undefined, {
          argType: typeof args,
          isNull: args === null,
          isArray: Array.isArray(args),
        });
        const invalidArgsError = new EtpError('Arguments must be a non-null object', ErrorCode.INVALID_ARGUMENTS, {
          details: { received: typeof args },
        });
        return textResult(createErrorResponse(invalidArgsError, requestId));
      }

      logger.debug('Tool call started', undefined, { argKeys: Object.keys(args) });

      let result: unknown;

      switch (name) {
        case 'etp_message':
          result = await handleMessage(args, services.engine);
          break;

        case 'etp_session':
          result = handleSession(args, services.storage);
          break;

        case 'etp_document':
          result = handleDocument(args, services.storage);
          break;

        case 'etp_health':
          result = handleHealth(args, services.storage, services.generator);
          break;

        default:
          logger.warn('Unknown tool requested', undefined, { tool: name });
          throw new EtpError(
            `Unknown tool: ${name}. Available: etp_message, etp_session, etp_document, etp_health`,
            ErrorCode.UNKNOWN_TOOL
          );
      }

      logger.debug('Tool call completed', undefined, { elapsedMs: logger.getElapsedMs() });
      return textResult(result);
    } catch (error) {
      const classified = classifyError(error);

      logger.error('Tool call failed', error, {
        code: classified.code,
        httpStatus: classified.httpStatus,
        isRetryable: classified.isRetryable,
        elapsedMs: logger.getElapsedMs(),
      });

      return textResult(createErrorResponse(error, requestId));
    }
  });
}
