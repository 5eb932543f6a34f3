import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ProcessMessageResult } from '../types/index.js';
import type { ConversationEngine } from '../engines/conversation.js';
import { ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Tool definition for one conversation turn
 */
export const messageTool: Tool = {
  name: 'etp_message',
  description: `Send one user message to the ETP (Estudo Técnico Preliminar) assistant.

Omit sessionId on the first turn; a new session id is returned and must be sent back on every later turn.

Returns:
- success: whether the turn was processed
- aiResponseText: the assistant's reply, in Portuguese
- stage: the conversation stage after the turn
- structuredDelta: the session fields the turn changed`,

  inputSchema: {
    type: 'object',
    properties: {
      sessionId: {
        type: 'string',
        description: 'Session id returned by a previous turn',
      },
      text: {
        type: 'string',
        description: 'The user message',
      },
    },
    required: ['text'],
  },
};

const MessageArgsSchema = z.object({
  sessionId: z.string().min(1).optional(),
  text: z.string(),
});

export async function handleMessage(
  args: Record<string, unknown>,
  engine: ConversationEngine
): Promise<ProcessMessageResult> {
  const parsed = MessageArgsSchema.safeParse(args);
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error);
  }

  const { sessionId, text } = parsed.data;
  const result = await engine.processMessage(sessionId, text);

  logger.debug('Turn processed', undefined, {
    success: result.success,
    stage: result.stage,
    changed: Object.keys(result.structuredDelta),
  });

  return result;
}
