import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { ConversationStageSchema, type Session } from '../types/index.js';
import type { Storage } from '../storage/index.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';

/**
 * Tool definition for session management
 */
export const sessionTool: Tool = {
  name: 'etp_session',
  description: `Inspect and manage ETP sessions.

Actions:
- get: full session state (requires sessionId)
- list: recent sessions, optionally filtered by stage
- delete: remove a session and its finalized documents (requires sessionId)`,

  inputSchema: {
    type: 'object',
    properties: {
      action: {
        type: 'string',
        enum: ['get', 'list', 'delete'],
        description: 'Action to perform',
      },
      sessionId: {
        type: 'string',
        description: 'Session id (for get and delete)',
      },
      stage: {
        type: 'string',
        enum: ConversationStageSchema.options,
        description: 'Filter by stage (for list)',
      },
      limit: {
        type: 'number',
        description: 'Maximum results (for list)',
        default: 50,
      },
    },
    required: ['action'],
  },
};

const SessionArgsSchema = z.discriminatedUnion('action', [
  z.object({ action: z.literal('get'), sessionId: z.string().min(1) }),
  z.object({
    action: z.literal('list'),
    stage: ConversationStageSchema.optional(),
    limit: z.number().int().positive().max(500).optional(),
  }),
  z.object({ action: z.literal('delete'), sessionId: z.string().min(1) }),
]);

export interface SessionSummary {
  sessionId: string;
  stage: Session['stage'];
  step: Session['answers']['step'];
  requirements: number;
  updatedAt: string;
}

export interface SessionResult {
  action: 'get' | 'list' | 'delete';
  success: boolean;
  data?: unknown;
  message?: string;
}

function summarize(session: Session): SessionSummary {
  return {
    sessionId: session.sessionId,
    stage: session.stage,
    step: session.answers.step,
    requirements: session.requirements.length,
    updatedAt: session.updatedAt,
  };
}

/**
 * Handle session management requests
 */
export function handleSession(args: Record<string, unknown>, storage: Storage): SessionResult {
  const parsed = SessionArgsSchema.safeParse(args);
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error);
  }
  const request = parsed.data;

  switch (request.action) {
    case 'get': {
      const session = storage.getSession(request.sessionId);
      if (!session) {
        throw new NotFoundError('Session', request.sessionId);
      }
      return { action: 'get', success: true, data: session };
    }

    case 'list': {
      const sessions = storage.listSessions({ stage: request.stage, limit: request.limit });
      return {
        action: 'list',
        success: true,
        data: { count: sessions.length, items: sessions.map(summarize) },
      };
    }

    case 'delete': {
      const deleted = storage.deleteSession(request.sessionId);
      if (!deleted) {
        throw new NotFoundError('Session', request.sessionId);
      }
      return { action: 'delete', success: true, message: `Session ${request.sessionId} deleted` };
    }
  }
}
