import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { DocSectionKey, SectionMap } from '../types/index.js';
import type { Storage } from '../storage/index.js';
import { assembleFromSession, orderedSectionKeys, renderMarkdown } from '../engines/document-assembler.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';

/**
 * Tool definition for reading the assembled document
 */
export const documentTool: Tool = {
  name: 'etp_document',
  description: `Assemble the ETP document from what a session has collected so far.

Sections without content are omitted. Use format "markdown" for a readable draft
or "json" for the section map. Finalized sessions also report the stored document id.`,

  inputSchema: {
    type: 'object',
    properties: {
      sessionId: {
        type: 'string',
        description: 'Session to assemble',
      },
      format: {
        type: 'string',
        enum: ['json', 'markdown'],
        description: 'Output format',
        default: 'json',
      },
    },
    required: ['sessionId'],
  },
};

const DocumentArgsSchema = z.object({
  sessionId: z.string().min(1),
  format: z.enum(['json', 'markdown']).default('json'),
});

export interface DocumentResult {
  sessionId: string;
  stage: string;
  format: 'json' | 'markdown';
  sectionKeys: DocSectionKey[];
  finalizedDocumentId: string | null;
  sections?: SectionMap;
  markdown?: string;
}

export function handleDocument(args: Record<string, unknown>, storage: Storage): DocumentResult {
  const parsed = DocumentArgsSchema.safeParse(args);
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error);
  }
  const { sessionId, format } = parsed.data;

  const session = storage.getSession(sessionId);
  if (!session) {
    throw new NotFoundError('Session', sessionId);
  }

  const sections = assembleFromSession(session);
  const stored = storage.getLatestDocumentForSession(sessionId);

  const result: DocumentResult = {
    sessionId,
    stage: session.stage,
    format,
    sectionKeys: orderedSectionKeys(sections),
    finalizedDocumentId: stored?.id ?? null,
  };

  if (format === 'markdown') {
    result.markdown = renderMarkdown(sections);
  } else {
    result.sections = sections;
  }
  return result;
}
