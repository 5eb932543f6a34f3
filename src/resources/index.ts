import type { Resource, TextResourceContents } from '@modelcontextprotocol/sdk/types.js';
import type { Storage } from '../storage/index.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const SCHEME = 'etp:';

/**
 * Expose recent sessions and finalized documents as MCP resources,
 * addressable as `etp://{type}/{id}`.
 *
 * A storage failure yields an empty list rather than failing the listing.
 */
export function registerResources(storage: Storage): Resource[] {
  const resources: Resource[] = [];

  try {
    for (const session of storage.listSessions()) {
      resources.push({
        uri: `etp://sessions/${session.sessionId}`,
        name: `Session ${session.sessionId}`,
        description: `ETP session (${session.stage}, ${session.requirements.length} requirements)`,
        mimeType: 'application/json',
      });
    }

    for (const document of storage.listDocuments()) {
      resources.push({
        uri: `etp://documents/${document.id}`,
        name: `ETP ${document.id}`,
        description: `Finalized document for session ${document.sessionId}`,
        mimeType: 'application/json',
      });
    }
  } catch (error) {
    logger.error('Failed to list resources', error);
  }

  return resources;
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
 * Read one resource by URI
 *
 * @throws {ValidationError} for a malformed URI or unknown type
 * @throws {NotFoundError} when the entity does not exist
 */
export function handleResourceRead(uri: string, storage: Storage): { contents: TextResourceContents[] } {
  let url: URL;
  try {
    url = new URL(uri);
  } catch {
    throw new ValidationError(`Invalid URI format: ${uri}. Expected format: etp://{type}/{id}`);
  }

  if (url.protocol !== SCHEME) {
    throw new ValidationError(`Invalid protocol: ${url.protocol}. Expected "etp:". URI: ${uri}`);
  }

  // "etp://sessions/x" parses with host "sessions" and pathname "/x"
  const parts = [url.host, ...url.pathname.split('/')].filter((segment) => segment.length > 0);

  if (parts.length !== 2) {
    throw new ValidationError(`Invalid URI: expected etp://{type}/{id}. URI: ${uri}`);
  }

  const [type, id] = parts;
  if (type === undefined || id === undefined) {
    throw new ValidationError(`Invalid URI: expected etp://{type}/{id}. URI: ${uri}`);
  }

  switch (type) {
    case 'sessions': {
      const session = storage.getSession(id);
      if (!session) {
        throw new NotFoundError('Session', id);
      }
      return jsonContents(uri, session);
    }

    case 'documents': {
      const document = storage.getDocument(id);
      if (!document) {
        throw new NotFoundError('Document', id);
      }
      return jsonContents(uri, document);
    }

    default:
      throw new ValidationError(`Unknown resource type: ${type}. Valid types are: sessions, documents`);
  }
}
