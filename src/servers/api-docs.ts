/**
 * API documentation published to agents as MCP resources.
 *
 * @packageDocumentation
 */

import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { isMissingPathError, safeExistsSync, safeReadTextFile } from '../utils/safe-fs.js';

/**
 * One documentation resource.
 */
export interface ApiDocResource {
  /** Resource URI, e.g. `api-docs://summary`. */
  readonly uri: string;
  /** Short name shown to agents. */
  readonly name: string;
  /** What the document covers. */
  readonly description: string;
  /** MIME type of the document text. */
  readonly mimeType: string;
  /** File path relative to the docs root. */
  readonly file: string;
}

/**
 * Every published document.
 */
export const API_DOC_RESOURCES: readonly ApiDocResource[] = [
  {
    uri: 'api-docs://openapi',
    name: 'OpenAPI specification',
    description: 'The complete OpenAPI document for the REST API.',
    mimeType: 'application/yaml',
    file: 'static/openapi.yaml',
  },
  {
    uri: 'api-docs://summary',
    name: 'API summary',
    description: 'Overview of the REST API and MCP tools, with error handling notes.',
    mimeType: 'text/markdown',
    file: 'docs/api/summary.md',
  },
  {
    uri: 'api-docs://endpoints',
    name: 'Endpoint reference',
    description: 'Request and response details for every REST endpoint.',
    mimeType: 'text/markdown',
    file: 'docs/api/endpoints.md',
  },
  {
    uri: 'api-docs://examples',
    name: 'API examples',
    description: 'Request and response examples, including error cases.',
    mimeType: 'text/markdown',
    file: 'docs/api/examples.md',
  },
];

/**
 * Error thrown when a URI names no published document.
 */
export class ApiDocNotFoundError extends Error {
  /** The URI that was requested. */
  public readonly uri: string;

  constructor(uri: string) {
    super(`Unknown resource: ${uri}`);
    this.name = 'ApiDocNotFoundError';
    this.uri = uri;
  }
}

/**
 * Locates the package root by walking up from this module to the nearest
 * directory holding a package.json. Works from both src/ and dist/src/.
 */
export function defaultDocsRoot(): string {
  let dir = path.dirname(fileURLToPath(import.meta.url));
  for (;;) {
    if (safeExistsSync(path.join(dir, 'package.json'))) {
      return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return process.cwd();
    }
    dir = parent;
  }
}

/**
 * Finds the resource for a URI.
 *
 * @param uri - Resource URI.
 * @returns The resource, or undefined for an unknown URI.
 */
export function findApiDoc(uri: string): ApiDocResource | undefined {
  return API_DOC_RESOURCES.find((doc) => doc.uri === uri);
}

/**
 * Reads the text of a published document.
 *
 * A document whose file is missing reads as a one-line notice.
 *
 * @param uri - Resource URI.
 * @param docsRoot - Directory the resource files are relative to.
 * @returns The resource and its text.
 * @throws ApiDocNotFoundError for an unknown URI.
 */
export async function readApiDoc(
  uri: string,
  docsRoot: string
): Promise<{ resource: ApiDocResource; text: string }> {
  const resource = findApiDoc(uri);
  if (resource === undefined) {
    throw new ApiDocNotFoundError(uri);
  }

  try {
    const text = await safeReadTextFile(path.join(docsRoot, resource.file));
    return { resource, text };
  } catch (error) {
    if (isMissingPathError(error)) {
      return { resource, text: `${resource.name} not found.` };
    }
    throw error;
  }
}
