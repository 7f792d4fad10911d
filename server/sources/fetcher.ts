import fs from 'node:fs/promises';
import { BASE_TEMPLATE_PREFIX } from '../catalog/summary';
import { FetchError, errorMessage } from '../catalog/errors';
import { decodeDocument, syntaxForPath, type DocumentSyntax } from '../utils/decode';

export interface FetchSourceOptions {
  timeoutMs: number;
  userAgent?: string;
  signal?: AbortSignal;
}

const REMOTE_PATTERN = /^https?:\/\//i;

/** Needs both a scheme and a host, so `file:///x` and `mailto:` are rejected. */
export const isValidUrl = (ref: string): boolean => {
  try {
    const url = new URL(ref);
    return Boolean(url.protocol && url.host);
  } catch {
    return false;
  }
};

export const isRemoteRef = (ref: string): boolean => REMOTE_PATTERN.test(ref) && isValidUrl(ref);

/** Drops the base-template marker; the caller keeps the prefixed id as the source id. */
export const resolveSourceLocation = (sourceId: string): string =>
  sourceId.startsWith(BASE_TEMPLATE_PREFIX) ? sourceId.slice(BASE_TEMPLATE_PREFIX.length) : sourceId;

const decodeOrThrow = (sourceId: string, text: string, syntax: DocumentSyntax): unknown => {
  try {
    return decodeDocument(text, syntax);
  } catch (error) {
    throw new FetchError('decode', sourceId, `Could not parse ${syntax.toUpperCase()}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
};

const fetchRemote = async (sourceId: string, url: string, options: FetchSourceOptions): Promise<unknown> => {
  if (options.signal?.aborted) {
    throw new FetchError('network', sourceId, 'Aborted');
  }

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);
  const abortListener = () => controller.abort();
  options.signal?.addEventListener('abort', abortListener, { once: true });

  try {
    let response: Response;
    try {
      response = await fetch(url, {
        method: 'GET',
        headers: {
          Accept: 'application/json, application/yaml, text/yaml, text/plain;q=0.9, */*;q=0.8',
          ...(options.userAgent ? { 'User-Agent': options.userAgent } : {}),
        },
        redirect: 'follow',
        signal: controller.signal,
      });
    } catch (error) {
      if (timedOut) {
        throw new FetchError('timeout', sourceId, `Timed out after ${options.timeoutMs}ms`, { cause: error });
      }
      throw new FetchError('network', sourceId, errorMessage(error), { cause: error });
    }

    if (!response.ok) {
      throw new FetchError('network', sourceId, `HTTP ${response.status} ${response.statusText}`.trim());
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      const kind = timedOut ? 'timeout' : 'network';
      throw new FetchError(kind, sourceId, errorMessage(error), { cause: error });
    }

    return decodeOrThrow(sourceId, text, syntaxForPath(new URL(url).pathname));
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener('abort', abortListener);
  }
};

const readLocal = async (sourceId: string, filePath: string): Promise<unknown> => {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new FetchError('io', sourceId, `Could not read ${filePath}: ${errorMessage(error)}`, { cause: error });
  }
  return decodeOrThrow(sourceId, text, syntaxForPath(filePath));
};

/**
 * Loads and decodes one source. `sourceId` is a URL, a file path, or either
 * of those behind the base-template prefix. Failures surface as `FetchError`.
 */
export const fetchSource = async (sourceId: string, options: FetchSourceOptions): Promise<unknown> => {
  const location = resolveSourceLocation(sourceId);
  if (isRemoteRef(location)) {
    return await fetchRemote(sourceId, location, options);
  }
  return await readLocal(sourceId, location);
};
