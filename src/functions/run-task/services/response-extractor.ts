/**
 * Response extractor
 * Pulls the task-relevant result out of heterogeneous model response bodies
 *
 * Never throws on an unexpected shape: it degrades to the raw text or to a
 * not-found result. Only a present-but-corrupt image yields a DecodeError.
 */

import { getTaskDefinition } from '../../../common/task-catalog';
import { err, ExtractedResult, InvocationResponse, ok, ResponseMode, Result, TaskKind } from '../../../common/types';
import { DecodeError, getErrorMessage, isRecord, logDebug, logWarn } from '../../../common/utils';

export interface ExtractOptions {
  responseMode?: ResponseMode;
}

export const IMAGE_MIME_HINT = 'image/png';

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export class ResponseExtractor {
  private readonly jsonDecoder = new TextDecoder();
  /** Text results are returned byte for byte, so a leading BOM is kept */
  private readonly textDecoder = new TextDecoder('utf-8', { ignoreBOM: true });

  extract(task: TaskKind, response: InvocationResponse, options: ExtractOptions = {}): Result<ExtractedResult, DecodeError> {
    switch (getTaskDefinition(task).extraction) {
      case 'image-artifact':
        return this.extractImage(this.jsonDecoder.decode(response.rawBody));
      case 'raw-text':
        return ok(this.extractText(this.textDecoder.decode(response.rawBody), options.responseMode ?? 'raw'));
    }
  }

  /**
   * Stability-style `artifacts[0].base64`, falling back to a top-level `image`
   */
  private extractImage(body: string): Result<ExtractedResult, DecodeError> {
    logDebug('Raw image generation result', { body: body.substring(0, 500) });

    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (error) {
      logWarn('Could not parse image JSON', { error: getErrorMessage(error) });
      return ok({ kind: 'not-found', reason: 'Response body is not valid JSON' });
    }

    const encoded = findImageBase64(parsed);
    if (encoded === undefined) {
      return ok({ kind: 'not-found', reason: 'No base64 image found in response' });
    }

    const bytes = decodeBase64(encoded);
    if (bytes === undefined) {
      return err(new DecodeError('Image data in response is not valid base64', { length: encoded.length }));
    }

    return ok({ kind: 'binary', bytes, mimeHint: IMAGE_MIME_HINT });
  }

  private extractText(body: string, mode: ResponseMode): ExtractedResult {
    if (body.length === 0) {
      return { kind: 'not-found', reason: 'Response body is empty' };
    }

    if (mode === 'fields') {
      const fields = scalarFields(body);
      if (fields !== undefined) {
        return { kind: 'structured', fields };
      }
    }

    return { kind: 'text', text: body };
  }
}

function findImageBase64(parsed: unknown): string | undefined {
  if (!isRecord(parsed)) return undefined;

  const artifacts = parsed.artifacts;
  if (Array.isArray(artifacts) && artifacts.length > 0) {
    const first: unknown = artifacts[0];
    if (isRecord(first) && typeof first.base64 === 'string' && first.base64.length > 0) {
      return first.base64;
    }
  }

  if (typeof parsed.image === 'string' && parsed.image.length > 0) {
    return parsed.image;
  }

  return undefined;
}

export function decodeBase64(encoded: string): Uint8Array | undefined {
  const compact = encoded.replace(/\s+/g, '');
  if (compact.length === 0 || !BASE64_PATTERN.test(compact)) {
    return undefined;
  }
  return Buffer.from(compact, 'base64');
}

/**
 * Top-level string, number and boolean fields of a JSON object body
 */
function scalarFields(body: string): Record<string, string> | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return undefined;
  }
  if (!isRecord(parsed)) return undefined;

  const fields: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      fields[key] = String(value);
    }
  }

  return Object.keys(fields).length > 0 ? fields : undefined;
}
