/**
 * Shared TypeScript type definitions for the Bedrock task runner
 */

// ===== Task Kinds =====

export type TaskKind =
  | 'image-generation'
  | 'text-generation'
  | 'chatbot'
  | 'sentiment'
  | 'translation'
  | 'classification'
  | 'question-answering'
  | 'ner'
  | 'image-captioning'
  | 'visual-qa'
  | 'document-understanding'
  | 'code-generation'
  | 'summarization';

export const TASK_KINDS: readonly TaskKind[] = [
  'image-generation',
  'text-generation',
  'chatbot',
  'sentiment',
  'translation',
  'classification',
  'question-answering',
  'ner',
  'image-captioning',
  'visual-qa',
  'document-understanding',
  'code-generation',
  'summarization',
];

export function isTaskKind(value: string): value is TaskKind {
  return TASK_KINDS.some(kind => kind === value);
}

// ===== Inputs =====

export type TaskInputValue = string | Uint8Array;

/**
 * Named free-form inputs for a task (prompt, text, imagePath, ...)
 * Image bytes may be passed directly under `image`
 */
export type TaskInputs = Record<string, TaskInputValue | undefined>;

// ===== Inference Boundary =====

export interface InvocationRequest {
  readonly modelIdentifier: string;
  readonly contentType: string;
  readonly acceptType: string;
  readonly payload: Uint8Array;
}

export interface InvocationResponse {
  readonly rawBody: Uint8Array;
}

// ===== Extracted Results =====

export interface TextResult {
  kind: 'text';
  text: string;
}

export interface BinaryResult {
  kind: 'binary';
  bytes: Uint8Array;
  mimeHint: string;
}

export interface StructuredResult {
  kind: 'structured';
  fields: Record<string, string>;
}

/**
 * Not an error: the response was fine but the expected field was absent
 */
export interface NotFoundResult {
  kind: 'not-found';
  reason: string;
}

export type ExtractedResult = TextResult | BinaryResult | StructuredResult | NotFoundResult;

// ===== Results =====

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

// ===== Configuration =====

/**
 * `raw` prints the response body verbatim; `fields` flattens a JSON object body
 */
export type ResponseMode = 'raw' | 'fields';

export interface AWSConfig {
  region: string;
  maxAttempts?: number;
}

/**
 * Everything a single task run needs, resolved up front and passed explicitly
 */
export interface TaskRunConfig {
  task: TaskKind;
  region: string;
  modelId: string;
  inputs: TaskInputs;
  maxTokens?: number;
  responseMode: ResponseMode;
  outputDirectory: string;
  workingDirectory: string;
}
