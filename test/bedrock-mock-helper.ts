/**
 * Bedrock Mock Helper for Local Testing
 *
 * In-process stand-ins for the Bedrock boundary and the image viewer, so task runs
 * can be exercised end to end without AWS credentials or a display.
 */

import { mkdtemp, rm } from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { err, InvocationRequest, InvocationResponse, ok, Result } from '../src/common/types';
import { InvocationError } from '../src/common/utils';
import { InferenceInvoker } from '../src/functions/run-task/services/inference-invoker';
import { ImageViewer } from '../src/functions/run-task/services/output-service';
import { Printer } from '../src/functions/run-task/types';

type Responder = (request: InvocationRequest) => Result<InvocationResponse, InvocationError>;

/**
 * Records every request and answers with the responder's result
 */
export class FakeInvoker implements InferenceInvoker {
  readonly requests: InvocationRequest[] = [];

  constructor(private readonly responder: Responder) {}

  async invoke(request: InvocationRequest): Promise<Result<InvocationResponse, InvocationError>> {
    this.requests.push(request);
    return this.responder(request);
  }
}

export function respondWith(body: string): Responder {
  return () => ok({ rawBody: new TextEncoder().encode(body) });
}

export function failWith(error: InvocationError): Responder {
  return () => err(error);
}

export class RecordingViewer implements ImageViewer {
  readonly opened: string[] = [];

  constructor(private readonly failure?: Error) {}

  async open(filePath: string): Promise<void> {
    if (this.failure) {
      throw this.failure;
    }
    this.opened.push(filePath);
  }
}

export function capturePrinter(): { lines: string[]; print: Printer } {
  const lines: string[] = [];
  return { lines, print: (line: string) => lines.push(line) };
}

export function decodePayload(request: InvocationRequest): unknown {
  return JSON.parse(new TextDecoder().decode(request.payload));
}

export function expectOk<T, E>(result: Result<T, E>): T {
  if (!result.ok) {
    throw new Error(`Expected an ok result, got: ${String(result.error)}`);
  }
  return result.value;
}

export function expectErr<T, E>(result: Result<T, E>): E {
  if (result.ok) {
    throw new Error('Expected an error result, got ok');
  }
  return result.error;
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), 'bedrock-task-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}
