import { writeFile } from 'fs/promises';
import * as path from 'path';
import { TASK_KINDS, TaskInputs, TaskKind } from '../../src/common/types';
import { MissingInputError, ResourceNotFoundError } from '../../src/common/utils';
import { RequestBuilder } from '../../src/functions/run-task/services/request-builder';
import { decodePayload, expectErr, expectOk, makeTempDir, removeTempDir } from '../bedrock-mock-helper';

describe('RequestBuilder', () => {
  const builder = new RequestBuilder();
  let workDir: string;

  beforeEach(async () => {
    workDir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(workDir);
  });

  test('builds a JSON request for text generation with the default model', async () => {
    const request = expectOk(await builder.build('text-generation', { prompt: 'Tell me a joke' }));

    expect(request.modelIdentifier).toBe('anthropic.claude-v2');
    expect(request.contentType).toBe('application/json');
    expect(request.acceptType).toBe('application/json');
    expect(decodePayload(request)).toEqual({ prompt: 'Tell me a joke', max_tokens_to_sample: 200 });
  });

  const cases: Array<[TaskKind, TaskInputs, Record<string, string | number>]> = [
    ['chatbot', { prompt: 'Hi there' }, { prompt: 'Hi there', max_tokens_to_sample: 100 }],
    [
      'sentiment',
      { text: 'Great product' },
      {
        prompt: 'Classify the sentiment of this text as Positive, Negative, or Neutral: Great product',
        max_tokens_to_sample: 20,
      },
    ],
    ['classification', { text: 'Refund request' }, { prompt: 'Classify this text: Refund request', max_tokens_to_sample: 50 }],
    [
      'ner',
      { text: 'Ada Lovelace lived in London.' },
      {
        prompt: 'Extract all named entities (people, organizations, locations) from this text: Ada Lovelace lived in London.',
        max_tokens_to_sample: 100,
      },
    ],
    [
      'question-answering',
      { context: 'The sky is blue.', question: 'What color is the sky?' },
      { prompt: 'Context: The sky is blue.\nQuestion: What color is the sky?\nAnswer:', max_tokens_to_sample: 100 },
    ],
    [
      'translation',
      { text: 'Good morning', targetLanguage: 'de' },
      { prompt: 'Translate this to de: Good morning', max_tokens_to_sample: 100 },
    ],
    [
      'code-generation',
      { prompt: 'Sort a list', language: 'Go' },
      { prompt: 'Write Go code for the following task: Sort a list', max_tokens_to_sample: 200 },
    ],
    ['summarization', { text: 'Long text here' }, { prompt: 'Summarize this: Long text here', max_tokens_to_sample: 100 }],
    ['image-generation', { prompt: 'A red bicycle' }, { prompt: 'A red bicycle' }],
    ['document-understanding', { documentText: 'Lease agreement' }, { document: 'Lease agreement' }],
  ];

  test.each(cases)('builds the %s request body from its inputs', async (task, inputs, expected) => {
    const request = expectOk(await builder.build(task, inputs));

    expect(decodePayload(request)).toEqual(expected);
  });

  test('preserves quotes and newlines in inputs', async () => {
    const prompt = 'He said "hi"\nthen left';

    const request = expectOk(await builder.build('chatbot', { prompt }));

    expect(decodePayload(request)).toEqual({ prompt, max_tokens_to_sample: 100 });
  });

  test('decodes byte inputs for text fields as UTF-8', async () => {
    const request = expectOk(await builder.build('classification', { text: new TextEncoder().encode('Bytes text') }));

    expect(decodePayload(request)).toEqual({ prompt: 'Classify this text: Bytes text', max_tokens_to_sample: 50 });
  });

  test('base64-encodes image bytes passed directly', async () => {
    const request = expectOk(await builder.build('image-captioning', { image: new Uint8Array([1, 2, 3]) }));

    expect(request.modelIdentifier).toBe('stability.stable-diffusion-xl-v0');
    expect(decodePayload(request)).toEqual({ image: 'AQID' });
  });

  test('reads the image file relative to the working directory for visual QA', async () => {
    await writeFile(path.join(workDir, 'photo.jpg'), 'hello');

    const request = expectOk(
      await builder.build('visual-qa', { imagePath: 'photo.jpg', question: 'What is this?' }, { workingDirectory: workDir })
    );

    expect(decodePayload(request)).toEqual({ image: 'aGVsbG8=', question: 'What is this?' });
  });

  test('fails with MissingInputError when a required input is absent', async () => {
    const error = expectErr(await builder.build('chatbot', {}));

    expect(error).toBeInstanceOf(MissingInputError);
    expect(error).toMatchObject({ task: 'chatbot', input: 'prompt' });
  });

  test('treats an empty string as missing', async () => {
    const error = expectErr(await builder.build('translation', { text: 'Hello', targetLanguage: '' }));

    expect(error).toBeInstanceOf(MissingInputError);
    expect(error).toMatchObject({ input: 'targetLanguage' });
  });

  test('fails with MissingInputError when an image task has neither bytes nor a path', async () => {
    const error = expectErr(await builder.build('image-captioning', {}));

    expect(error).toBeInstanceOf(MissingInputError);
    expect(error).toMatchObject({ input: 'imagePath' });
  });

  test('fails with ResourceNotFoundError when the image file does not exist', async () => {
    const error = expectErr(
      await builder.build('visual-qa', { imagePath: 'missing.jpg', question: 'Anything?' }, { workingDirectory: workDir })
    );

    expect(error).toBeInstanceOf(ResourceNotFoundError);
    expect(error.message).toBe('Image file not found: missing.jpg');
  });

  test.each(TASK_KINDS.map(task => [task]))('builds %s from the catalogue defaults', async task => {
    await writeFile(path.join(workDir, 'input.jpg'), 'hello');

    const result = await builder.build(task, {}, { applyDefaults: true, workingDirectory: workDir });

    expect(result.ok).toBe(true);
  });

  test('uses the catalogue default text when defaults are applied', async () => {
    const request = expectOk(await builder.build('sentiment', {}, { applyDefaults: true }));

    expect(decodePayload(request)).toEqual({
      prompt: 'Classify the sentiment of this text as Positive, Negative, or Neutral: I love using AWS Bedrock!',
      max_tokens_to_sample: 20,
    });
  });

  test('applies the model and max token overrides', async () => {
    const request = expectOk(
      await builder.build('summarization', { text: 'Abc' }, { modelId: 'anthropic.claude-instant-v1', maxTokens: 42 })
    );

    expect(request.modelIdentifier).toBe('anthropic.claude-instant-v1');
    expect(decodePayload(request)).toEqual({ prompt: 'Summarize this: Abc', max_tokens_to_sample: 42 });
  });

  test('ignores a max token override for tasks without a length hint', async () => {
    const request = expectOk(await builder.build('document-understanding', { documentText: 'Memo' }, { maxTokens: 42 }));

    expect(decodePayload(request)).toEqual({ document: 'Memo' });
  });

  test('produces byte-identical payloads for identical inputs', async () => {
    await writeFile(path.join(workDir, 'photo.jpg'), 'hello');
    const inputs = { imagePath: 'photo.jpg', question: 'Same?' };

    const first = expectOk(await builder.build('visual-qa', inputs, { workingDirectory: workDir }));
    const second = expectOk(await builder.build('visual-qa', inputs, { workingDirectory: workDir }));

    expect(Buffer.from(first.payload).equals(Buffer.from(second.payload))).toBe(true);
  });
});
