import { DEFAULT_IMAGE_MODEL_ID, DEFAULT_TEXT_MODEL_ID, getTaskDefinition } from '../../src/common/task-catalog';
import { isTaskKind, TASK_KINDS } from '../../src/common/types';

describe('Task catalogue', () => {
  test('defines every task kind under its own key', () => {
    for (const kind of TASK_KINDS) {
      expect(getTaskDefinition(kind).kind).toBe(kind);
    }
  });

  test('uses the image model only for image generation and captioning', () => {
    const imageTasks = TASK_KINDS.filter(kind => getTaskDefinition(kind).defaultModelId === DEFAULT_IMAGE_MODEL_ID);

    expect(imageTasks).toEqual(['image-generation', 'image-captioning']);
    expect(getTaskDefinition('visual-qa').defaultModelId).toBe(DEFAULT_TEXT_MODEL_ID);
  });

  test('extracts images only for image generation', () => {
    const imageExtraction = TASK_KINDS.filter(kind => getTaskDefinition(kind).extraction === 'image-artifact');

    expect(imageExtraction).toEqual(['image-generation']);
  });

  test.each([
    ['sentiment', 20],
    ['classification', 50],
    ['text-generation', 200],
    ['code-generation', 200],
    ['chatbot', 100],
    ['summarization', 100],
    ['image-generation', undefined],
    ['visual-qa', undefined],
    ['document-understanding', undefined],
  ] as const)('gives %s a max token default of %s', (kind, maxTokens) => {
    expect(getTaskDefinition(kind).maxTokens).toBe(maxTokens);
  });

  test('recognises task kinds', () => {
    expect(isTaskKind('ner')).toBe(true);
    expect(isTaskKind('poetry')).toBe(false);
  });
});
