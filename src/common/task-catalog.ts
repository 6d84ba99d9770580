/**
 * Task catalogue
 *
 * One entry per task kind: which inputs it needs, where they come from in the
 * settings, the request body sent to the model and how the response is read.
 * RequestBuilder and ResponseExtractor both dispatch on this table, so the two
 * halves of each task's contract live side by side.
 */

import { TaskKind } from './types';

export type ExtractionStrategy = 'image-artifact' | 'raw-text';

export type RequestBody = Record<string, string | number>;

export interface TaskInputSpec {
  name: string;
  /** Label used when echoing the input to the console */
  label: string;
  settingKey: string;
  defaultValue: string;
  /** `image` inputs are file paths whose bytes end up base64-encoded in the body */
  kind: 'text' | 'image';
}

export interface TaskDefinition {
  kind: TaskKind;
  label: string;
  resultLabel: string;
  modelSettingKey: string;
  defaultModelId: string;
  inputs: readonly TaskInputSpec[];
  /** Default `max_tokens_to_sample`; tasks without one send no length hint */
  maxTokens?: number;
  extraction: ExtractionStrategy;
  /** `values` holds every input by name, plus `image` (base64) for image tasks */
  buildBody(values: Readonly<Record<string, string>>): RequestBody;
}

export const DEFAULT_TEXT_MODEL_ID = 'anthropic.claude-v2';
export const DEFAULT_IMAGE_MODEL_ID = 'stability.stable-diffusion-xl-v0';
export const DEFAULT_IMAGE_PATH = 'input.jpg';

const IMAGE_PATH_INPUT: TaskInputSpec = {
  name: 'imagePath',
  label: 'Image Path',
  settingKey: 'Bedrock:ImagePath',
  defaultValue: DEFAULT_IMAGE_PATH,
  kind: 'image',
};

function textInput(name: string, label: string, settingKey: string, defaultValue: string): TaskInputSpec {
  return { name, label, settingKey, defaultValue, kind: 'text' };
}

const TASKS: Record<TaskKind, TaskDefinition> = {
  'image-generation': {
    kind: 'image-generation',
    label: 'Image Generation',
    resultLabel: 'Image Generation Result',
    modelSettingKey: 'Bedrock:ImageModelId',
    defaultModelId: DEFAULT_IMAGE_MODEL_ID,
    inputs: [
      textInput('prompt', 'Image Generation Prompt', 'Bedrock:Prompt', 'A futuristic city skyline at sunset, digital art.'),
    ],
    extraction: 'image-artifact',
    buildBody: values => ({ prompt: values.prompt }),
  },
  'text-generation': {
    kind: 'text-generation',
    label: 'Text Generation',
    resultLabel: 'Text Generation Result',
    modelSettingKey: 'Bedrock:TextModelId',
    defaultModelId: DEFAULT_TEXT_MODEL_ID,
    inputs: [
      textInput('prompt', 'Prompt', 'Bedrock:Prompt', 'Write a short story about a robot learning to paint.'),
    ],
    maxTokens: 200,
    extraction: 'raw-text',
    buildBody: values => ({ prompt: values.prompt }),
  },
  chatbot: {
    kind: 'chatbot',
    label: 'Chatbot',
    resultLabel: 'Chatbot Response',
    modelSettingKey: 'Bedrock:ChatModelId',
    defaultModelId: DEFAULT_TEXT_MODEL_ID,
    inputs: [textInput('prompt', 'Chatbot Prompt', 'Bedrock:Prompt', 'Hello! How can I help you today?')],
    maxTokens: 100,
    extraction: 'raw-text',
    buildBody: values => ({ prompt: values.prompt }),
  },
  sentiment: {
    kind: 'sentiment',
    label: 'Sentiment Analysis',
    resultLabel: 'Sentiment Result',
    modelSettingKey: 'Bedrock:SentimentModelId',
    defaultModelId: DEFAULT_TEXT_MODEL_ID,
    inputs: [textInput('text', 'Text', 'Bedrock:Text', 'I love using AWS Bedrock!')],
    maxTokens: 20,
    extraction: 'raw-text',
    buildBody: values => ({
      prompt: `Classify the sentiment of this text as Positive, Negative, or Neutral: ${values.text}`,
    }),
  },
  translation: {
    kind: 'translation',
    label: 'Text Translation',
    resultLabel: 'Translation Result',
    modelSettingKey: 'Bedrock:TranslationModelId',
    defaultModelId: DEFAULT_TEXT_MODEL_ID,
    inputs: [
      textInput('text', 'Text', 'Bedrock:Text', 'Hello, how are you?'),
      textInput('targetLanguage', 'Target Language', 'Bedrock:TargetLanguage', 'fr'),
    ],
    maxTokens: 100,
    extraction: 'raw-text',
    buildBody: values => ({ prompt: `Translate this to ${values.targetLanguage}: ${values.text}` }),
  },
  classification: {
    kind: 'classification',
    label: 'Text Classification',
    resultLabel: 'Classification Result',
    modelSettingKey: 'Bedrock:ClassificationModelId',
    defaultModelId: DEFAULT_TEXT_MODEL_ID,
    inputs: [textInput('text', 'Text', 'Bedrock:Text', 'This is a support ticket about a billing issue.')],
    maxTokens: 50,
    extraction: 'raw-text',
    buildBody: values => ({ prompt: `Classify this text: ${values.text}` }),
  },
  'question-answering': {
    kind: 'question-answering',
    label: 'Question Answering',
    resultLabel: 'Answer Result',
    modelSettingKey: 'Bedrock:QAModelId',
    defaultModelId: DEFAULT_TEXT_MODEL_ID,
    inputs: [
      textInput('context', 'Context', 'Bedrock:Context', 'AWS Bedrock is a fully managed service for generative AI.'),
      textInput('question', 'Question', 'Bedrock:Question', 'What is AWS Bedrock?'),
    ],
    maxTokens: 100,
    extraction: 'raw-text',
    buildBody: values => ({ prompt: `Context: ${values.context}\nQuestion: ${values.question}\nAnswer:` }),
  },
  ner: {
    kind: 'ner',
    label: 'Named Entity Recognition',
    resultLabel: 'NER Result',
    modelSettingKey: 'Bedrock:NERModelId',
    defaultModelId: DEFAULT_TEXT_MODEL_ID,
    inputs: [textInput('text', 'Text', 'Bedrock:Text', 'Jeff Bezos founded Amazon in Seattle.')],
    maxTokens: 100,
    extraction: 'raw-text',
    buildBody: values => ({
      prompt: `Extract all named entities (people, organizations, locations) from this text: ${values.text}`,
    }),
  },
  'image-captioning': {
    kind: 'image-captioning',
    label: 'Image Captioning',
    resultLabel: 'Captioning Result',
    modelSettingKey: 'Bedrock:ImageCaptionModelId',
    defaultModelId: DEFAULT_IMAGE_MODEL_ID,
    inputs: [IMAGE_PATH_INPUT],
    extraction: 'raw-text',
    buildBody: values => ({ image: values.image }),
  },
  'visual-qa': {
    kind: 'visual-qa',
    label: 'Visual Question Answering',
    resultLabel: 'VQA Result',
    modelSettingKey: 'Bedrock:VQAModelId',
    defaultModelId: DEFAULT_TEXT_MODEL_ID,
    inputs: [IMAGE_PATH_INPUT, textInput('question', 'Question', 'Bedrock:Question', 'What is in the image?')],
    extraction: 'raw-text',
    buildBody: values => ({ image: values.image, question: values.question }),
  },
  'document-understanding': {
    kind: 'document-understanding',
    label: 'Document Understanding',
    resultLabel: 'Document Understanding Result',
    modelSettingKey: 'Bedrock:DocModelId',
    defaultModelId: DEFAULT_TEXT_MODEL_ID,
    inputs: [
      textInput(
        'documentText',
        'Document Text',
        'Bedrock:DocumentText',
        'This contract is between Alice and Bob for the sale of a car.'
      ),
    ],
    extraction: 'raw-text',
    buildBody: values => ({ document: values.documentText }),
  },
  'code-generation': {
    kind: 'code-generation',
    label: 'Code Generation',
    resultLabel: 'Code Generation Result',
    modelSettingKey: 'Bedrock:CodeModelId',
    defaultModelId: DEFAULT_TEXT_MODEL_ID,
    inputs: [
      textInput('prompt', 'Prompt', 'Bedrock:Prompt', 'Write a function that checks whether a string is a palindrome.'),
      textInput('language', 'Language', 'Bedrock:CodeLanguage', 'TypeScript'),
    ],
    maxTokens: 200,
    extraction: 'raw-text',
    buildBody: values => ({ prompt: `Write ${values.language} code for the following task: ${values.prompt}` }),
  },
  summarization: {
    kind: 'summarization',
    label: 'Text Summarization',
    resultLabel: 'Summary Result',
    modelSettingKey: 'Bedrock:TextModelId',
    defaultModelId: DEFAULT_TEXT_MODEL_ID,
    inputs: [
      textInput(
        'text',
        'Original Text',
        'Bedrock:TextToSummarize',
        'Amazon Bedrock is a fully managed service that makes foundation models from leading AI companies accessible via an API, so you can build and scale generative AI applications easily.'
      ),
    ],
    maxTokens: 100,
    extraction: 'raw-text',
    buildBody: values => ({ prompt: `Summarize this: ${values.text}` }),
  },
};

export function getTaskDefinition(task: TaskKind): TaskDefinition {
  return TASKS[task];
}
