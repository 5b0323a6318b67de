import { z } from 'zod';
import { EXPORT_FORMATS, QUESTION_TYPES, TARGET_LANGUAGES } from '@tutorpath/shared';
import { InputError } from '../errors.js';
import { toBulletList } from './decoder.js';

const lowercase = (value: unknown) => (typeof value === 'string' ? value.trim().toLowerCase() : value);

export const targetLanguageSchema = z.preprocess(lowercase, z.enum(TARGET_LANGUAGES)).default('english');

export const actionStepSchema = z.object({
  stepNumber: z.coerce.number().int().positive(),
  title: z.string().default(''),
  description: z.string().default(''),
  estimatedTime: z.string().optional(),
  completed: z.boolean().default(false),
});

export const practiceQuestionSchema = z.object({
  questionId: z.coerce.number().int().positive(),
  question: z.string().min(1),
  questionType: z.enum(QUESTION_TYPES),
  options: z.array(z.string()).optional(),
  correctAnswer: z.string(),
  explanation: z.string().default(''),
  difficulty: z.string().default('medium'),
  topic: z.string().default('General'),
});

export const tutorialSummarySchema = z.object({
  title: z.string().min(1).default('Tutorial'),
  shortSummary: z.string().default(''),
  // UI clients may hand back the summary as one bullet blob
  detailedSummary: z.union([z.array(z.string()), z.string()]).default([]).transform(toBulletList),
  duration: z.string().optional(),
  difficultyLevel: z.string().default('Intermediate'),
  keyTopics: z.array(z.string()).default([]),
});

export const processedTutorialSchema = z.object({
  summary: tutorialSummarySchema,
  actionSteps: z.array(actionStepSchema).default([]),
  practiceQuestions: z.array(practiceQuestionSchema).default([]),
  originalLanguage: z.string().default('english'),
  targetLanguage: targetLanguageSchema,
  processingTime: z.number().nonnegative().default(0),
  originalTranscript: z.string().default(''),
});

export const processTutorialRequestSchema = z.object({
  youtubeUrl: z.string().url().optional(),
  transcriptText: z.string().optional(),
  targetLanguage: targetLanguageSchema,
});

export const chatRequestSchema = z.object({
  tutorialData: processedTutorialSchema,
  userMessage: z.string().trim().min(1, 'userMessage must not be empty'),
  chatHistory: z.array(z.object({
    role: z.enum(['user', 'assistant']),
    content: z.string(),
  })).default([]),
});

export const exportRequestSchema = z.object({
  tutorialData: processedTutorialSchema,
  exportFormat: z.preprocess(lowercase, z.enum(EXPORT_FORMATS)).default('markdown'),
});

export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.output<S> {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    const detail = result.error.issues
      .map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`)
      .join('; ');
    throw new InputError(`Invalid request: ${detail}`);
  }
  return result.data;
}
