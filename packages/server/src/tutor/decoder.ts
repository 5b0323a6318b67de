// ============================================================================
// TutorPath — Tolerant Decoder
// Turns raw model text into shared tutorial records. parse* functions report
// failure as a value; decode* functions substitute fallback content.
// ============================================================================
import type { ActionStep, PracticeQuestion, QuestionType, TutorialSummary } from '@tutorpath/shared';
import { DecodeError, errorMessage } from '../errors.js';
import { cleanModelJson, extractOutermostObject } from './repair.js';
import { contentAwareQuestions, genericActionSteps } from './fallbacks.js';

export type DecodeResult<T> = { ok: true; value: T } | { ok: false; error: string };

export interface StructuredTutorial {
  summary: TutorialSummary;
  actionSteps: ActionStep[];
}

type JsonRecord = Record<string, unknown>;

const BULLET_RE = /^(?:[•–]\s*|[-*]\s+|\d+[.)]\s+)/;
const LINE_BREAK_RE = /\r?\n|\\n/;

// ── Field coercion ──────────────────────────────────────────────────────────

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asText(value: unknown, fallback: string): string {
  if (value === undefined || value === null) return fallback;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

function optionalText(value: unknown): string | undefined {
  const text = asText(value, '').trim();
  return text || undefined;
}

function stripBullet(line: string): string {
  return line.trim().replace(BULLET_RE, '').trim();
}

/** Ordered, non-empty bullet strings from an array or a newline-joined blob. */
export function toBulletList(value: unknown): string[] {
  if (value === undefined || value === null) return [];
  const lines = Array.isArray(value)
    ? value.flatMap(item => asText(item, '').split(LINE_BREAK_RE))
    : asText(value, '').split(LINE_BREAK_RE);
  return lines.map(stripBullet).filter(line => line.length > 0);
}

function toTagList(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.map(item => asText(item, '').trim()).filter(Boolean);
  }
  if (typeof value === 'string') {
    return value.split(/[,\n]/).map(stripBullet).filter(Boolean);
  }
  return [];
}

function toOptions(value: unknown): string[] | undefined {
  if (value === undefined || value === null) return undefined;
  const options = Array.isArray(value)
    ? value.map(item => asText(item, '').trim()).filter(Boolean)
    : toBulletList(value);
  return options.length > 0 ? options : undefined;
}

function toPositiveInt(value: unknown, fallback: number, field: string): number {
  if (value === undefined || value === null) return fallback;
  const n = typeof value === 'string' && /^\s*\d+\s*$/.test(value) ? parseInt(value, 10) : value;
  if (typeof n !== 'number' || !Number.isInteger(n) || n < 1) {
    throw new DecodeError(`${field} is not a positive integer: ${JSON.stringify(value)}`);
  }
  return n;
}

export function normalizeQuestionType(value: unknown): QuestionType | undefined {
  const key = asText(value, '').trim().toLowerCase().replace(/[\s\-/]+/g, '_');
  switch (key) {
    case 'multiple_choice':
    case 'multiplechoice':
    case 'mcq':
      return 'multiple_choice';
    case 'true_false':
    case 'truefalse':
    case 'boolean':
      return 'true_false';
    case 'short_answer':
    case 'shortanswer':
    case 'open_ended':
      return 'short_answer';
    default:
      return undefined;
  }
}

function parseObject(span: string | null): JsonRecord {
  if (span === null) throw new DecodeError('No JSON object found in model response');
  const data: unknown = JSON.parse(span);
  if (!isRecord(data)) throw new DecodeError('Model response is not a JSON object');
  return data;
}

// ── Structuring path ────────────────────────────────────────────────────────

function coerceStep(raw: unknown, index: number): ActionStep {
  if (!isRecord(raw)) throw new DecodeError(`action step ${index + 1} is not an object`);
  return {
    stepNumber: toPositiveInt(raw.step_number, index + 1, 'step_number'),
    title: asText(raw.title, '').trim(),
    description: asText(raw.description, '').trim(),
    estimatedTime: optionalText(raw.estimated_time),
    completed: false,
  };
}

export function parseTutorialResponse(raw: string): DecodeResult<StructuredTutorial> {
  try {
    const data = parseObject(extractOutermostObject(raw));

    const title = asText(data.title, '').trim() || 'Tutorial';
    const shortSummary = asText(data.short_summary, '').trim();
    let detailedSummary = toBulletList(data.detailed_summary);
    if (detailedSummary.length === 0) detailedSummary = [shortSummary || title];

    const summary: TutorialSummary = {
      title,
      shortSummary,
      detailedSummary,
      duration: optionalText(data.duration),
      difficultyLevel: asText(data.difficulty_level, '').trim() || 'Intermediate',
      keyTopics: toTagList(data.key_topics),
    };

    const rawSteps = Array.isArray(data.action_steps) ? data.action_steps : [];
    const actionSteps = rawSteps.map(coerceStep);

    return {
      ok: true,
      value: { summary, actionSteps: actionSteps.length > 0 ? actionSteps : genericActionSteps() },
    };
  } catch (err) {
    return { ok: false, error: errorMessage(err) };
  }
}

// ── Practice-questions path ─────────────────────────────────────────────────

export function coerceQuestion(raw: unknown, index: number): PracticeQuestion {
  if (!isRecord(raw)) throw new DecodeError(`question ${index + 1} is not an object`);

  const questionId = toPositiveInt(raw.question_id, index + 1, 'question_id');
  const question = asText(raw.question, '').trim();
  if (!question) throw new DecodeError(`question ${questionId} has no text`);

  let options = toOptions(raw.options);
  let questionType = normalizeQuestionType(raw.question_type) ?? (options ? 'multiple_choice' : 'short_answer');

  if (questionType === 'true_false' && !options) options = ['True', 'False'];
  if (questionType === 'multiple_choice' && !options) questionType = 'short_answer';
  if (questionType === 'short_answer') options = undefined;

  let correctAnswer = asText(raw.correct_answer, '').trim();
  if (options) {
    const wanted = correctAnswer.toLowerCase();
    const match = options.find(option => option.toLowerCase() === wanted);
    if (match === undefined) {
      throw new DecodeError(`question ${questionId}: correct answer "${correctAnswer}" is not one of its options`);
    }
    correctAnswer = match;
  }

  return {
    questionId,
    question,
    questionType,
    ...(options ? { options } : {}),
    correctAnswer,
    explanation: asText(raw.explanation, '').trim(),
    difficulty: asText(raw.difficulty, '').trim() || 'medium',
    topic: asText(raw.topic, '').trim() || 'General',
  };
}

/** Questions that survive coercion; malformed entries are dropped individually. */
export function parseQuestionsResponse(raw: string): DecodeResult<PracticeQuestion[]> {
  let data: JsonRecord;
  try {
    data = parseObject(cleanModelJson(raw));
  } catch (err) {
    return { ok: false, error: errorMessage(err) };
  }

  const items = Array.isArray(data.questions) ? data.questions : [];
  const questions: PracticeQuestion[] = [];
  items.forEach((item, index) => {
    try {
      questions.push(coerceQuestion(item, index));
    } catch (err) {
      console.warn(`📝 Decoder: dropping question: ${errorMessage(err)}`);
    }
  });

  return { ok: true, value: questions };
}

export function decodeQuestions(raw: string, transcript: string): PracticeQuestion[] {
  const result = parseQuestionsResponse(raw);
  if (result.ok && result.value.length > 0) return result.value;

  console.warn(`📝 Decoder: ${result.ok ? 'no usable questions in response' : result.error}, synthesizing fallback questions`);
  return contentAwareQuestions(transcript);
}
