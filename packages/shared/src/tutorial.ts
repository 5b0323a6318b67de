// Tutorial processing types

export const TARGET_LANGUAGES = ['english', 'spanish', 'french', 'german', 'hindi'] as const;
export type TargetLanguage = typeof TARGET_LANGUAGES[number];

export const QUESTION_TYPES = ['multiple_choice', 'true_false', 'short_answer'] as const;
export type QuestionType = typeof QUESTION_TYPES[number];

export interface TutorialSummary {
  title: string;
  shortSummary: string;
  detailedSummary: string[];
  duration?: string;
  difficultyLevel: string;
  keyTopics: string[];
}

export interface ActionStep {
  stepNumber: number;
  title: string;
  description: string;
  estimatedTime?: string;
  completed: boolean;
}

export interface PracticeQuestion {
  questionId: number;
  question: string;
  questionType: QuestionType;
  options?: string[]; // multiple_choice / true_false only
  correctAnswer: string;
  explanation: string;
  difficulty: string;
  topic: string;
}

export interface ProcessedTutorial {
  summary: TutorialSummary;
  actionSteps: ActionStep[];
  practiceQuestions: PracticeQuestion[];
  originalLanguage: string;
  targetLanguage: TargetLanguage;
  processingTime: number; // seconds
  originalTranscript: string;
}

export interface ProcessTutorialRequest {
  youtubeUrl?: string;
  transcriptText?: string;
  targetLanguage?: TargetLanguage;
}

export function isTargetLanguage(value: string): value is TargetLanguage {
  return (TARGET_LANGUAGES as readonly string[]).includes(value);
}
