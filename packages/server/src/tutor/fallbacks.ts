// ============================================================================
// TutorPath — Fallback content
// Deterministic substitutes used whenever model output cannot be trusted.
// ============================================================================
import type { ActionStep, PracticeQuestion, ProcessedTutorial, TargetLanguage } from '@tutorpath/shared';

export const TECH_VOCABULARY = [
  'python', 'javascript', 'aws', 'cloud', 'database', 'api', 'web', 'server', 'network', 'security',
  'data', 'machine learning', 'ai', 'docker', 'kubernetes', 'react', 'node', 'sql', 'html', 'css',
] as const;

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

export function titleCase(term: string): string {
  return term.split(' ').map(word => word.charAt(0).toUpperCase() + word.slice(1)).join(' ');
}

/** Vocabulary terms found as whole words (or their plurals) in the transcript, in vocabulary order. */
export function findTechTerms(transcript: string): string[] {
  return TECH_VOCABULARY.filter(term => new RegExp(`\\b${term}s?\\b`, 'i').test(transcript));
}

export function genericActionSteps(): ActionStep[] {
  return [
    {
      stepNumber: 1,
      title: 'Review Tutorial Content',
      description: 'Go through the original tutorial content to understand the main concepts.',
      estimatedTime: '10-15 minutes',
      completed: false,
    },
    {
      stepNumber: 2,
      title: 'Practice Key Concepts',
      description: 'Apply the concepts learned from the tutorial in practical exercises.',
      estimatedTime: '20-30 minutes',
      completed: false,
    },
  ];
}

export function genericQuestions(): PracticeQuestion[] {
  return [
    {
      questionId: 1,
      question: 'What was the main topic of this tutorial?',
      questionType: 'short_answer',
      correctAnswer: 'Based on the tutorial content',
      explanation: 'Reflect on the key concepts discussed in the tutorial',
      difficulty: 'easy',
      topic: 'General',
    },
    {
      questionId: 2,
      question: 'True or False: This tutorial provided actionable steps',
      questionType: 'true_false',
      options: ['True', 'False'],
      correctAnswer: 'True',
      explanation: 'The tutorial was processed into actionable steps',
      difficulty: 'easy',
      topic: 'General',
    },
  ];
}

/**
 * Three questions (short answer, true/false, multiple choice). When the
 * transcript mentions a known technical term the first and last question
 * are about that term.
 */
export function contentAwareQuestions(transcript: string): PracticeQuestion[] {
  const [term] = findTechTerms(transcript);
  const topic = term ? titleCase(term) : undefined;

  const opening: PracticeQuestion = topic
    ? {
        questionId: 1,
        question: `Based on the tutorial content, what is the main focus regarding ${topic}?`,
        questionType: 'short_answer',
        correctAnswer: `The tutorial focuses on ${topic} concepts and their practical application`,
        explanation: `The tutorial content specifically mentions ${topic} and related concepts`,
        difficulty: 'easy',
        topic,
      }
    : {
        questionId: 1,
        question: 'What is the main topic or subject covered in this tutorial?',
        questionType: 'short_answer',
        correctAnswer: 'The main topic discussed in the tutorial content',
        explanation: 'Review the tutorial title and key concepts to identify the primary subject matter',
        difficulty: 'easy',
        topic: 'Main Topic',
      };

  const structure: PracticeQuestion = {
    questionId: 2,
    question: 'True or False: This tutorial provides practical, actionable information',
    questionType: 'true_false',
    options: ['True', 'False'],
    correctAnswer: 'True',
    explanation: 'The tutorial content is designed to provide practical guidance and actionable steps',
    difficulty: 'easy',
    topic: 'Tutorial Structure',
  };

  const approach: PracticeQuestion = topic
    ? {
        questionId: 3,
        question: `According to the tutorial, what is the best approach to learning ${topic}?`,
        questionType: 'multiple_choice',
        options: [
          'Follow the step-by-step process outlined',
          'Skip directly to advanced topics',
          'Ignore the foundational concepts',
          'Only read without practicing',
        ],
        correctAnswer: 'Follow the step-by-step process outlined',
        explanation: `The tutorial emphasizes following a structured approach to learning ${topic}`,
        difficulty: 'medium',
        topic,
      }
    : {
        questionId: 3,
        question: 'What would be the first step you should take after studying this tutorial?',
        questionType: 'multiple_choice',
        options: [
          'Review and understand the key concepts',
          'Ignore the content completely',
          'Start with the most advanced topics',
          'Skip all practice exercises',
        ],
        correctAnswer: 'Review and understand the key concepts',
        explanation: 'The best approach after any tutorial is to review and understand the key concepts before moving forward',
        difficulty: 'medium',
        topic: 'Learning Strategy',
      };

  return [opening, structure, approach];
}

export function fallbackTutorial(transcript: string, targetLanguage: TargetLanguage): ProcessedTutorial {
  return {
    summary: {
      title: `Tutorial (${countWords(transcript)} words)`,
      shortSummary: 'This tutorial covers various topics. AI analysis was limited, so a basic structure has been created instead.',
      detailedSummary: [
        'Tutorial content was processed with limited AI analysis',
        'Manual review may be needed for optimal results',
        'Key concepts may need additional clarification',
      ],
      duration: 'Variable',
      difficultyLevel: 'Intermediate',
      keyTopics: ['General Tutorial Content'],
    },
    actionSteps: genericActionSteps(),
    practiceQuestions: genericQuestions(),
    originalLanguage: 'english',
    targetLanguage,
    processingTime: 0,
    originalTranscript: transcript,
  };
}
