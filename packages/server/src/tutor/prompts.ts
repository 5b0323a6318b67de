// ============================================================================
// TutorPath — Prompt Contract
// Request texts for structuring, practice questions and chat. Field names on
// the model side are snake_case; the decoder maps them onto shared types.
// ============================================================================
import type { ChatExchange, ProcessedTutorial, TargetLanguage } from '@tutorpath/shared';

export const STRUCTURING_EXAMPLE = {
  title: 'Tutorial title (inferred from content)',
  short_summary: '2-3 sentence overview',
  detailed_summary: '• Key concept 1 explained\n• Key concept 2 explained\n• Key concept 3 explained\n• Important details and takeaways',
  duration: 'Estimated completion time',
  difficulty_level: 'Beginner/Intermediate/Advanced',
  key_topics: ['topic1', 'topic2', 'topic3'],
  action_steps: [
    {
      step_number: 1,
      title: 'Step title',
      description: 'Detailed description of what to do',
      estimated_time: '5-10 minutes',
    },
  ],
};

export const QUESTIONS_EXAMPLE = {
  questions: [
    {
      question_id: 1,
      question: 'Based on the transcript, what is [specific concept mentioned]?',
      question_type: 'multiple_choice',
      options: ['Option A from content', 'Option B from content', 'Option C from content', 'Option D from content'],
      correct_answer: 'Option A from content',
      explanation: 'This is correct because the transcript specifically mentions...',
      difficulty: 'easy',
      topic: 'Specific topic from transcript',
    },
    {
      question_id: 2,
      question: 'True or False: The transcript mentions [specific detail]',
      question_type: 'true_false',
      options: ['True', 'False'],
      correct_answer: 'True',
      explanation: 'This is true because the tutorial specifically covers...',
      difficulty: 'medium',
      topic: 'Specific topic from transcript',
    },
    {
      question_id: 3,
      question: 'According to the tutorial, how would you [specific process mentioned]?',
      question_type: 'short_answer',
      options: null,
      correct_answer: 'Based on the transcript, you would [specific steps mentioned]',
      explanation: 'The tutorial outlines these specific steps...',
      difficulty: 'hard',
      topic: 'Specific topic from transcript',
    },
  ],
};

const PREVIOUS_ANSWER_LIMIT = 200;

export function renderStructuringRequest(transcript: string, targetLanguage: TargetLanguage): string {
  return `You are an expert tutorial analyzer. Process this tutorial transcript and return a structured response.

TRANSCRIPT:
${transcript}

INSTRUCTIONS:
1. Analyze the tutorial and write a comprehensive summary
2. Extract actionable learning steps as an ordered checklist, numbered from 1
3. Give the detailed summary as a single string of bullet points separated by newlines
4. If the target language is not English, translate all content to ${targetLanguage}
5. Keep technical terms as they are

Respond with a JSON object in exactly this format:
${JSON.stringify(STRUCTURING_EXAMPLE, null, 2)}

TARGET LANGUAGE: ${targetLanguage}
IMPORTANT:
- detailed_summary must be a single string value, not an object or array
- Use \\n to separate bullet points within that string
- Each bullet point starts with •
- difficulty_level is one of Beginner, Intermediate, Advanced
`;
}

export function renderQuestionsRequest(transcript: string, targetLanguage: TargetLanguage): string {
  return `You are an expert educator. Based on this tutorial transcript, write practice questions that test understanding of the SPECIFIC CONTENT.

TRANSCRIPT:
${transcript}

INSTRUCTIONS:
1. Ask about topics, concepts and steps actually mentioned in the transcript
2. Write 5-6 questions covering the key concepts
3. Mix question types: multiple_choice, true_false and short_answer
4. multiple_choice questions have exactly 4 options; true_false questions have the options ["True", "False"]
5. correct_answer must be copied verbatim from options when options are given
6. short_answer questions use "options": null
7. Give a clear explanation for every answer
8. difficulty is one of easy, medium, hard
9. If the target language is not English, translate all content to ${targetLanguage}
10. Return ONLY valid JSON: no markdown, no extra text, no control characters

RESPONSE FORMAT:
${JSON.stringify(QUESTIONS_EXAMPLE, null, 2)}

TARGET LANGUAGE: ${targetLanguage}
`;
}

export function renderChatRequest(tutorial: ProcessedTutorial, userMessage: string, lastExchange?: ChatExchange): string {
  const { summary, actionSteps, targetLanguage, originalTranscript } = tutorial;
  const steps = actionSteps.map(step => `${step.stepNumber}. ${step.title}: ${step.description}`).join('\n');

  let previous = '';
  if (lastExchange) {
    const answer = lastExchange.answer.length > PREVIOUS_ANSWER_LIMIT
      ? `${lastExchange.answer.slice(0, PREVIOUS_ANSWER_LIMIT)}...`
      : lastExchange.answer;
    previous = `\nPREVIOUS QUESTION: ${lastExchange.question}\nPREVIOUS ANSWER: ${answer}\n`;
  }

  return `You are a helpful tutor assistant. The user has been studying the tutorial below. Answer their question from the tutorial content.

TUTORIAL INFORMATION:
Title: ${summary.title}
Summary:
${summary.detailedSummary.map(point => `• ${point}`).join('\n')}
Key Topics: ${summary.keyTopics.join(', ')}

ORIGINAL TRANSCRIPT:
${originalTranscript || 'Transcript not available'}

ACTION STEPS:
${steps}
${previous}
USER QUESTION: ${userMessage}

INSTRUCTIONS:
1. Answer based ONLY on the tutorial content above
2. If the question is not covered by the tutorial, say so and offer help with what is covered
3. Refer to the relevant parts of the tutorial and use its examples when explaining
4. Keep the answer to 2-3 short paragraphs
5. Answer in ${targetLanguage}
6. If the question repeats the previous one, offer a different angle or extra detail

Your answer:
`;
}
