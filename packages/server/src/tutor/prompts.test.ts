import { describe, it, expect } from 'vitest';
import type { ProcessedTutorial } from '@tutorpath/shared';
import { renderChatRequest, renderQuestionsRequest, renderStructuringRequest } from './prompts.js';

const TUTORIAL: ProcessedTutorial = {
  summary: {
    title: 'Docker Basics',
    shortSummary: 'Learn containers.',
    detailedSummary: ['Containers package apps', 'Images are templates'],
    difficultyLevel: 'Beginner',
    keyTopics: ['docker', 'containers'],
  },
  actionSteps: [
    { stepNumber: 1, title: 'Install Docker', description: 'Install Docker Desktop', completed: false },
  ],
  practiceQuestions: [],
  originalLanguage: 'english',
  targetLanguage: 'german',
  processingTime: 1.2,
  originalTranscript: 'Docker containers let you package an application with its dependencies.',
};

describe('renderStructuringRequest', () => {
  it('embeds the transcript, language and schema fields', () => {
    const prompt = renderStructuringRequest('my transcript text', 'french');
    expect(prompt).toContain('TRANSCRIPT:\nmy transcript text\n');
    expect(prompt).toContain('TARGET LANGUAGE: french');
    expect(prompt).toContain('"detailed_summary": "• Key concept 1 explained\\n• Key concept 2 explained');
    expect(prompt).toContain('"step_number": 1');
  });
});

describe('renderQuestionsRequest', () => {
  it('shows every question kind in the example', () => {
    const prompt = renderQuestionsRequest('my transcript text', 'hindi');
    expect(prompt).toContain('"question_type": "multiple_choice"');
    expect(prompt).toContain('"question_type": "true_false"');
    expect(prompt).toContain('"question_type": "short_answer"');
    expect(prompt).toContain('"options": null');
    expect(prompt).toContain('TARGET LANGUAGE: hindi');
  });
});

describe('renderChatRequest', () => {
  it('grounds the prompt in the tutorial', () => {
    const prompt = renderChatRequest(TUTORIAL, 'What is an image?');
    expect(prompt).toContain('Title: Docker Basics');
    expect(prompt).toContain('Summary:\n• Containers package apps\n• Images are templates\n');
    expect(prompt).toContain('Key Topics: docker, containers');
    expect(prompt).toContain('1. Install Docker: Install Docker Desktop');
    expect(prompt).toContain('USER QUESTION: What is an image?');
    expect(prompt).toContain('Answer in german');
    expect(prompt).not.toContain('PREVIOUS QUESTION');
  });

  it('carries the previous exchange with a truncated answer', () => {
    const prompt = renderChatRequest(TUTORIAL, 'And volumes?', { question: 'What is an image?', answer: 'x'.repeat(250) });
    expect(prompt).toContain('PREVIOUS QUESTION: What is an image?\n');
    expect(prompt).toContain(`PREVIOUS ANSWER: ${'x'.repeat(200)}...\n`);
    expect(prompt).not.toContain('x'.repeat(201));
  });

  it('notes a missing transcript', () => {
    const prompt = renderChatRequest({ ...TUTORIAL, originalTranscript: '' }, 'Hi');
    expect(prompt).toContain('ORIGINAL TRANSCRIPT:\nTranscript not available\n');
  });
});
