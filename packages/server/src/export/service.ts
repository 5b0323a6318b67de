// ============================================================================
// TutorPath — Export Service
// Markdown document, raw JSON and plain-text checklist renderings
// ============================================================================
import type { ExportFormat, ExportedDocument, PracticeQuestion, ProcessedTutorial } from '@tutorpath/shared';

const MEDIA_TYPES: Record<ExportFormat, string> = {
  markdown: 'text/markdown',
  json: 'application/json',
  checklist: 'text/plain',
};

const CONTROL_RE = /[\x00-\x1F\x7F]/g;

const QUESTION_TYPE_LABELS: Record<PracticeQuestion['questionType'], string> = {
  multiple_choice: 'Multiple choice',
  true_false: 'True / False',
  short_answer: 'Short answer',
};

export function sanitizeFilename(name: string): string {
  return name.replace(CONTROL_RE, '').replace(/[<>:"/\\|?*]/g, '_').slice(0, 100).trim();
}

export function exportFilename(title: string, format: ExportFormat): string {
  const base = sanitizeFilename(title.replace(/ /g, '_')) || 'tutorial';
  switch (format) {
    case 'markdown': return `${base}.md`;
    case 'json': return `${base}.json`;
    case 'checklist': return `${base}_checklist.txt`;
  }
}

function renderQuestion(q: PracticeQuestion): string[] {
  const lines = [`### ${q.questionId}. ${q.question}`, '', `_${QUESTION_TYPE_LABELS[q.questionType]} · ${q.difficulty} · ${q.topic}_`, ''];
  if (q.options) {
    q.options.forEach((option, i) => lines.push(`${String.fromCharCode(65 + i)}. ${option}`));
    lines.push('');
  }
  lines.push(`**Answer:** ${q.correctAnswer}`);
  if (q.explanation) lines.push('', q.explanation);
  lines.push('');
  return lines;
}

export function toMarkdown(tutorial: ProcessedTutorial): string {
  const { summary, actionSteps, practiceQuestions } = tutorial;
  const lines: string[] = [`# ${summary.title}`, ''];

  if (summary.shortSummary) lines.push(summary.shortSummary, '');
  lines.push(`- **Difficulty:** ${summary.difficultyLevel}`);
  if (summary.duration) lines.push(`- **Duration:** ${summary.duration}`);
  if (summary.keyTopics.length > 0) lines.push(`- **Key topics:** ${summary.keyTopics.join(', ')}`);
  lines.push('', '## Summary', '');
  for (const point of summary.detailedSummary) lines.push(`- ${point}`);

  lines.push('', '## Action Steps', '');
  for (const step of actionSteps) {
    const time = step.estimatedTime ? ` (${step.estimatedTime})` : '';
    lines.push(`- [${step.completed ? 'x' : ' '}] **${step.stepNumber}. ${step.title}**${time}: ${step.description}`);
  }

  if (practiceQuestions.length > 0) {
    lines.push('', '## Practice Questions', '');
    for (const q of practiceQuestions) lines.push(...renderQuestion(q));
  }

  return `${lines.join('\n').trimEnd()}\n`;
}

export function toJson(tutorial: ProcessedTutorial): string {
  return JSON.stringify(tutorial, null, 2);
}

export function toChecklist(tutorial: ProcessedTutorial): string {
  const { title } = tutorial.summary;
  const lines = [title, '='.repeat(title.length), ''];
  for (const step of tutorial.actionSteps) {
    const time = step.estimatedTime ? ` (${step.estimatedTime})` : '';
    lines.push(`[${step.completed ? 'x' : ' '}] ${step.stepNumber}. ${step.title}${time}`);
    if (step.description) lines.push(`    ${step.description}`);
  }
  return `${lines.join('\n')}\n`;
}

export function exportTutorial(tutorial: ProcessedTutorial, format: ExportFormat): ExportedDocument {
  const render = format === 'markdown' ? toMarkdown : format === 'json' ? toJson : toChecklist;
  return {
    content: render(tutorial),
    mediaType: MEDIA_TYPES[format],
    filename: exportFilename(tutorial.summary.title, format),
  };
}
