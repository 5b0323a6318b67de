// ============================================================================
// TutorPath — Tutor Service
// Transcript → structured tutorial (two sequential model calls with
// fallbacks), and transcript-grounded chat
// ============================================================================
import { isTargetLanguage } from '@tutorpath/shared';
import type { ChatMessage, ChatResponse, PracticeQuestion, ProcessTutorialRequest, ProcessedTutorial, TargetLanguage } from '@tutorpath/shared';
import type { TextModel } from '../llm/client.js';
import { InputError, UpstreamUnavailableError, errorMessage } from '../errors.js';
import { validateTranscript, type TranscriptService } from '../transcript/service.js';
import { renderChatRequest, renderQuestionsRequest, renderStructuringRequest } from './prompts.js';
import { decodeQuestions, parseTutorialResponse } from './decoder.js';
import { contentAwareQuestions, fallbackTutorial } from './fallbacks.js';
import { selectLastExchange, toChatResponse } from './chat.js';

export class TutorService {
  constructor(
    private readonly model: TextModel,
    private readonly transcripts: TranscriptService,
    private readonly now: () => number = () => performance.now(),
  ) {}

  async processRequest(request: ProcessTutorialRequest): Promise<ProcessedTutorial> {
    const transcript = await this.resolveTranscript(request);
    return this.processTutorial(transcript, request.targetLanguage ?? 'english');
  }

  async resolveTranscript(request: ProcessTutorialRequest): Promise<string> {
    if (request.youtubeUrl) {
      const result = await this.transcripts.getTranscript(request.youtubeUrl);
      if (!result.ok) throw new InputError(result.error);
      return result.transcript;
    }
    if (request.transcriptText) return request.transcriptText;
    throw new InputError('Either youtubeUrl or transcriptText must be provided');
  }

  async processTutorial(transcript: string, targetLanguage: string = 'english'): Promise<ProcessedTutorial> {
    if (!validateTranscript(transcript)) throw new InputError('Transcript is too short or invalid');
    const language = targetLanguage.toLowerCase();
    if (!isTargetLanguage(language)) throw new InputError(`Unsupported target language: ${targetLanguage}`);

    const started = this.now();
    const tutorial = await this.buildTutorial(transcript, language);
    tutorial.processingTime = Math.max(0, (this.now() - started) / 1000);
    return tutorial;
  }

  private async buildTutorial(transcript: string, targetLanguage: TargetLanguage): Promise<ProcessedTutorial> {
    let raw: string;
    try {
      raw = await this.model.complete(renderStructuringRequest(transcript, targetLanguage));
    } catch (err) {
      console.error(`📝 Tutor: structuring call failed: ${errorMessage(err)}`);
      return fallbackTutorial(transcript, targetLanguage);
    }

    const structured = parseTutorialResponse(raw);
    if (!structured.ok) {
      console.warn(`📝 Tutor: could not decode tutorial (${structured.error}), using fallback`);
      return fallbackTutorial(transcript, targetLanguage);
    }

    const practiceQuestions = await this.generateQuestions(transcript, targetLanguage);
    console.log(`📝 Tutor: "${structured.value.summary.title}": ${structured.value.actionSteps.length} steps, ${practiceQuestions.length} questions`);

    return {
      ...structured.value,
      practiceQuestions,
      originalLanguage: 'english',
      targetLanguage,
      processingTime: 0,
      originalTranscript: transcript,
    };
  }

  private async generateQuestions(transcript: string, targetLanguage: TargetLanguage): Promise<PracticeQuestion[]> {
    try {
      const raw = await this.model.complete(renderQuestionsRequest(transcript, targetLanguage));
      return decodeQuestions(raw, transcript);
    } catch (err) {
      console.error(`📝 Tutor: questions call failed: ${errorMessage(err)}`);
      return contentAwareQuestions(transcript);
    }
  }

  async chat(tutorial: ProcessedTutorial, userMessage: string, history: ChatMessage[] = []): Promise<ChatResponse> {
    if (!userMessage.trim()) throw new InputError('userMessage must not be empty');

    const prompt = renderChatRequest(tutorial, userMessage, selectLastExchange(history));
    try {
      return toChatResponse(await this.model.complete(prompt));
    } catch (err) {
      if (err instanceof UpstreamUnavailableError) throw err;
      throw new UpstreamUnavailableError(`Chat processing failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
