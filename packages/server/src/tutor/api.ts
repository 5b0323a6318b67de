// ============================================================================
// Tutor API Routes
// ============================================================================

import { Router, type Response } from 'express';
import { InputError, UpstreamUnavailableError } from '../errors.js';
import type { TutorService } from './service.js';
import { chatRequestSchema, parseBody, processTutorialRequestSchema } from './schemas.js';

export function sendKnownError(res: Response, err: unknown): boolean {
  if (err instanceof InputError) {
    res.status(400).json({ error: err.message });
    return true;
  }
  if (err instanceof UpstreamUnavailableError) {
    res.status(502).json({ error: err.message });
    return true;
  }
  return false;
}

export function createTutorRouter(service: TutorService): Router {
  const router = Router();

  // Transcript or video URL → structured tutorial
  router.post('/process-tutorial', async (req, res, next) => {
    try {
      const request = parseBody(processTutorialRequestSchema, req.body);
      res.json(await service.processRequest(request));
    } catch (err) {
      if (!sendKnownError(res, err)) next(err);
    }
  });

  // Question about a processed tutorial
  router.post('/chat', async (req, res, next) => {
    try {
      const { tutorialData, userMessage, chatHistory } = parseBody(chatRequestSchema, req.body);
      res.json(await service.chat(tutorialData, userMessage, chatHistory));
    } catch (err) {
      if (!sendKnownError(res, err)) next(err);
    }
  });

  return router;
}
