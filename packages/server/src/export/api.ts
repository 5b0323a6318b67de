// ============================================================================
// Export API Routes
// ============================================================================

import { Router } from 'express';
import { sendKnownError } from '../tutor/api.js';
import { exportRequestSchema, parseBody } from '../tutor/schemas.js';
import { exportTutorial } from './service.js';

export function createExportRouter(): Router {
  const router = Router();

  router.post('/export', (req, res, next) => {
    try {
      const { tutorialData, exportFormat } = parseBody(exportRequestSchema, req.body);
      const doc = exportTutorial(tutorialData, exportFormat);
      // attachment() adds an RFC 5987 filename* for non-Latin-1 titles
      res.attachment(doc.filename);
      res.type(doc.mediaType);
      res.send(doc.content);
    } catch (err) {
      if (!sendKnownError(res, err)) next(err);
    }
  });

  return router;
}
