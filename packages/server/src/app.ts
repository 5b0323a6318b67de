import express, { type ErrorRequestHandler } from 'express';
import cors from 'cors';
import type { HealthStatus } from '@tutorpath/shared';
import type { ServerConfig } from './config.js';
import type { TextModel } from './llm/client.js';
import { errorMessage } from './errors.js';
import type { TutorService } from './tutor/service.js';
import { createTutorRouter } from './tutor/api.js';
import { createExportRouter } from './export/api.js';

export const VERSION = '0.1.0';

export interface AppDeps {
  config: Pick<ServerConfig, 'corsOrigins'>;
  service: TutorService;
  model: TextModel;
  providerName: () => string;
}

export function createApp({ config, service, model, providerName }: AppDeps): express.Express {
  const app = express();
  app.use(cors({ origin: config.corsOrigins, credentials: true }));
  app.use(express.json({ limit: '2mb' }));

  app.get('/', (_req, res) => {
    res.json({ message: 'TutorPath API is running', version: VERSION, status: 'healthy' });
  });

  app.get('/api/health', async (_req, res) => {
    let modelStatus: HealthStatus['modelStatus'] = 'unhealthy';
    try {
      const reply = await model.complete("Hello, respond with 'OK'");
      if (reply.includes('OK')) modelStatus = 'healthy';
    } catch (err) {
      console.warn(`🩺 Health: model probe failed: ${errorMessage(err)}`);
    }
    const health: HealthStatus = {
      apiStatus: 'healthy',
      modelStatus,
      provider: providerName(),
      timestamp: Date.now() / 1000,
    };
    res.json(health);
  });

  app.use('/api', createTutorRouter(service));
  app.use('/api', createExportRouter());

  const onError: ErrorRequestHandler = (err, _req, res, _next) => {
    console.error('❌ Unhandled request error:', err);
    res.status(500).json({ error: `Processing failed: ${errorMessage(err)}` });
  };
  app.use(onError);

  return app;
}
