import { createServer } from 'http';
import { loadConfig } from './config.js';
import { LlmClient } from './llm/client.js';
import { TranscriptService } from './transcript/service.js';
import { fetchYoutubeTranscript } from './transcript/youtube.js';
import { TutorService } from './tutor/service.js';
import { createApp, VERSION } from './app.js';

const config = loadConfig();

// Services
const llm = new LlmClient(config.llm);
const transcripts = new TranscriptService(fetchYoutubeTranscript);
const tutor = new TutorService(llm, transcripts);

const app = createApp({
  config,
  service: tutor,
  model: llm,
  providerName: () => llm.getActiveProvider(),
});
const server = createServer(app);

llm.detectProviders().then(() => {
  console.log(`🤖 LLM provider: ${llm.getActiveProvider()}`);
}).catch((err: unknown) => {
  console.error('🤖 LLM provider detection failed:', err);
});

server.listen(config.port, config.host, () => {
  console.log(`
  📚 ╔═══════════════════════════════════════╗
  📚 ║          T U T O R P A T H            ║
  📚 ║   Tutorial → Action Plan API v${VERSION}   ║
  📚 ╠═══════════════════════════════════════╣
  📚 ║  HTTP:  http://${config.host}:${config.port}
  📚 ╚═══════════════════════════════════════╝
  `);
});
