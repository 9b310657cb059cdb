/**
 * Drift Lab - API server entrypoint
 *
 * Integrated with:
 * - LowDB for persistent storage
 * - OpenAI / Ollama / CLI agents for translation
 */

import 'dotenv/config';
import { loadConfig, validateConfig, hasAIProvider } from './config.js';
import { initDatabase } from './storage/database.js';
import { SentenceCorpus } from './services/sentences.js';
import { SweepTracker, createAgentRegistry, createExperimentRunner } from './services/experiment-service.js';
import { createApp } from './app.js';

async function startServer(): Promise<void> {
  // Load configuration
  const config = loadConfig();
  const configValidation = validateConfig(config);
  if (!configValidation.valid) {
    for (const error of configValidation.errors) {
      console.error(`⚠️  Config: ${error}`);
    }
    process.exitCode = 1;
    return;
  }

  const store = await initDatabase(config.storage.dataDir);
  const corpus = await SentenceCorpus.fromFile(config.storage.sentencesFile);
  const registry = createAgentRegistry(config);
  const runner = createExperimentRunner(config, store, { registry });

  const app = createApp({ config, store, registry, runner, corpus, tracker: new SweepTracker() });

  app.listen(config.port, () => {
    console.log(`
╔═══════════════════════════════════════════════════════════╗
║                                                           ║
║          ░█▀▄░█▀▄░▀█▀░█▀▀░▀█▀░░░█░░░█▀█░█▀▄               ║
║          ░█░█░█▀▄░░█░░█▀▀░░█░░░░█░░░█▀█░█▀▄               ║
║          ░▀▀░░▀░▀░▀▀▀░▀░░░░▀░░░░▀▀▀░▀░▀░▀▀░               ║
║                                                           ║
║              Semantic drift experiments                   ║
║                                                           ║
╠═══════════════════════════════════════════════════════════╣
║                                                           ║
║   🌐 Server: http://localhost:${config.port}
║   💾 Database: LowDB (${config.storage.dataDir})
║   📚 Sentences: ${corpus.size}
║   🤖 AI: ${hasAIProvider(config) ? 'OpenAI ✅' : 'offline (echo + hashing) ⚠️'}
║                                                           ║
╚═══════════════════════════════════════════════════════════╝
`);
  });
}

startServer().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
