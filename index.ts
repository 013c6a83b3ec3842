import { emitKeypressEvents } from 'node:readline';
import { Server } from 'node:http';
import { loadConfig } from './config';
import { openDatabase } from './db/client';
import { VisionAssistApp } from './App';
import { ArecordRecorder, SystemSpeechSynthesizer } from './services/audioService';
import { HttpDetectionSource, loadRelevantClasses } from './services/detectionSource';
import { describeError, StartupError } from './services/errors';
import { createGeminiService } from './services/geminiService';
import { createLogger } from './services/logger';
import { GeminiSpeechRecognizer } from './services/voiceCommandService';

const log = createLogger('Main');

const CONTROLS = 'Controls: [c] voice command  [d] describe scene  [s] start/stop session  [q] quit';

async function main() {
  const config = loadConfig();
  const relevantClasses = loadRelevantClasses(config.relevantClassesPath);
  log.info(`Tracking ${relevantClasses.size} object classes`);

  const database = await openDatabase(config.databasePath);
  const gemini = createGeminiService(config.geminiApiKey);
  if (!gemini) log.warn('No Gemini API key set; using the rule-based intent parser and local scene summaries');

  const app = new VisionAssistApp({
    config,
    db: database.db,
    synthesizer: new SystemSpeechSynthesizer(config.speechCommand ?? undefined),
    relevantClasses,
    detectionSource: new HttpDetectionSource(config.detectorUrl, config.pollTimeoutMs),
    gemini,
    recognizer: gemini ? new GeminiSpeechRecognizer(new ArecordRecorder(), gemini, config.voiceRecordSeconds) : null
  });

  const server: Server = await new Promise((resolve, reject) => {
    const listening = app
      .createHttpApp()
      .listen(config.port, () => resolve(listening))
      .once('error', (error) => reject(new StartupError(`Cannot listen on port ${config.port}`, { cause: error })));
  });
  log.info(`Dashboard API listening on http://localhost:${config.port}`);

  app.start();

  let shuttingDown = false;
  const shutdown = async (reason: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`Shutting down (${reason})`);
    if (process.stdin.isTTY) process.stdin.setRawMode(false);
    process.stdin.pause();
    try {
      await app.stop();
    } finally {
      await new Promise<void>((resolve) => server.close(() => resolve()));
      database.close();
    }
  };

  const run = (task: Promise<unknown>) => {
    task.catch((error: unknown) => log.error(`Command failed: ${describeError(error)}`));
  };

  process.once('SIGINT', () => run(shutdown('SIGINT')));
  process.once('SIGTERM', () => run(shutdown('SIGTERM')));

  if (process.stdin.isTTY) {
    emitKeypressEvents(process.stdin);
    process.stdin.setRawMode(true);
    process.stdin.on('keypress', (_text: string | undefined, key: { name?: string; ctrl?: boolean } | undefined) => {
      if (!key) return;
      if (key.ctrl && key.name === 'c') return run(shutdown('ctrl-c'));
      switch (key.name) {
        case 'c':
          return run(app.voiceCommand());
        case 'd':
          return run(app.describeScene());
        case 's':
          app.toggleSession();
          return;
        case 'q':
          return run(shutdown('quit'));
      }
    });
    log.info(CONTROLS);
  }
}

main().catch((error: unknown) => {
  if (error instanceof StartupError) {
    log.error(`Startup failed: ${error.message}`);
  } else {
    log.error('Fatal error', error);
  }
  process.exitCode = 1;
});
