/**
 * Entry point: load config, load the frame classifier, construct the session registry
 * and serve the HTTP API. A classifier that fails to load leaves the service up with VAD
 * reporting ModelUnavailable; ASR and TTS keep working.
 */

import { loadConfig } from "./config";
import { createClassifier } from "./adapters/vad";
import { createASR } from "./adapters/asr";
import { createTTS } from "./adapters/tts";
import { FrameClassifierAdapter, SessionRegistry } from "./vad";
import { createVoiceServer } from "./server";
import { logger, logError } from "./logging";
import { toError } from "./errors";

async function main(): Promise<void> {
  const config = loadConfig();
  const classifier = new FrameClassifierAdapter(createClassifier(config));
  await classifier.load();
  const registry = new SessionRegistry(classifier, config.vad);
  const asr = createASR(config);
  const tts = createTTS(config);

  const server = createVoiceServer({ config, classifier, registry, asr, tts });
  server.listen(config.server.port, config.server.host, () => {
    logger.info(
      {
        event: "SERVER_STARTED",
        host: config.server.host,
        port: config.server.port,
        vadProvider: classifier.provider,
        vadLoaded: classifier.isAvailable(),
        asrProvider: asr.name,
        ttsProvider: tts.name,
      },
      "Voice service listening"
    );
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ event: "SHUTDOWN", signal }, "Shutting down");
    await registry.close();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    process.exit(0);
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err) => {
        logError(logger, toError(err));
        process.exit(1);
      });
    });
  }
}

main().catch((err) => {
  logError(logger, toError(err));
  process.exit(1);
});
