/**
 * Speech Radio - Production Entry Point
 *
 * Starts the broadcast engine (transcoder, ring buffer, synthesis worker)
 * and the HTTP API that serves the live stream.
 */

import { config } from './core/config.js';
import { logger, setupLogging } from './core/logging.js';
import { onShutdown, registerServerForShutdown } from './core/shutdown.js';
import { AppError, ConfigurationError } from './core/exceptions.js';
import { createSynthesisEngineFromConfig } from './plugins/index.js';
import { RadioService } from './services/radio.js';
import { startApiServer } from './api/server.js';

async function main(): Promise<void> {
  setupLogging();

  const engine = createSynthesisEngineFromConfig(config.speech, config.sarvam, config.openai);

  const radio = new RadioService(
    {
      backgroundAudioPath: config.broadcast.backgroundAudioPath,
      speechOutputDir: config.speech.outputDir,
      speechRetention: config.speech.retention,
      voicesFile: config.speech.voicesFile,
      chunkSize: config.broadcast.chunkSize,
      bufferCapacity: config.broadcast.bufferCapacity,
      restartBackoffMs: config.broadcast.restartBackoffMs,
      killGraceMs: config.broadcast.killGraceMs,
      listenerWaitMs: config.broadcast.listenerWaitMs,
      transcoder: {
        ffmpegPath: config.broadcast.ffmpegPath,
        bitrate: config.broadcast.bitrate,
        sampleRate: config.broadcast.sampleRate,
        channels: config.broadcast.channels,
      },
    },
    { engine },
  );

  await radio.start();

  const server = await startApiServer(
    { radio, jobWaitMs: config.speech.jobWaitMs, startedAt: Date.now() },
    config.port,
  );

  // Stop accepting listeners before the broadcast goes away
  registerServerForShutdown(server);
  onShutdown(() => radio.stop());

  logger.info('📻 Speech radio on air', {
    provider: engine.name,
    background: config.broadcast.backgroundAudioPath,
    stream: `http://localhost:${config.port}/stream`,
  });
}

main().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    logger.error(`❌ Configuration error: ${error.message}`);
  } else if (error instanceof AppError) {
    logger.error(`❌ Startup failed: ${error.message}`, error);
  } else {
    logger.error('❌ Startup failed', error);
  }
  process.exit(1);
});
