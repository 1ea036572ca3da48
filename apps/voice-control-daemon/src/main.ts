import 'dotenv/config';
import { existsSync } from 'node:fs';
import { HueBridgeClient } from '@lightcue/light-bridge';
import { StatusBus } from '@lightcue/pipeline-events';
import { GoogleSpeechClient } from '@lightcue/voice-pipeline';
import { builtinKeywords, porcupineFactory, type WakeWordSetup } from '@lightcue/wake-word';
import { createDefaultRegistry } from './actionRegistry';
import { MicrophoneFrameSource, MicrophoneUtteranceRecorder, recorderAvailable } from './audio/microphone';
import { connectBridge } from './bridgeSetup';
import { USAGE, configInputFromEnv, createPipelineConfig, loadEnv, parseCliArgs } from './config';
import { ConfigError, FatalPipelineError } from './errors';
import { SystemFeedback } from './feedback';
import { logger, setLogLevel } from './logger';
import { createPipelineFactory, type WakeWordParts } from './pipeline';
import { buildStatusServer } from './server';
import { Supervisor } from './supervisor';
import { UndoStack } from './undoStack';
import { setUpWakeWord } from './wakeWordSetup';

function logWakeWordSetup(setup: WakeWordSetup): void {
  if (setup.rejected) {
    logger.warn({ rejected: setup.rejected.keyword, err: setup.rejected.error }, 'keyword rejected, using fallback');
  }
  if (setup.keyword.substituted) {
    logger.warn({ keyword: setup.keyword.label }, 'requested wake word unavailable, substituted');
  }
  logger.info({ keyword: setup.keyword.label, source: setup.keyword.source }, 'wake word ready');
}

async function main(): Promise<number> {
  const cli = parseCliArgs(process.argv.slice(2));
  if (cli.help) {
    console.log(USAGE);
    return 0;
  }
  if (cli.debug) setLogLevel('debug');
  if (cli.unknown.length > 0) logger.warn({ args: cli.unknown }, 'ignoring unknown arguments');

  const env = loadEnv();
  const feedback = new SystemFeedback(logger.child({ component: 'feedback' }));

  const speechApiKey = env.GOOGLE_SPEECH_API_KEY;
  if (!speechApiKey) {
    throw new ConfigError('GOOGLE_SPEECH_API_KEY is not set');
  }
  if (!(await recorderAvailable('rec'))) {
    throw new FatalPipelineError('SoX is not installed; the "rec" command is required for microphone input');
  }
  const credentials = await connectBridge({ env, log: logger, feedback });

  const requested = createPipelineConfig(configInputFromEnv(env, cli.fallback ? 'continuous' : 'gated'));
  const wakeWordOptions = {
    accessKey: env.PICOVOICE_ACCESS_KEY,
    wakeWord: requested.wakeWord,
    backendFor: porcupineFactory,
    available: builtinKeywords(),
    pathExists: existsSync,
  };

  // Build the wake-word backend once up front; the first pipeline reuses it.
  let firstSetup: WakeWordSetup | null = null;
  let mode: 'gated' | 'continuous' = 'continuous';
  if (requested.mode === 'gated') {
    try {
      firstSetup = setUpWakeWord(wakeWordOptions);
      logWakeWordSetup(firstSetup);
      mode = 'gated';
    } catch (err) {
      logger.error({ err }, 'wake word unavailable, falling back to continuous listening');
    }
  }

  const config = mode === requested.mode ? requested : createPipelineConfig(configInputFromEnv(env, mode));
  const bus = new StatusBus((err, event) => logger.warn({ err, event: event.type }, 'status handler failed'));

  const createWakeWord = (): WakeWordParts => {
    const setup = firstSetup ?? setUpWakeWord(wakeWordOptions);
    firstSetup = null;
    return {
      backend: setup.backend,
      keyword: setup.keyword.label,
      source: new MicrophoneFrameSource({ sampleRate: setup.backend.sampleRate }),
    };
  };

  const factory = createPipelineFactory({
    config,
    createWakeWord: mode === 'gated' ? createWakeWord : undefined,
    createRecorder: () =>
      new MicrophoneUtteranceRecorder(
        {
          sampleRate: config.capture.sampleRate,
          energyThreshold: config.capture.energyThreshold,
          endSilenceMs: config.capture.endSilenceMs,
        },
        logger.child({ component: 'microphone' }),
      ),
    recognition: new GoogleSpeechClient({
      apiKey: speechApiKey,
      languageCode: config.recognition.languageCode,
    }),
    bridge: new HueBridgeClient({ address: credentials.bridgeAddress, authToken: credentials.authToken }),
    registry: createDefaultRegistry(),
    undo: new UndoStack(config.dispatch.undoDepth),
    feedback,
    bus,
    log: logger,
  });

  const supervisor = new Supervisor({
    factory,
    config: config.supervisor,
    feedback,
    bus,
    log: logger.child({ component: 'supervisor' }),
  });

  const server =
    env.STATUS_PORT > 0
      ? buildStatusServer({ source: { mode, status: () => supervisor.status() }, bus })
      : null;

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'shutting down');
    supervisor.stop().catch((err: unknown) => logger.error({ err }, 'error during shutdown'));
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  supervisor.start();
  if (server) {
    const address = await server.listen({ port: env.STATUS_PORT, host: '127.0.0.1' });
    logger.info({ address }, 'status server listening');
  }
  logger.info({ mode }, mode === 'gated' ? 'say the wake word to give a command' : 'listening continuously');

  try {
    await supervisor.run();
  } finally {
    await server?.close();
  }
  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    const fatal = err instanceof FatalPipelineError || err instanceof ConfigError;
    logger.fatal({ err }, fatal ? 'unrecoverable failure' : 'unexpected failure');
    process.exit(1);
  });
