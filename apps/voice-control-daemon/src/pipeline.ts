import type { ILightBridge } from '@lightcue/light-bridge';
import type {
  AudioReadyMessage,
  CaptureInboxMessage,
  DispatchInboxMessage,
  StageHealth,
  StatusBus,
} from '@lightcue/pipeline-events';
import { ConfidenceGate, type IRecognitionService } from '@lightcue/voice-pipeline';
import type { IFrameSource, IWakeWordBackend } from '@lightcue/wake-word';
import type { ActionRegistry } from './actionRegistry';
import type { IUtteranceRecorder } from './audio/recorder';
import { Channel } from './channel';
import { CommandDispatcher } from './commandDispatcher';
import type { PipelineConfig } from './config';
import { FatalPipelineError, type FaultReporter } from './errors';
import type { IFeedback } from './feedback';
import { LightStateCache } from './lightStateCache';
import type { Logger } from './logger';
import type { Clock, Stage } from './stage';
import { AudioCaptureStage } from './stages/audioCapture';
import { DispatcherStage } from './stages/dispatcher';
import { RecognizerStage } from './stages/recognizer';
import { WakeDetectorStage } from './stages/wakeDetector';
import { TimerService, type ScheduledTimer } from './timerService';
import type { UndoStack } from './undoStack';

// ─── Pipeline ─────────────────────────────────────────────────────────────────

export class Pipeline {
  constructor(
    readonly stages: readonly Stage[],
    private readonly timers: TimerService,
  ) {}

  start(): void {
    for (const stage of this.stages) stage.start();
  }

  /** Cancels outstanding timers, then stops stages upstream first */
  async stop(): Promise<void> {
    this.timers.cancelAll();
    for (const stage of this.stages) await stage.stop();
  }

  health(): StageHealth[] {
    return this.stages.map((stage) => stage.health());
  }

  activeTimers(): ScheduledTimer[] {
    return this.timers.active();
  }
}

// ─── Factory ──────────────────────────────────────────────────────────────────

export interface WakeWordParts {
  backend: IWakeWordBackend;
  source: IFrameSource;
  keyword: string;
}

export interface PipelineDeps {
  config: PipelineConfig;
  /** Required in gated mode; called on every (re)build */
  createWakeWord?: () => WakeWordParts;
  createRecorder: () => IUtteranceRecorder;
  recognition: IRecognitionService;
  bridge: ILightBridge;
  registry: ActionRegistry;
  /** Survives restarts so a recovered pipeline can still undo */
  undo: UndoStack;
  feedback: IFeedback;
  bus: StatusBus;
  log: Logger;
  clock?: Clock;
}

export type PipelineFactory = (reportFault: FaultReporter) => Pipeline;

export function createPipelineFactory(deps: PipelineDeps): PipelineFactory {
  return (reportFault) => {
    const { config, feedback, bus, log, clock } = deps;
    const { capacity, idleBackoffMs } = config.channels;

    const captureInbox = new Channel<CaptureInboxMessage>(capacity);
    const recognizerInbox = new Channel<AudioReadyMessage>(capacity);
    const dispatchInbox = new Channel<DispatchInboxMessage>(capacity);

    const timers = new TimerService((message) => {
      if (!dispatchInbox.trySend(message)) {
        log.warn({ timerId: message.timerId }, 'dispatcher inbox full, timer dropped');
      }
    }, clock);

    const dispatcher = new CommandDispatcher({
      registry: deps.registry,
      cache: new LightStateCache(deps.bridge, config.dispatch.cacheTtlMs, clock),
      undo: deps.undo,
      timers,
      feedback,
      log: log.child({ stage: 'dispatcher' }),
      fuzzyThreshold: config.dispatch.fuzzyThreshold,
    });

    const stages: Stage[] = [];

    if (config.mode === 'gated') {
      if (!deps.createWakeWord) {
        throw new FatalPipelineError('Gated mode requires a wake-word backend');
      }
      const wake = deps.createWakeWord();
      stages.push(
        new WakeDetectorStage({
          ...wake,
          outbox: captureInbox,
          feedback,
          bus,
          log: log.child({ stage: 'wake-detector' }),
          clock,
        }),
      );
    }

    stages.push(
      new AudioCaptureStage({
        mode: config.mode,
        recorder: deps.createRecorder(),
        inbox: captureInbox,
        outbox: recognizerInbox,
        capture: config.capture,
        idleBackoffMs,
        log: log.child({ stage: 'audio-capture' }),
        clock,
      }),
      new RecognizerStage({
        service: deps.recognition,
        gate: new ConfidenceGate({
          threshold: config.recognition.confidenceThreshold,
          windowSize: config.recognition.debounceWindow,
        }),
        inbox: recognizerInbox,
        outbox: dispatchInbox,
        feedback,
        bus,
        reportFault,
        timeoutMs: config.recognition.timeoutMs,
        idleBackoffMs,
        log: log.child({ stage: 'recognizer' }),
        clock,
      }),
      new DispatcherStage({
        dispatcher,
        inbox: dispatchInbox,
        captureInbox,
        feedback,
        bus,
        idleBackoffMs,
        log: log.child({ stage: 'dispatcher' }),
        clock,
      }),
    );

    return new Pipeline(stages, timers);
  };
}
