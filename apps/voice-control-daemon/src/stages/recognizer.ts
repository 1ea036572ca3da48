import {
  createCommand,
  createTranscript,
  type AudioClip,
  type AudioReadyMessage,
  type DispatchInboxMessage,
  type StatusBus,
  type Transcript,
} from '@lightcue/pipeline-events';
import {
  bestAlternative,
  parseRecognitionResponse,
  type ConfidenceGate,
  type IRecognitionService,
  type RecognitionResponse,
} from '@lightcue/voice-pipeline';
import type { Channel } from '../channel';
import { RecognitionTimeoutError, faultKindOf, faultPolicy, toError, type FaultReporter } from '../errors';
import type { IFeedback } from '../feedback';
import type { Logger } from '../logger';
import { Stage, type Clock } from '../stage';

export interface RecognizerDeps {
  service: IRecognitionService;
  gate: ConfidenceGate;
  inbox: Channel<AudioReadyMessage>;
  outbox: Channel<DispatchInboxMessage>;
  feedback: IFeedback;
  bus: StatusBus;
  reportFault: FaultReporter;
  timeoutMs: number;
  idleBackoffMs: number;
  log: Logger;
  clock?: Clock;
}

/**
 * Clip to transcript to gated Command. Recognition failures are handled here
 * and never end the loop.
 */
export class RecognizerStage extends Stage {
  constructor(private readonly deps: RecognizerDeps) {
    super('recognizer', deps.log, deps.clock);
  }

  protected async step(): Promise<void> {
    const message = await this.deps.inbox.receive(this.deps.idleBackoffMs);
    if (!message || !this.running) return;
    await this.recognizeClip(message.clip);
  }

  protected onStop(): void {
    this.deps.inbox.close();
  }

  private async recognizeClip(clip: AudioClip): Promise<void> {
    const { gate, feedback, bus, outbox } = this.deps;

    let transcript: Transcript;
    try {
      const best = bestAlternative(parseRecognitionResponse(await this.recognizeWithin(clip)));
      transcript = createTranscript(best.text, best.confidence, this.clock());
    } catch (err) {
      this.handleFailure(err);
      return;
    }

    const decision = gate.evaluate(transcript.text, transcript.confidence);
    bus.publish({
      type: 'transcript',
      text: transcript.text,
      confidence: transcript.confidence,
      accepted: decision.accepted,
      timestamp: transcript.timestamp,
    });

    if (!decision.accepted) {
      this.log.info({ text: transcript.text, confidence: transcript.confidence, reason: decision.reason }, 'transcript rejected');
      return;
    }

    this.log.info({ text: transcript.text, confidence: transcript.confidence }, 'command recognized');
    feedback.cue('recognized');
    feedback.say(`I heard: ${transcript.text}`);
    feedback.notify('Command recognized', transcript.text);

    const command = createCommand(transcript.text, 'voice', this.clock());
    if (!outbox.trySend({ kind: 'CommandReady', command })) {
      this.log.warn({ text: command.rawText }, 'dispatcher inbox full, command dropped');
    }
  }

  /** Abandons the call after `timeoutMs`; a late settlement is only logged */
  private recognizeWithin(clip: AudioClip): Promise<RecognitionResponse> {
    const pending = this.deps.service.recognize(clip);
    let timer: NodeJS.Timeout | undefined;
    let timedOut = false;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        timedOut = true;
        reject(new RecognitionTimeoutError(this.deps.timeoutMs));
      }, this.deps.timeoutMs);
    });

    return Promise.race([pending, timeout]).finally(() => {
      clearTimeout(timer);
      if (!timedOut) return;
      pending.catch((err: unknown) => {
        this.log.debug({ err }, 'abandoned recognition failed');
      });
    });
  }

  private handleFailure(err: unknown): void {
    const error = toError(err);
    const kind = faultKindOf(err);
    this.deps.feedback.cue('error');

    if (faultPolicy(kind) === 'ignore') {
      this.log.info({ err: error }, 'could not understand audio');
      return;
    }

    this.log.warn({ err: error, kind }, 'recognition failed');
    this.deps.reportFault({ error, stage: this.name, at: this.clock() });
  }
}
