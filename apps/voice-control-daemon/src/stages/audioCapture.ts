import type { AudioReadyMessage, CaptureInboxMessage } from '@lightcue/pipeline-events';
import type { IUtteranceRecorder } from '../audio/recorder';
import type { Channel } from '../channel';
import type { PipelineConfig } from '../config';
import type { Logger } from '../logger';
import { Stage, type Clock } from '../stage';

export interface AudioCaptureDeps {
  mode: 'gated' | 'continuous';
  recorder: IUtteranceRecorder;
  inbox: Channel<CaptureInboxMessage>;
  outbox: Channel<AudioReadyMessage>;
  capture: PipelineConfig['capture'];
  idleBackoffMs: number;
  log: Logger;
  clock?: Clock;
}

/**
 * Gated: idle until a wake event, then listen until one utterance is captured
 * or the activation window closes. Continuous: listen back to back. Neither
 * listens during the cooldown that follows an executed command.
 */
export class AudioCaptureStage extends Stage {
  private cooldownUntil = 0;

  constructor(private readonly deps: AudioCaptureDeps) {
    super('audio-capture', deps.log, deps.clock);
  }

  get coolingDown(): boolean {
    return this.clock() < this.cooldownUntil;
  }

  protected async step(): Promise<void> {
    if (this.deps.mode === 'gated') {
      await this.gatedStep();
    } else {
      await this.continuousStep();
    }
  }

  protected onStop(): void {
    this.deps.inbox.close();
    this.deps.recorder.abort();
  }

  private async gatedStep(): Promise<void> {
    const message = await this.deps.inbox.receive(this.deps.idleBackoffMs);
    if (!message || !this.running) return;

    switch (message.kind) {
      case 'CommandExecuted':
        this.startCooldown(message.at);
        return;
      case 'WakeDetected':
        if (this.coolingDown) {
          this.log.debug('wake event during cooldown ignored');
          return;
        }
        await this.listenWindow();
        return;
    }
  }

  private async continuousStep(): Promise<void> {
    for (let message = this.deps.inbox.tryReceive(); message; message = this.deps.inbox.tryReceive()) {
      if (message.kind === 'CommandExecuted') this.startCooldown(message.at);
    }

    if (this.coolingDown) {
      const waitMs = Math.min(this.deps.idleBackoffMs, this.cooldownUntil - this.clock());
      const message = await this.deps.inbox.receive(waitMs);
      if (message?.kind === 'CommandExecuted') this.startCooldown(message.at);
      return;
    }

    const { listenTimeoutMs, phraseLimitMs } = this.deps.capture;
    const clip = await this.deps.recorder.record({ timeoutMs: listenTimeoutMs, phraseLimitMs });
    if (clip && this.running) this.emit(clip);
  }

  private async listenWindow(): Promise<void> {
    const { activationWindowMs, listenTimeoutMs, phraseLimitMs } = this.deps.capture;
    const deadline = this.clock() + activationWindowMs;
    this.log.info('listening for a command');

    while (this.running) {
      const remaining = deadline - this.clock();
      if (remaining <= 0) break;
      const clip = await this.deps.recorder.record({
        timeoutMs: Math.min(listenTimeoutMs, remaining),
        phraseLimitMs,
      });
      this.beat();
      if (clip && this.running) {
        this.emit(clip);
        return;
      }
    }
    if (this.running) this.log.info('listening timeout');
  }

  private startCooldown(at: number): void {
    this.cooldownUntil = Math.max(this.cooldownUntil, at + this.deps.capture.cooldownMs);
  }

  private emit(clip: AudioReadyMessage['clip']): void {
    if (!this.deps.outbox.trySend({ kind: 'AudioReady', clip })) {
      this.log.warn('recognizer inbox full, utterance dropped');
    }
  }
}
