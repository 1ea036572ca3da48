import { z } from 'zod';

// ─── Audio ────────────────────────────────────────────────────────────────────

/**
 * One captured utterance: mono 16-bit PCM. The producing stage hands the clip
 * over whole and keeps no reference to `samples` afterwards.
 */
export interface AudioClip {
  samples: Int16Array;
  sampleRate: number;
  capturedAt: number;
}

export function createAudioClip(samples: Int16Array, sampleRate: number, capturedAt = Date.now()): AudioClip {
  return { samples, sampleRate, capturedAt };
}

export function clipDurationMs(clip: AudioClip): number {
  if (clip.sampleRate <= 0) return 0;
  return Math.round((clip.samples.length / clip.sampleRate) * 1000);
}

// ─── Transcript & Command ─────────────────────────────────────────────────────

export const TranscriptSchema = z.object({
  text: z.string(),
  confidence: z.number().min(0).max(1),
  timestamp: z.number().int().nonnegative(),
});
export type Transcript = Readonly<z.infer<typeof TranscriptSchema>>;

export function createTranscript(text: string, confidence: number, timestamp = Date.now()): Transcript {
  return Object.freeze(
    TranscriptSchema.parse({ text: text.trim().toLowerCase(), confidence, timestamp }),
  );
}

export const CommandSourceSchema = z.enum(['voice', 'timer']);
export type CommandSource = z.infer<typeof CommandSourceSchema>;

export const CommandSchema = z.object({
  rawText: z.string().min(1),
  receivedAt: z.number().int().nonnegative(),
  source: CommandSourceSchema,
});
export type Command = Readonly<z.infer<typeof CommandSchema>>;

export function createCommand(rawText: string, source: CommandSource = 'voice', receivedAt = Date.now()): Command {
  return Object.freeze(CommandSchema.parse({ rawText: rawText.trim(), receivedAt, source }));
}

// ─── Pipeline Messages (internal bus) ─────────────────────────────────────────

export interface WakeDetectedMessage {
  kind: 'WakeDetected';
  keyword: string;
  at: number;
}

export interface AudioReadyMessage {
  kind: 'AudioReady';
  clip: AudioClip;
}

export interface CommandReadyMessage {
  kind: 'CommandReady';
  command: Command;
}

export interface TimerFiredMessage {
  kind: 'TimerFired';
  timerId: string;
  actionText: string;
  at: number;
}

export interface CommandExecutedMessage {
  kind: 'CommandExecuted';
  at: number;
}

export type PipelineMessage =
  | WakeDetectedMessage
  | AudioReadyMessage
  | CommandReadyMessage
  | TimerFiredMessage
  | CommandExecutedMessage;

export type PipelineMessageKind = PipelineMessage['kind'];

/** Inbox of the capture stage: activations plus cooldown notices. */
export type CaptureInboxMessage = WakeDetectedMessage | CommandExecutedMessage;

/** Inbox of the dispatcher: recognized commands plus expired timers. */
export type DispatchInboxMessage = CommandReadyMessage | TimerFiredMessage;

export const TimerFiredMessageSchema = z.object({
  kind: z.literal('TimerFired'),
  timerId: z.string().min(1),
  actionText: z.string().min(1),
  at: z.number().int().nonnegative(),
});

// ─── Stage Health ─────────────────────────────────────────────────────────────

export const StageStateSchema = z.enum(['idle', 'running', 'stopped', 'crashed']);
export type StageState = z.infer<typeof StageStateSchema>;

export const StageHealthSchema = z.object({
  name: z.string().min(1),
  state: StageStateSchema,
  lastHeartbeat: z.number().int().nonnegative(),
  error: z.string().optional(),
});
export type StageHealth = z.infer<typeof StageHealthSchema>;

// ─── Status Events (status feed) ──────────────────────────────────────────────

export type PipelineStatusEvent =
  | { type: 'wake'; keyword: string; timestamp: number }
  | { type: 'transcript'; text: string; confidence: number; accepted: boolean; timestamp: number }
  | { type: 'command'; text: string; outcomes: string[]; timestamp: number }
  | { type: 'restart'; reason: string; restarts: number; timestamp: number };

export type StatusHandlerErrorListener = (err: unknown, event: PipelineStatusEvent) => void;

/**
 * Fan-out of status events to observers (status server, tests). A handler
 * that throws is reported to `onHandlerError` and delivery continues.
 */
export class StatusBus {
  private handlers: Array<(event: PipelineStatusEvent) => void> = [];

  constructor(
    private readonly onHandlerError: StatusHandlerErrorListener = (err, event) =>
      console.error(`status handler failed on ${event.type}`, err),
  ) {}

  subscribe(handler: (event: PipelineStatusEvent) => void): () => void {
    this.handlers.push(handler);
    return () => {
      this.handlers = this.handlers.filter((h) => h !== handler);
    };
  }

  publish(event: PipelineStatusEvent): void {
    for (const handler of this.handlers) {
      try {
        handler(event);
      } catch (err) {
        this.onHandlerError(err, event);
      }
    }
  }
}
