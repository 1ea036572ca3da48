import type { AudioClip } from '@lightcue/pipeline-events';
import type { IRecognitionService, RecognitionResponse } from './recognition';

type ScriptedOutcome = { response: RecognitionResponse } | { error: Error } | { hang: true };

/**
 * Scripted recognition service. Each call consumes the next queued outcome;
 * an empty script answers with an empty transcript list.
 */
export class MockRecognitionService implements IRecognitionService {
  private readonly script: ScriptedOutcome[] = [];
  readonly clips: AudioClip[] = [];

  /** Queue a transcript; confidence omitted means the service did not report one */
  respondWith(text: string, confidence?: number): this {
    this.script.push({ response: { transcripts: [{ text, confidence }] } });
    return this;
  }

  respondWithResponse(response: RecognitionResponse): this {
    this.script.push({ response });
    return this;
  }

  failWith(error: Error): this {
    this.script.push({ error });
    return this;
  }

  /** Next call never settles; used to exercise the recognizer's bounded wait */
  hangNext(): this {
    this.script.push({ hang: true });
    return this;
  }

  get pending(): number {
    return this.script.length;
  }

  async recognize(clip: AudioClip): Promise<RecognitionResponse> {
    this.clips.push(clip);
    const next = this.script.shift();
    if (!next) return { transcripts: [] };
    if ('hang' in next) return new Promise<RecognitionResponse>(() => undefined);
    if ('error' in next) throw next.error;
    return next.response;
  }
}
