import {
  StatusBus,
  createAudioClip,
  type AudioReadyMessage,
  type DispatchInboxMessage,
  type PipelineStatusEvent,
} from '@lightcue/pipeline-events';
import { ConfidenceGate, MockRecognitionService, RecognitionServiceError } from '@lightcue/voice-pipeline';
import { Channel } from '../channel';
import { RecognitionTimeoutError, type Fault } from '../errors';
import { MockFeedback } from '../feedback';
import { logger } from '../logger';
import { RecognizerStage } from './recognizer';

function setup(timeoutMs = 1_000) {
  const service = new MockRecognitionService();
  const inbox = new Channel<AudioReadyMessage>(8);
  const outbox = new Channel<DispatchInboxMessage>(8);
  const feedback = new MockFeedback();
  const bus = new StatusBus();
  const events: PipelineStatusEvent[] = [];
  bus.subscribe((event) => events.push(event));
  const faults: Fault[] = [];

  const stage = new RecognizerStage({
    service,
    gate: new ConfidenceGate({ threshold: 0.7, windowSize: 5 }),
    inbox,
    outbox,
    feedback,
    bus,
    reportFault: (fault) => faults.push(fault),
    timeoutMs,
    idleBackoffMs: 10,
    log: logger,
  });
  const submit = () => inbox.trySend({ kind: 'AudioReady', clip: createAudioClip(new Int16Array(160), 16_000) });

  return { service, outbox, feedback, events, faults, stage, submit };
}

describe('RecognizerStage', () => {
  let stage: RecognizerStage | undefined;

  afterEach(async () => {
    await stage?.stop();
    stage = undefined;
  });

  it('turns a confident transcript into a command', async () => {
    const ctx = setup();
    stage = ctx.stage;
    ctx.service.respondWith('  Turn ON the lights ', 0.92);
    stage.start();
    ctx.submit();

    await vi.waitFor(() => expect(ctx.outbox.size).toBe(1));
    const message = ctx.outbox.tryReceive();
    expect(message?.kind).toBe('CommandReady');
    if (message?.kind !== 'CommandReady') return;
    expect(message.command.rawText).toBe('turn on the lights');
    expect(message.command.source).toBe('voice');

    expect(ctx.feedback.cues).toEqual(['recognized']);
    expect(ctx.feedback.spoken).toEqual(['I heard: turn on the lights']);
    expect(ctx.feedback.notifications).toEqual([{ title: 'Command recognized', message: 'turn on the lights' }]);
    expect(ctx.events).toEqual([
      expect.objectContaining({ type: 'transcript', text: 'turn on the lights', confidence: 0.92, accepted: true }),
    ]);
  });

  it('drops low-confidence and repeated transcripts', async () => {
    const ctx = setup();
    stage = ctx.stage;
    ctx.service.respondWith('dim', 0.5).respondWith('dim', 0.9).respondWith('dim', 0.95);
    stage.start();
    ctx.submit();
    ctx.submit();
    ctx.submit();

    await vi.waitFor(() => expect(ctx.events).toHaveLength(3));
    expect(ctx.events.map((e) => (e.type === 'transcript' ? e.accepted : null))).toEqual([false, true, false]);
    expect(ctx.outbox.size).toBe(1);
    expect(ctx.faults).toEqual([]);
  });

  it('cues an error for unintelligible audio without reporting a fault', async () => {
    const ctx = setup();
    stage = ctx.stage;
    stage.start();
    ctx.submit();

    await vi.waitFor(() => expect(ctx.feedback.cues).toEqual(['error']));
    expect(ctx.faults).toEqual([]);
    expect(ctx.outbox.size).toBe(0);
  });

  it('reports service failures to the supervisor and keeps running', async () => {
    const ctx = setup();
    stage = ctx.stage;
    ctx.service.failWith(new RecognitionServiceError('Speech recognition service responded 503')).respondWith('dim', 0.9);
    stage.start();
    ctx.submit();
    ctx.submit();

    await vi.waitFor(() => expect(ctx.outbox.size).toBe(1));
    expect(ctx.faults).toHaveLength(1);
    expect(ctx.faults[0]?.stage).toBe('recognizer');
    expect(ctx.faults[0]?.error.message).toBe('Speech recognition service responded 503');
    expect(ctx.feedback.cues).toEqual(['error', 'recognized']);
    expect(stage.health().state).toBe('running');
  });

  it('treats an out-of-range confidence as a service failure', async () => {
    const ctx = setup();
    stage = ctx.stage;
    ctx.service.respondWith('turn on', 1.5).respondWith('dim', 0.9);
    stage.start();
    ctx.submit();
    ctx.submit();

    await vi.waitFor(() => expect(ctx.outbox.size).toBe(1));
    expect(ctx.faults).toHaveLength(1);
    expect(ctx.faults[0]?.error).toBeInstanceOf(RecognitionServiceError);
    expect(ctx.faults[0]?.error.message).toBe('Malformed recognition response');
    expect(ctx.feedback.cues).toEqual(['error', 'recognized']);
    expect(ctx.events).toHaveLength(1);
    expect(stage.health().state).toBe('running');
  });

  it('gives up on a recognition call that never answers', async () => {
    const ctx = setup(30);
    stage = ctx.stage;
    ctx.service.hangNext();
    stage.start();
    ctx.submit();

    await vi.waitFor(() => expect(ctx.faults).toHaveLength(1));
    expect(ctx.faults[0]?.error).toBeInstanceOf(RecognitionTimeoutError);
    expect(ctx.feedback.cues).toEqual(['error']);
    expect(stage.health().state).toBe('running');
  });
});
