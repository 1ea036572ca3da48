import {
  CommandSchema,
  StageHealthSchema,
  StatusBus,
  TimerFiredMessageSchema,
  clipDurationMs,
  createAudioClip,
  createCommand,
  createTranscript,
  type PipelineMessage,
  type PipelineStatusEvent,
} from './index';

describe('createTranscript', () => {
  it('normalizes text to trimmed lower case', () => {
    const transcript = createTranscript('  Turn ON the Lights ', 0.9, 1_000);
    expect(transcript.text).toBe('turn on the lights');
    expect(transcript.confidence).toBe(0.9);
    expect(transcript.timestamp).toBe(1_000);
  });

  it('is frozen', () => {
    const transcript = createTranscript('dim', 0.8);
    expect(Object.isFrozen(transcript)).toBe(true);
  });

  it('rejects confidence outside [0, 1]', () => {
    expect(() => createTranscript('dim', 1.2)).toThrow();
    expect(() => createTranscript('dim', -0.1)).toThrow();
  });
});

describe('createCommand', () => {
  it('defaults the source to voice', () => {
    const command = createCommand('turn off', undefined, 5);
    expect(command).toEqual({ rawText: 'turn off', receivedAt: 5, source: 'voice' });
  });

  it('rejects empty text', () => {
    expect(() => createCommand('   ')).toThrow();
  });

  it('validates against CommandSchema', () => {
    expect(() =>
      CommandSchema.parse({ rawText: 'maximum', receivedAt: 1, source: 'radio' }),
    ).toThrow();
  });
});

describe('AudioClip helpers', () => {
  it('computes clip duration in milliseconds', () => {
    const clip = createAudioClip(new Int16Array(8_000), 16_000, 1);
    expect(clipDurationMs(clip)).toBe(500);
  });

  it('returns 0 for a zero sample rate', () => {
    expect(clipDurationMs(createAudioClip(new Int16Array(10), 0, 1))).toBe(0);
  });
});

describe('schemas', () => {
  it('validates a TimerFired message', () => {
    expect(() =>
      TimerFiredMessageSchema.parse({
        kind: 'TimerFired',
        timerId: 'timer-1',
        actionText: 'turn off lights',
        at: Date.now(),
      }),
    ).not.toThrow();
  });

  it('rejects an unknown stage state', () => {
    expect(() =>
      StageHealthSchema.parse({ name: 'dispatcher', state: 'sleeping', lastHeartbeat: 0 }),
    ).toThrow();
  });
});

describe('PipelineMessage', () => {
  it('narrows on kind', () => {
    const describeMessage = (message: PipelineMessage): string => {
      switch (message.kind) {
        case 'WakeDetected':
          return `wake:${message.keyword}`;
        case 'AudioReady':
          return `audio:${message.clip.samples.length}`;
        case 'CommandReady':
          return `command:${message.command.rawText}`;
        case 'TimerFired':
          return `timer:${message.actionText}`;
        case 'CommandExecuted':
          return 'executed';
      }
    };

    expect(describeMessage({ kind: 'WakeDetected', keyword: 'jarvis', at: 1 })).toBe('wake:jarvis');
    expect(
      describeMessage({ kind: 'TimerFired', timerId: 't', actionText: 'dim', at: 1 }),
    ).toBe('timer:dim');
  });
});

describe('StatusBus', () => {
  const event: PipelineStatusEvent = { type: 'wake', keyword: 'jarvis', timestamp: 1 };

  it('delivers events to every subscriber', () => {
    const bus = new StatusBus();
    const seen: string[] = [];
    bus.subscribe((e) => seen.push(`a:${e.type}`));
    bus.subscribe((e) => seen.push(`b:${e.type}`));
    bus.publish(event);
    expect(seen).toEqual(['a:wake', 'b:wake']);
  });

  it('stops delivering after unsubscribe', () => {
    const bus = new StatusBus();
    const seen: string[] = [];
    const unsubscribe = bus.subscribe((e) => seen.push(e.type));
    unsubscribe();
    bus.publish(event);
    expect(seen).toHaveLength(0);
  });

  it('keeps delivering when a subscriber throws', () => {
    const failures: string[] = [];
    const bus = new StatusBus((err, e) => failures.push(`${e.type}:${err instanceof Error ? err.message : ''}`));
    const seen: string[] = [];
    bus.subscribe(() => {
      throw new Error('boom');
    });
    bus.subscribe((e) => seen.push(e.type));
    bus.publish(event);
    expect(seen).toEqual(['wake']);
    expect(failures).toEqual(['wake:boom']);
  });
});
