import { createAudioClip } from '@lightcue/pipeline-events';
import {
  ConfidenceGate,
  MockRecognitionService,
  RecognitionServiceError,
  UnintelligibleAudioError,
  bestAlternative,
  parseRecognitionResponse,
} from './index';

describe('ConfidenceGate', () => {
  it('accepts only confidence strictly above the threshold', () => {
    const gate = new ConfidenceGate();
    expect(gate.evaluate('turn on', 0.7)).toEqual({ accepted: false, reason: 'low-confidence' });
    expect(gate.evaluate('turn on', 0.71)).toEqual({ accepted: true });
  });

  it('suppresses a repeat of a recently accepted text', () => {
    const gate = new ConfidenceGate();
    gate.evaluate('dim', 0.9);
    expect(gate.evaluate('dim', 0.95)).toEqual({ accepted: false, reason: 'duplicate' });
  });

  it('does not remember rejected texts', () => {
    const gate = new ConfidenceGate();
    gate.evaluate('dim', 0.2);
    expect(gate.evaluate('dim', 0.9)).toEqual({ accepted: true });
  });

  it('evicts the oldest text once the window is full', () => {
    const gate = new ConfidenceGate({ windowSize: 5 });
    for (const text of ['a', 'b', 'c', 'd', 'e', 'f']) {
      expect(gate.evaluate(text, 0.9).accepted).toBe(true);
    }
    expect(gate.recent()).toEqual(['b', 'c', 'd', 'e', 'f']);
    expect(gate.evaluate('a', 0.9)).toEqual({ accepted: true });
    expect(gate.evaluate('c', 0.9)).toEqual({ accepted: false, reason: 'duplicate' });
  });

  it('honours a custom threshold', () => {
    const gate = new ConfidenceGate({ threshold: 0.5 });
    expect(gate.evaluate('off', 0.6).accepted).toBe(true);
  });
});

describe('bestAlternative', () => {
  it('lower-cases and trims the first non-empty transcript', () => {
    expect(
      bestAlternative({
        transcripts: [{ text: '   ' }, { text: ' Turn On The Lights ', confidence: 0.82 }],
      }),
    ).toEqual({ text: 'turn on the lights', confidence: 0.82 });
  });

  it('defaults a missing confidence to 1.0', () => {
    expect(bestAlternative({ transcripts: [{ text: 'dim' }] })).toEqual({ text: 'dim', confidence: 1 });
  });

  it('treats an empty result as unintelligible', () => {
    expect(() => bestAlternative({ transcripts: [] })).toThrow(UnintelligibleAudioError);
  });
});

describe('parseRecognitionResponse', () => {
  it('accepts a well-formed response', () => {
    expect(parseRecognitionResponse({ transcripts: [{ text: 'dim', confidence: 0.8 }] })).toEqual({
      transcripts: [{ text: 'dim', confidence: 0.8 }],
    });
  });

  it('rejects a confidence outside 0 to 1', () => {
    expect(() => parseRecognitionResponse({ transcripts: [{ text: 'dim', confidence: 1.5 }] })).toThrow(
      RecognitionServiceError,
    );
  });

  it('rejects a response without a transcript list', () => {
    expect(() => parseRecognitionResponse({ results: [] })).toThrow('Malformed recognition response');
  });
});

describe('error kinds', () => {
  it('classifies service and perception failures', () => {
    expect(new RecognitionServiceError('down').kind).toBe('service');
    expect(new UnintelligibleAudioError().kind).toBe('perception');
  });
});

describe('MockRecognitionService', () => {
  const clip = createAudioClip(new Int16Array(160), 16_000);

  it('replays the script in order', async () => {
    const service = new MockRecognitionService()
      .respondWith('lights on', 0.9)
      .failWith(new RecognitionServiceError('down'));

    await expect(service.recognize(clip)).resolves.toEqual({
      transcripts: [{ text: 'lights on', confidence: 0.9 }],
    });
    await expect(service.recognize(clip)).rejects.toBeInstanceOf(RecognitionServiceError);
    await expect(service.recognize(clip)).resolves.toEqual({ transcripts: [] });
    expect(service.clips).toHaveLength(3);
  });
});
