/**
 * Reflection Codec Tests
 */

import { decodeReflections, decodeValues } from '../../../src/boundary/codec';
import { DecodeError } from '../../../src/utils/errors';

describe('decodeReflections', () => {
  it('should decode camelCase reflections and drop nulls', () => {
    const result = decodeReflections(
      JSON.stringify([
        {
          timestamp: '2024-01-15T10:00:00Z',
          emotionId: 'joy',
          emotionName: 'Joy',
          intensity: 7,
          relatedEmotions: ['excitement'],
          location: { placeName: 'Park', city: null },
          people: [{ id: 'p1', name: 'Sam' }],
          copingStrategies: null,
          moodBefore: 3,
          moodAfter: null,
        },
      ])
    );

    expect(result).toEqual({
      kind: 'ok',
      value: [
        {
          timestamp: '2024-01-15T10:00:00Z',
          emotionId: 'joy',
          emotionName: 'Joy',
          intensity: 7,
          relatedEmotions: ['excitement'],
          location: { placeName: 'Park', city: undefined, country: undefined },
          people: [{ id: 'p1', name: 'Sam' }],
          copingStrategies: undefined,
          moodBefore: 3,
          moodAfter: undefined,
        },
      ],
    });
  });

  it('should accept a reflection with only a timestamp', () => {
    const result = decodeReflections('[{"timestamp":"anything"}]');

    expect(result.kind).toBe('ok');
    if (result.kind === 'ok') {
      expect(result.value[0].timestamp).toBe('anything');
      expect(result.value[0].emotionId).toBeUndefined();
    }
  });

  it('should ignore unknown keys', () => {
    const result = decodeReflections('[{"timestamp":"2024-01-15T10:00:00Z","weather":"rain"}]');

    expect(result.kind).toBe('ok');
    if (result.kind === 'ok') {
      expect(Object.keys(result.value[0])).not.toContain('weather');
    }
  });

  it('should decode an empty array', () => {
    expect(decodeReflections('[]')).toEqual({ kind: 'ok', value: [] });
  });

  it('should fall back on invalid JSON', () => {
    const result = decodeReflections('[{"timestamp":');

    expect(result.kind).toBe('fallback');
    if (result.kind === 'fallback') {
      expect(result.error).toBeInstanceOf(DecodeError);
      expect(result.error.code).toBe('DECODE_ERROR');
      expect(result.error.message).toBe('Input is not valid JSON');
    }
  });

  it('should fall back when the payload is not an array', () => {
    expect(decodeReflections('{"timestamp":"2024-01-15T10:00:00Z"}').kind).toBe('fallback');
  });

  it('should fall back when any element is malformed', () => {
    const result = decodeReflections(
      JSON.stringify([{ timestamp: '2024-01-15T10:00:00Z' }, { timestamp: 42 }])
    );

    expect(result.kind).toBe('fallback');
    if (result.kind === 'fallback') {
      expect(result.error.message).toBe('Input does not match the expected shape');
      expect(result.error.details).toEqual({
        issues: [{ path: '1.timestamp', message: 'Expected string, received number' }],
      });
    }
  });

  it('should fall back when the timestamp is missing', () => {
    expect(decodeReflections('[{"emotionId":"joy"}]').kind).toBe('fallback');
  });

  it('should fall back on a non-numeric intensity', () => {
    expect(decodeReflections('[{"timestamp":"t","intensity":"high"}]').kind).toBe('fallback');
  });
});

describe('decodeValues', () => {
  it('should decode integers and floats', () => {
    expect(decodeValues('[1, 2.5, -3]')).toEqual({ kind: 'ok', value: [1, 2.5, -3] });
  });

  it('should fall back on non-numeric entries', () => {
    expect(decodeValues('[1, "2"]').kind).toBe('fallback');
    expect(decodeValues('[1, null]').kind).toBe('fallback');
  });

  it('should fall back on numbers that overflow to Infinity', () => {
    expect(decodeValues('[1e999]').kind).toBe('fallback');
  });

  it('should fall back on non-array input', () => {
    expect(decodeValues('3').kind).toBe('fallback');
    expect(decodeValues('').kind).toBe('fallback');
  });
});
