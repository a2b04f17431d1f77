import { describe, it, expect } from 'vitest';
import { parseObservation, parseObservationList, parsePerImageResult } from '../parsing.js';

describe('observation parsing', () => {
  it('should read bbox as the bounding quad and clamp confidence', () => {
    const observation = parseObservation({
      text: 'AT66202',
      confidence: 1.4,
      bbox: [[0, 0], [80, 0], [80, 30], [0, 30]],
    });

    expect(observation).toEqual({
      text: 'AT66202',
      confidence: 1,
      boundingQuad: [[0, 0], [80, 0], [80, 30], [0, 30]],
    });
  });

  it('should drop malformed geometry but keep the text', () => {
    expect(parseObservation({ text: '91V', confidence: -0.2, bbox: [[0, 0]] })).toEqual({
      text: '91V',
      confidence: 0,
    });
  });

  it('should skip entries without text', () => {
    expect(parseObservationList([{ confidence: 0.9 }, 'AT66202', { text: 'JWL', confidence: 0.8 }])).toEqual([
      { text: 'JWL', confidence: 0.8 },
    ]);
    expect(parseObservationList({ text: 'JWL' })).toBeNull();
  });

  it('should read per-image results from observations or results', () => {
    expect(parsePerImageResult({ observations: [{ text: 'A', confidence: 0.5 }] })).toEqual({
      success: true,
      observations: [{ text: 'A', confidence: 0.5 }],
    });

    expect(
      parsePerImageResult({
        success: false,
        results: [],
        lines: [{ text: 'AT66202 JWL', confidence: 0.9 }, { confidence: 0.1 }],
      })
    ).toEqual({
      success: false,
      observations: [],
      lines: [{ text: 'AT66202 JWL', confidence: 0.9, members: [] }],
    });

    expect(parsePerImageResult({ lines: [] })).toBeNull();
  });
});
