import { describe, it, expect, vi } from 'vitest';
import { ConfigLoader } from '../../config/ConfigLoader.js';
import type { BoundingQuad, TextObservation } from '../../types/observation.js';
import { WheelCodeRecognizer } from '../WheelCodeRecognizer.js';
import {
  ocrFailure,
  type ImageEnhancer,
  type ImageInput,
  type ObservationOutcome,
  type ObservationSource,
} from '../sources/types.js';

function box(x: number, y: number, width: number, height: number): BoundingQuad {
  return [
    [x, y],
    [x + width, y],
    [x + width, y + height],
    [x, y + height],
  ];
}

function bufferImage(label: string): ImageInput {
  return { kind: 'buffer', buffer: Buffer.from(label) };
}

function labelOf(image: ImageInput): string {
  return image.kind === 'buffer' ? image.buffer.toString() : image.path;
}

function found(observations: TextObservation[]): ObservationOutcome {
  return { ok: true, engine: 'fake', observations };
}

/**
 * Source answering from a table keyed by the image contents
 */
function tableSource(table: Record<string, ObservationOutcome>): ObservationSource {
  return {
    name: 'fake',
    observe: async (image) => table[labelOf(image)] ?? found([]),
  };
}

const hubObservations: TextObservation[] = [
  { text: 'MICHELIN', confidence: 0.8, boundingQuad: box(100, 300, 200, 40) },
  { text: 'JWL', confidence: 0.7, boundingQuad: box(400, 110, 80, 40) },
  { text: 'AT66202', confidence: 0.9, boundingQuad: box(100, 100, 200, 40) },
  { text: '91V', confidence: 0.4, boundingQuad: box(100, 500, 60, 40) },
];

describe('WheelCodeRecognizer', () => {
  describe('recognize', () => {
    it('should filter, rank and group one image', async () => {
      const recognizer = new WheelCodeRecognizer({ source: tableSource({ hub: found(hubObservations) }) });

      const outcome = await recognizer.recognize(bufferImage('hub'));

      expect(outcome.success).toBe(true);
      if (!outcome.success) return;

      expect(outcome.results.map((result) => result.text)).toEqual(['AT66202', 'MICHELIN', 'JWL']);
      expect(outcome.lines.map((line) => line.text)).toEqual(['AT66202 JWL', 'MICHELIN']);
      expect(outcome.totalTexts).toBe(3);
      expect(outcome.totalLines).toBe(2);
      expect(outcome.rawCount).toBe(4);
      expect(outcome.engineUsed).toBe('fake');
      expect(outcome.processingTimeMs).toBeGreaterThanOrEqual(0);
    });

    it('should apply the configured filter settings', async () => {
      const config = ConfigLoader.withOverrides(ConfigLoader.getDefaultConfig(), {
        postprocessing: { minConfidence: 0.75 },
      });
      const recognizer = new WheelCodeRecognizer({ source: tableSource({ hub: found(hubObservations) }) }, config);

      const outcome = await recognizer.recognize(bufferImage('hub'));

      expect(outcome.success && outcome.results.map((result) => result.text)).toEqual(['AT66202', 'MICHELIN']);
    });

    it('should report a source failure', async () => {
      const recognizer = new WheelCodeRecognizer({
        source: tableSource({ hub: ocrFailure('INVALID_IMAGE', 'Image could not be read') }),
      });

      const outcome = await recognizer.recognize(bufferImage('hub'));

      expect(outcome.success).toBe(false);
      if (outcome.success) return;
      expect(outcome.error).toEqual({ code: 'INVALID_IMAGE', message: 'Image could not be read', retryable: false });
    });

    it('should time out a source that never answers', async () => {
      const config = ConfigLoader.withOverrides(ConfigLoader.getDefaultConfig(), {
        processing: { sourceTimeoutMs: 20 },
      });
      const source: ObservationSource = {
        name: 'stuck',
        observe: () => new Promise<ObservationOutcome>(() => undefined),
      };

      const outcome = await new WheelCodeRecognizer({ source }, config).recognize(bufferImage('hub'));

      expect(outcome.success).toBe(false);
      if (outcome.success) return;
      expect(outcome.error.code).toBe('TIMEOUT');
      expect(outcome.error.message).toBe('stuck timed out after 20ms');
      expect(outcome.error.retryable).toBe(true);
    });

    it('should turn a throwing source into an engine failure', async () => {
      const source: ObservationSource = {
        name: 'broken',
        observe: async () => {
          throw new Error('model not loaded');
        },
      };

      const outcome = await new WheelCodeRecognizer({ source }).recognize(bufferImage('hub'));

      expect(outcome.success === false && outcome.error).toEqual({
        code: 'ENGINE_FAILED',
        message: 'broken failed: model not loaded',
        retryable: false,
      });
    });

    it('should observe the enhanced image', async () => {
      const enhancer: ImageEnhancer = {
        enhance: async (image) => bufferImage(`${labelOf(image)}-sharp`),
      };
      const recognizer = new WheelCodeRecognizer({
        source: tableSource({ 'hub-sharp': found([{ text: 'AT66202', confidence: 0.9 }]) }),
        enhancer,
      });

      const outcome = await recognizer.recognize(bufferImage('hub'));

      expect(outcome.success && outcome.results.map((result) => result.text)).toEqual(['AT66202']);
    });

    it('should fall back to the original image when enhancement fails', async () => {
      const enhancer: ImageEnhancer = {
        enhance: async () => {
          throw new Error('unsupported format');
        },
      };
      const recognizer = new WheelCodeRecognizer({
        source: tableSource({ hub: found([{ text: 'JWL', confidence: 0.9 }]) }),
        enhancer,
      });

      const outcome = await recognizer.recognize(bufferImage('hub'));

      expect(outcome.success && outcome.results.map((result) => result.text)).toEqual(['JWL']);
    });
  });

  describe('recognizeBatch', () => {
    it('should return an empty list for no images', async () => {
      const recognizer = new WheelCodeRecognizer({ source: tableSource({}) });

      expect(await recognizer.recognizeBatch([])).toEqual([]);
    });

    it('should keep submission order and bound concurrency', async () => {
      let active = 0;
      let peak = 0;
      const source: ObservationSource = {
        name: 'fake',
        observe: async (image) => {
          active++;
          peak = Math.max(peak, active);
          const label = labelOf(image);
          // Earlier images answer later
          await new Promise((resolve) => setTimeout(resolve, 30 - Number(label.slice(-1)) * 5));
          active--;
          return found([{ text: label, confidence: 0.9 }]);
        },
      };
      const config = ConfigLoader.withOverrides(ConfigLoader.getDefaultConfig(), {
        processing: { maxConcurrent: 2 },
      });
      const labels = ['AT66201', 'AT66202', 'AT66203', 'AT66204', 'AT66205'];

      const outcomes = await new WheelCodeRecognizer({ source }, config).recognizeBatch(labels.map(bufferImage));

      expect(outcomes.map((outcome) => outcome.success && outcome.results[0].text)).toEqual(labels);
      expect(peak).toBe(2);
    });

    it('should keep failures in place', async () => {
      const recognizer = new WheelCodeRecognizer({
        source: tableSource({
          good: found([{ text: 'AT66202', confidence: 0.9 }]),
          bad: ocrFailure('SERVER_ERROR', 'fake server error (503) - try again later'),
        }),
      });

      const outcomes = await recognizer.recognizeBatch([bufferImage('good'), bufferImage('bad')]);

      expect(outcomes.map((outcome) => outcome.success)).toEqual([true, false]);
    });
  });

  describe('recognizeMultiAngle', () => {
    const angles = tableSource({
      front: found([{ text: 'AT66202', confidence: 0.9 }]),
      side: found([{ text: 'AT66202', confidence: 0.8 }]),
      glare: ocrFailure('INVALID_IMAGE', 'Image could not be read'),
    });
    const images = ['front', 'side', 'glare'].map(bufferImage);

    it('should fuse the successful images', async () => {
      const outcome = await new WheelCodeRecognizer({ source: angles }).recognizeMultiAngle(images);

      expect(outcome.success).toBe(true);
      if (!outcome.success) return;

      expect(outcome.mergedText).toBe('AT66202');
      expect(outcome.confidence).toBeCloseTo(0.85);
      expect(outcome.sourceCount).toBe(3);
      expect(outcome.fusionMethod).toBe('voting');
      expect(outcome.lines).toHaveLength(1);
      expect(outcome.lines[0].occurrenceCount).toBe(2);
      expect(outcome.individualResults.map((result) => result.success)).toEqual([true, true, false]);
    });

    it('should apply per-call fusion overrides', async () => {
      const outcome = await new WheelCodeRecognizer({ source: angles }).recognizeMultiAngle(images, {
        fusionMethod: 'smart',
      });

      expect(outcome.success && outcome.fusionMethod).toBe('smart');
      expect(outcome.success && outcome.confidence).toBe(0.9);
    });

    it('should return individual results when fusion fails', async () => {
      const outcome = await new WheelCodeRecognizer({ source: angles }).recognizeMultiAngle(images, {
        fusionMethod: 'median',
      });

      expect(outcome.success).toBe(false);
      if (outcome.success) return;
      expect(outcome.code).toBe('UNSUPPORTED_FUSION_METHOD');
      expect(outcome.individualResults).toHaveLength(3);
    });

    it('should observe each image once', async () => {
      const observe = vi.fn(async () => found([{ text: 'AT66202', confidence: 0.9 }]));

      await new WheelCodeRecognizer({ source: { name: 'fake', observe } }).recognizeMultiAngle(images);

      expect(observe).toHaveBeenCalledTimes(3);
    });
  });
});
