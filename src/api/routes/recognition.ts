import { Router } from 'express';
import { validateRecognitionConfig, type RecognitionConfig } from '../../config/ConfigSchema.js';
import { ConfigLoader } from '../../config/ConfigLoader.js';
import type { ConfusionCorrector } from '../../recognition/correction/ConfusionCorrector.js';
import { filterAndRank } from '../../recognition/filtering/ResultFilterPipeline.js';
import { groupLines } from '../../recognition/lines/LineGrouper.js';
import { fuse } from '../../recognition/fusion/MultiSourceFusion.js';
import { asyncHandler, ValidationError } from '../middleware/errorHandler.js';
import {
  parseConfigOverrides,
  requireBody,
  requireCorrectionInput,
  requireObservations,
  requirePerImageResults,
} from '../requestParsing.js';

/**
 * Create recognition routes. Every request works on its own snapshot of the
 * base configuration with the request's overrides applied; a snapshot that
 * fails validation is rejected before any work is done.
 */
export function createRecognitionRoutes(baseConfig: RecognitionConfig, corrector: ConfusionCorrector): Router {
  const router = Router();

  const snapshotFor = (body: { [key: string]: unknown }): RecognitionConfig => {
    const snapshot = ConfigLoader.withOverrides(baseConfig, parseConfigOverrides(body.config));
    const validation = validateRecognitionConfig(snapshot);
    if (!validation.valid) {
      throw new ValidationError('Invalid config overrides', validation.errors);
    }
    return snapshot;
  };

  /**
   * POST /recognition/filter - Filter and rank one image's observations
   */
  router.post('/filter', asyncHandler(async (req, res) => {
    const body = requireBody(req.body);
    const observations = requireObservations(body.observations);
    const config = snapshotFor(body);

    const results = filterAndRank(observations, config.postprocessing);

    res.json({
      data: {
        results,
        totalTexts: results.length,
        rawCount: observations.length
      }
    });
  }));

  /**
   * POST /recognition/lines - Group observations into rows
   */
  router.post('/lines', asyncHandler(async (req, res) => {
    const body = requireBody(req.body);
    const observations = requireObservations(body.observations);
    const config = snapshotFor(body);

    const lines = groupLines(observations, config.lineGrouping.yThreshold);

    res.json({
      data: {
        lines,
        totalLines: lines.length
      }
    });
  }));

  /**
   * POST /recognition/correct - Ranked correction candidates for one reading
   */
  router.post('/correct', asyncHandler(async (req, res) => {
    const body = requireBody(req.body);
    const config = snapshotFor(body);
    const input = requireCorrectionInput(body, 'body', config.postprocessing.maxLength);
    const candidates = corrector.correct(input.text, input.confidence);

    res.json({
      data: {
        text: input.text,
        candidates
      }
    });
  }));

  /**
   * POST /recognition/correct/batch - Replace each record with its best candidate
   */
  router.post('/correct/batch', asyncHandler(async (req, res) => {
    const body = requireBody(req.body);
    if (!Array.isArray(body.records)) {
      throw new ValidationError('records array is required');
    }

    const { maxLength } = snapshotFor(body).postprocessing;
    const records = body.records.map((record, index) =>
      requireCorrectionInput(record, `records[${index}]`, maxLength)
    );

    res.json({
      data: corrector.batchCorrect(records)
    });
  }));

  /**
   * POST /recognition/fuse - Fuse several images' results into one answer
   */
  router.post('/fuse', asyncHandler(async (req, res) => {
    const body = requireBody(req.body);
    const results = requirePerImageResults(body.results);
    const config = snapshotFor(body);

    const outcome = fuse(results, config.multiAngle);

    if (!outcome.success) {
      res.status(422).json(outcome);
      return;
    }

    res.json({ data: outcome });
  }));

  return router;
}
