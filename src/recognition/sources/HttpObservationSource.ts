import axios from 'axios';
import { readFile } from 'fs/promises';
import { logger } from '../../utils/logger.js';
import { asRecord, parseObservationList } from '../parsing.js';
import { ocrFailure, type ImageInput, type ObservationOutcome, type ObservationSource } from './types.js';

/**
 * Configuration for an HTTP OCR service
 */
export interface HttpObservationSourceConfig {
  /**
   * URL accepting `{ image: <base64> }` and answering
   * `{ observations: [{ text, confidence, bbox }] }`
   */
  endpoint: string;

  /**
   * Optional bearer token
   */
  apiKey?: string;

  /**
   * Source name reported as the engine used
   * Default: http
   */
  name?: string;

  /**
   * Optional timeout in milliseconds
   * Default: 30000 (30 seconds)
   */
  timeout?: number;
}

/**
 * Observation source backed by a local or cloud OCR service over HTTP
 */
export class HttpObservationSource implements ObservationSource {
  readonly name: string;
  private readonly endpoint: string;
  private readonly apiKey?: string;
  private readonly timeout: number;

  constructor(config: HttpObservationSourceConfig) {
    if (!config.endpoint) {
      throw new Error('Endpoint is required for HTTP observation source');
    }

    this.endpoint = config.endpoint;
    this.apiKey = config.apiKey;
    this.name = config.name || 'http';
    this.timeout = config.timeout || 30000;
  }

  async observe(image: ImageInput): Promise<ObservationOutcome> {
    let encoded: string;
    try {
      encoded = await this.encodeImage(image);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Failed to read image for ${this.name}`, error);
      return ocrFailure('INVALID_IMAGE', 'Image could not be read', message);
    }

    logger.debug(`Requesting observations from ${this.name}`, { endpoint: this.endpoint });

    try {
      const response = await axios.post<unknown>(
        this.endpoint,
        { image: encoded },
        {
          headers: {
            'Content-Type': 'application/json',
            ...(this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {}),
          },
          timeout: this.timeout,
        }
      );

      const observations = parseObservationList(asRecord(response.data)?.observations);
      if (!observations) {
        logger.error(`Invalid response from ${this.name}`, { response: response.data });
        return ocrFailure('BAD_RESPONSE', `Invalid response from ${this.name} - missing observations`);
      }

      logger.debug(`Received ${observations.length} observation(s) from ${this.name}`);
      return { ok: true, observations, engine: this.name };
    } catch (error: unknown) {
      return this.toFailure(error);
    }
  }

  private async encodeImage(image: ImageInput): Promise<string> {
    const buffer = image.kind === 'buffer' ? image.buffer : await readFile(image.path);
    if (buffer.length === 0) {
      throw new Error('Image is empty');
    }
    return buffer.toString('base64');
  }

  private toFailure(error: unknown): ObservationOutcome {
    if (!axios.isAxiosError(error)) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Unexpected error from ${this.name}`, error);
      return ocrFailure('UNKNOWN', `Error requesting observations: ${message}`);
    }

    const statusCode = error.response?.status;
    logger.error(`${this.name} OCR service error`, {
      status: statusCode,
      message: error.message,
    });

    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return ocrFailure('TIMEOUT', `${this.name} timed out after ${this.timeout}ms`);
    }
    if (statusCode === 401 || statusCode === 403) {
      return ocrFailure('UNAUTHORIZED', `${this.name} authentication failed - invalid API key`);
    }
    if (statusCode === 429) {
      return ocrFailure('RATE_LIMITED', `${this.name} rate limit exceeded - try again later`);
    }
    if (statusCode !== undefined && statusCode >= 500) {
      return ocrFailure('SERVER_ERROR', `${this.name} server error (${statusCode}) - try again later`);
    }
    if (statusCode === 400 || statusCode === 422) {
      return ocrFailure('INVALID_IMAGE', `${this.name} rejected the image (${statusCode})`);
    }

    return ocrFailure('ENGINE_FAILED', `${this.name} request failed (${statusCode ?? 'no response'})`, error.message);
  }
}
