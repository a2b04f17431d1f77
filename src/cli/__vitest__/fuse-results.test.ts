import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';
import { tmpdir } from 'os';
import { pathToFileURL } from 'url';
import { ConfigLoader } from '../../config/ConfigLoader.js';
import { isMainModule, parseArgs, parseResultsFile, run } from '../fuse-results.js';

const michelinResults = [
  { observations: [{ text: 'MICHELIN', confidence: 0.92 }, { text: '91V', confidence: 0.8 }] },
  { observations: [{ text: 'MICHELIN', confidence: 0.88 }, { text: '91V', confidence: 0.8 }] },
  { observations: [{ text: 'MICHELIN', confidence: 0.96 }] },
];

function harness(contents: string) {
  const printed: string[] = [];
  const errors: string[] = [];
  const loadConfig = vi.fn(async () => ConfigLoader.getDefaultConfig());
  const readInput = vi.fn(async () => contents);
  const written = new Map<string, string>();
  const writeOutput = vi.fn(async (file: string, text: string) => {
    written.set(file, text);
  });

  return {
    printed,
    errors,
    loadConfig,
    readInput,
    writeOutput,
    written,
    deps: {
      readInput,
      loadConfig,
      writeOutput,
      print: (text: string) => printed.push(text),
      printError: (text: string) => errors.push(text),
    },
  };
}

describe('Fusion CLI', () => {
  describe('parseArgs', () => {
    it('should default to no overrides', () => {
      expect(parseArgs([])).toEqual({ overrides: {}, help: false });
    });

    it('should parse options and the input file', () => {
      const options = parseArgs([
        'results.json',
        '--method',
        'merge',
        '--max-images',
        '5',
        '--no-alternatives',
        '--config',
        'custom.json',
        '-o',
        'fused.json',
      ]);

      expect(options).toEqual({
        file: 'results.json',
        configPath: 'custom.json',
        outputPath: 'fused.json',
        overrides: { fusionMethod: 'merge', maxImages: 5, returnAlternatives: false },
        help: false,
      });
    });

    it('should ignore a non-numeric image count', () => {
      expect(parseArgs(['--max-images', 'many']).overrides).toEqual({});
    });

    it('should recognize the help flag', () => {
      expect(parseArgs(['-h']).help).toBe(true);
    });
  });

  describe('parseResultsFile', () => {
    it('should accept a bare array', () => {
      const results = parseResultsFile(JSON.stringify(michelinResults));

      expect(results).toHaveLength(3);
      expect(results[0].success).toBe(true);
    });

    it('should accept an object with a results array', () => {
      expect(parseResultsFile(JSON.stringify({ results: michelinResults }))).toHaveLength(3);
    });

    it('should reject other shapes', () => {
      expect(() => parseResultsFile('{"images": []}')).toThrow(
        'Input must be an array of results or an object with a "results" array'
      );
    });

    it('should name the result without observations', () => {
      expect(() => parseResultsFile('[{"observations": []}, {"text": "AT66202"}]')).toThrow(
        'Result 2 has no observations array'
      );
    });
  });

  describe('run', () => {
    it('should print the fused result', async () => {
      const { deps, printed, errors, readInput } = harness(JSON.stringify(michelinResults));

      const exitCode = await run(['results.json'], deps);

      expect(exitCode).toBe(0);
      expect(readInput).toHaveBeenCalledWith('results.json');
      expect(errors).toEqual([]);
      expect(printed).toEqual(['Fused text: MICHELIN\nConfidence: 0.920\nMethod: voting\nImages used: 3']);
    });

    it('should apply command line overrides', async () => {
      const { deps, printed } = harness(JSON.stringify(michelinResults));

      await run(['results.json', '--method', 'merge'], deps);

      expect(printed[0].split('\n').slice(0, 3)).toEqual([
        'Fused text: MICHELIN 91V',
        'Confidence: 0.880',
        'Method: merge',
      ]);
    });

    it('should print fused lines', async () => {
      const image = {
        observations: [{ text: 'AT66202', confidence: 0.9 }],
        lines: [{ text: 'AT66202', confidence: 0.9 }],
      };
      const { deps, printed } = harness(JSON.stringify([image, image]));

      await run(['results.json'], deps);

      expect(printed[0].split('\n')).toContain('Line 1: AT66202 (confidence: 0.90, seen 2x)');
    });

    it('should load the configuration file given', async () => {
      const { deps, loadConfig } = harness(JSON.stringify(michelinResults));

      await run(['results.json', '--config', 'custom.json'], deps);

      expect(loadConfig).toHaveBeenCalledWith('custom.json');
    });

    it('should print help and succeed', async () => {
      const { deps, printed, readInput } = harness('[]');

      expect(await run(['--help'], deps)).toBe(0);
      expect(printed[0]).toContain('Usage: wheel-fuse <results.json> [options]');
      expect(readInput).not.toHaveBeenCalled();
    });

    it('should fail without an input file', async () => {
      const { deps, errors } = harness('[]');

      expect(await run([], deps)).toBe(1);
      expect(errors).toEqual(['Missing input file']);
    });

    it('should fail on unreadable input', async () => {
      const { deps, errors } = harness('{"images": []}');

      expect(await run(['results.json'], deps)).toBe(1);
      expect(errors).toEqual([
        'Cannot read results.json: Input must be an array of results or an object with a "results" array',
      ]);
    });

    it('should report a missing file', async () => {
      const { deps, errors } = harness('');
      deps.readInput.mockRejectedValueOnce(new Error('ENOENT: no such file or directory'));

      expect(await run(['missing.json'], deps)).toBe(1);
      expect(errors).toEqual(['Cannot read missing.json: ENOENT: no such file or directory']);
    });

    it('should report a fusion failure', async () => {
      const { deps, printed, errors } = harness('[]');

      expect(await run(['results.json'], deps)).toBe(1);
      expect(printed).toEqual([]);
      expect(errors).toEqual(['Fusion failed (EMPTY_INPUT): No recognition results to fuse']);
    });

    it('should reject an invalid image limit', async () => {
      const { deps, printed, errors } = harness(JSON.stringify(michelinResults));

      expect(await run(['results.json', '--max-images', '0'], deps)).toBe(1);
      expect(printed).toEqual([]);
      expect(errors).toEqual(['Invalid configuration: multi_angle.max_images must be at least 1']);
    });

    it('should write the fused result as JSON', async () => {
      const { deps, printed, written, writeOutput } = harness(JSON.stringify(michelinResults));

      expect(await run(['results.json', '--output', 'fused.json'], deps)).toBe(0);

      expect(writeOutput).toHaveBeenCalledTimes(1);
      const saved: unknown = JSON.parse(written.get('fused.json') ?? 'null');
      expect(saved).toMatchObject({
        success: true,
        mergedText: 'MICHELIN',
        fusionMethod: 'voting',
        sourceCount: 3,
        lines: [],
        totalLines: 0,
      });
      expect(printed).toEqual(['Results saved to fused.json']);
    });

    it('should write failures as JSON too', async () => {
      const { deps, errors, written } = harness('[]');

      expect(await run(['results.json', '-o', 'fused.json'], deps)).toBe(1);

      expect(JSON.parse(written.get('fused.json') ?? 'null')).toEqual({
        success: false,
        code: 'EMPTY_INPUT',
        error: 'No recognition results to fuse',
      });
      expect(errors).toEqual(['Fusion failed (EMPTY_INPUT): No recognition results to fuse']);
    });

    it('should report an unwritable output file', async () => {
      const { deps, errors } = harness(JSON.stringify(michelinResults));
      deps.writeOutput.mockRejectedValueOnce(new Error('EACCES: permission denied'));

      expect(await run(['results.json', '--output', '/readonly/fused.json'], deps)).toBe(1);
      expect(errors).toEqual(['Cannot write /readonly/fused.json: EACCES: permission denied']);
    });

    it('should report an unsupported method', async () => {
      const { deps, errors } = harness(JSON.stringify(michelinResults));

      expect(await run(['results.json', '--method', 'median'], deps)).toBe(1);
      expect(errors).toEqual(['Fusion failed (UNSUPPORTED_FUSION_METHOD): Unsupported fusion method: median']);
    });
  });

  describe('isMainModule', () => {
    let dir: string;
    let script: string;
    let link: string;

    beforeAll(async () => {
      dir = await fs.mkdtemp(path.join(tmpdir(), 'wheel-fuse-test-'));
      script = path.join(dir, 'fuse-results.js');
      link = path.join(dir, 'wheel-fuse');
      await fs.writeFile(script, '');
      await fs.symlink(script, link);
    });

    afterAll(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('should match the script run directly', () => {
      expect(isMainModule(script, pathToFileURL(script).href)).toBe(true);
    });

    it('should match the script run through a bin symlink', () => {
      expect(isMainModule(link, pathToFileURL(script).href)).toBe(true);
    });

    it('should not match another script or a missing path', () => {
      expect(isMainModule(link, pathToFileURL(path.join(dir, 'other.js')).href)).toBe(false);
      expect(isMainModule(path.join(dir, 'missing.js'), pathToFileURL(script).href)).toBe(false);
      expect(isMainModule(undefined, pathToFileURL(script).href)).toBe(false);
    });
  });
});
