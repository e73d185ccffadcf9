import { describe, it, expect } from '@jest/globals';
import * as os from 'node:os';
import * as path from 'node:path';
import { generateRunId, getRunFilePath, getVectorDbDir, resolveDataDir } from './paths.js';

describe('paths', () => {
  describe('resolveDataDir', () => {
    it('expands a leading tilde', () => {
      expect(resolveDataDir('~/vendors')).toBe(path.join(os.homedir(), 'vendors'));
      expect(resolveDataDir('~')).toBe(os.homedir());
    });

    it('resolves relative paths against the working directory', () => {
      expect(resolveDataDir('data')).toBe(path.resolve('data'));
      expect(resolveDataDir('/var/data')).toBe('/var/data');
    });
  });

  describe('data layout', () => {
    it('places vectors and runs under the data directory', () => {
      expect(getVectorDbDir('/data')).toBe('/data/vectors');
      expect(getRunFilePath('/data', '20261018-143512-kids-party')).toBe(
        '/data/runs/20261018-143512-kids-party.json'
      );
    });

    it('rejects run ids that escape the runs directory', () => {
      expect(() => getRunFilePath('/data', '../secrets')).toThrow(
        'runId contains invalid characters (path traversal not allowed)'
      );
      expect(() => getRunFilePath('/data', 'a\\b')).toThrow();
      expect(() => getRunFilePath('/data', ' ')).toThrow('runId is required');
    });
  });

  describe('generateRunId', () => {
    const now = new Date('2026-10-18T14:35:12Z');

    it('combines UTC timestamp and the first four words', () => {
      expect(generateRunId('Birthday party for 30 kids!', now)).toBe('20261018-143512-birthday-party-for-30');
    });

    it('omits the slug when no word survives', () => {
      expect(generateRunId('!!!', now)).toBe('20261018-143512');
    });

    it('pads single-digit fields', () => {
      expect(generateRunId('Diwali', new Date('2026-01-02T03:04:05Z'))).toBe('20260102-030405-diwali');
    });
  });
});
