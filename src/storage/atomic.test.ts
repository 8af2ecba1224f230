import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  atomicWriteJson,
  readJson,
  readJsonIfExists,
  fileExists,
  isErrnoException,
} from './atomic.js';

describe('atomic', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'atomic-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('atomicWriteJson', () => {
    it('uses 2-space indentation', async () => {
      const filePath = path.join(tempDir, 'test.json');
      await atomicWriteJson(filePath, { a: 1 });

      const content = await fs.readFile(filePath, 'utf-8');
      expect(content).toBe('{\n  "a": 1\n}');
    });

    it('overwrites existing file', async () => {
      const filePath = path.join(tempDir, 'test.json');
      await atomicWriteJson(filePath, { first: true });
      await atomicWriteJson(filePath, { second: true });

      const content = await fs.readFile(filePath, 'utf-8');
      expect(JSON.parse(content)).toEqual({ second: true });
    });

    it('survives concurrent writes to the same file', async () => {
      const filePath = path.join(tempDir, 'test.json');
      await Promise.all([1, 2, 3, 4].map((n) => atomicWriteJson(filePath, { n })));

      const content = await fs.readFile(filePath, 'utf-8');
      expect([1, 2, 3, 4]).toContain(JSON.parse(content).n);
      expect(await fs.readdir(tempDir)).toEqual(['test.json']);
    });
  });

  describe('readJson', () => {
    it('returns parsed content', async () => {
      const filePath = path.join(tempDir, 'test.json');
      await fs.writeFile(filePath, '{"foo":"bar"}');

      expect(await readJson(filePath)).toEqual({ foo: 'bar' });
    });

    it('throws for missing file', async () => {
      const filePath = path.join(tempDir, 'missing.json');
      await expect(readJson(filePath)).rejects.toThrow(`File not found: ${filePath}`);
    });

    it('throws for invalid JSON', async () => {
      const filePath = path.join(tempDir, 'bad.json');
      await fs.writeFile(filePath, '{nope');
      await expect(readJson(filePath)).rejects.toThrow(`Invalid JSON in file: ${filePath}`);
    });
  });

  describe('readJsonIfExists', () => {
    it('returns null for missing file', async () => {
      expect(await readJsonIfExists(path.join(tempDir, 'missing.json'))).toBeNull();
    });
  });

  describe('isErrnoException', () => {
    it('recognises fs errors by their code', async () => {
      const error = await fs.readFile(path.join(tempDir, 'missing.json')).catch((e: unknown) => e);

      expect(isErrnoException(error)).toBe(true);
      expect(isErrnoException(error) && error.code).toBe('ENOENT');
    });

    it('accepts plain objects carrying a code', () => {
      expect(isErrnoException({ code: 'EACCES', message: 'denied' })).toBe(true);
    });

    it('rejects values without a code', () => {
      expect(isErrnoException(new Error('plain'))).toBe(false);
      expect(isErrnoException('ENOENT')).toBe(false);
      expect(isErrnoException(null)).toBe(false);
    });
  });

  describe('fileExists', () => {
    it('distinguishes files from directories', async () => {
      const filePath = path.join(tempDir, 'test.json');
      await fs.writeFile(filePath, '{}');

      expect(await fileExists(filePath)).toBe(true);
      expect(await fileExists(tempDir)).toBe(false);
      expect(await fileExists(path.join(tempDir, 'missing'))).toBe(false);
    });
  });
});
