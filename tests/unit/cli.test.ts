import { ExitCodes, generateOutput, run } from '../../src/cli';
import { TreeScanner } from '../../src/scanner/TreeScanner';
import { USAGE } from '../../src/config';
import { MemoryFileSystem } from '../helpers/MemoryFileSystem';
import fs from 'fs-extra';
import path from 'path';
import os from 'os';

describe('cli', () => {
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;
  let tempDir: string;

  beforeEach(async () => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'dirsize-cli-'));
  });

  afterEach(async () => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
    await fs.remove(tempDir);
  });

  describe('run', () => {
    it('should print usage for --help', async () => {
      await expect(run(['--help'])).resolves.toBe(ExitCodes.SUCCESS);
      expect(logSpy).toHaveBeenCalledWith(USAGE);
    });

    it('should dump every item as JSON with --dump-items', async () => {
      await fs.outputFile(path.join(tempDir, 'one.txt'), '12345');
      await fs.outputFile(path.join(tempDir, 'two.txt'), '1234567890');

      const code = await run(['--dump-items', tempDir]);

      expect(code).toBe(ExitCodes.SUCCESS);
      expect(logSpy).toHaveBeenCalledTimes(1);
      const dump = JSON.parse(logSpy.mock.calls[0][0]);
      expect(dump).toHaveLength(3);
      for (const entry of dump) {
        expect(Object.keys(entry).sort()).toEqual(['fileCount', 'isDirectory', 'path', 'size']);
      }
      const root = await fs.realpath(tempDir);
      expect(dump[0].path).toBe(root);
      expect(dump[0].fileCount).toBe(2);
      expect(dump[1]).toEqual({
        path: path.join(root, 'one.txt'),
        size: 5,
        isDirectory: false,
        fileCount: 0,
      });
    });

    it('should print a JSON report', async () => {
      await fs.outputFile(path.join(tempDir, 'nested', 'file.bin'), 'abc');

      await expect(run(['--output-format', 'json', '--top', '1', tempDir])).resolves.toBe(
        ExitCodes.SUCCESS,
      );

      const report = JSON.parse(logSpy.mock.calls[0][0]);
      expect(report.totalItems).toBe(3);
      expect(report.totalFiles).toBe(1);
      expect(report.totalDirs).toBe(2);
      expect(report.topDirsBySize).toHaveLength(1);
      expect(report.topDirsBySize[0].path).toBe(await fs.realpath(tempDir));
      expect(report.totalSize).toBe(report.topDirsBySize[0].size);
    });

    it('should scan the target of a symlinked root directory', async () => {
      const real = path.join(tempDir, 'real');
      const link = path.join(tempDir, 'link');
      await fs.outputFile(path.join(real, 'a'), 'x'.repeat(100));
      await fs.symlink(real, link);

      await expect(run(['--dump-items', link])).resolves.toBe(ExitCodes.SUCCESS);

      const realRoot = await fs.realpath(real);
      const dump = JSON.parse(logSpy.mock.calls[0][0]);
      expect(dump).toHaveLength(2);
      expect(dump[0].path).toBe(realRoot);
      expect(dump[0].isDirectory).toBe(true);
      expect(dump[0].fileCount).toBe(1);
      expect(dump[1]).toEqual({
        path: path.join(realRoot, 'a'),
        size: 100,
        isDirectory: false,
        fileCount: 0,
      });
    });

    it('should exit with the usage code for a missing directory', async () => {
      const missing = path.join(tempDir, 'nope');

      await expect(run([missing])).resolves.toBe(ExitCodes.USAGE);
      expect(errorSpy).toHaveBeenCalledWith(`❌ Not a directory: ${missing}`);
      expect(logSpy).not.toHaveBeenCalled();
    });

    it('should exit with the usage code for an invalid output format', async () => {
      await expect(run(['--output-format', 'yaml', tempDir])).resolves.toBe(ExitCodes.USAGE);
      expect(errorSpy).toHaveBeenCalledWith(
        '❌ Invalid --output-format value: yaml. Valid choices: text, json',
      );
    });
  });

  describe('generateOutput', () => {
    const config = {
      directory: '/scan',
      top: 20,
      outputFormat: 'text' as const,
      dumpItems: false,
    };

    it('should report siblings of an unreadable directory', async () => {
      const fileSystem = new MemoryFileSystem('/scan', {
        blocked: { inner: 999 },
        sibling: 42,
      });
      fileSystem.failReaddir.add('/scan/blocked');

      const output = await generateOutput(config, new TreeScanner(fileSystem));

      expect(output.split('\n')).toContain('  42 B  /scan/sibling');
      expect(output).not.toContain('/scan/blocked/inner');
      expect(errorSpy).toHaveBeenCalledWith(
        "⚠️ Skipping /scan/blocked: Cannot read directory: EACCES: permission denied, scandir '/scan/blocked'",
      );
      expect(errorSpy).toHaveBeenCalledWith('⚠️ Skipped 1 unreadable entry');
    });

    it('should fail with an empty result set when the root cannot be read', async () => {
      const fileSystem = new MemoryFileSystem('/scan', {});
      fileSystem.failLstat.add('/scan');

      await expect(generateOutput(config, new TreeScanner(fileSystem))).rejects.toThrow(
        'Cannot compute total size: empty result set',
      );
    });

    it('should dump an empty array when the root cannot be read', async () => {
      const fileSystem = new MemoryFileSystem('/scan', {});
      fileSystem.failLstat.add('/scan');

      const output = await generateOutput(
        { ...config, dumpItems: true },
        new TreeScanner(fileSystem),
      );

      expect(JSON.parse(output)).toEqual([]);
    });
  });
});
