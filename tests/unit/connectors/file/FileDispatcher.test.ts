import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { FileDispatcher } from '../../../../src/connectors/file/FileDispatcher.js';
import type { FileDispatcherConfig } from '../../../../src/connectors/file/FileDispatcher.js';
import { SplitStrategy } from '../../../../src/datatypes/acars/AcarsProperties.js';
import { WriteError } from '../../../../src/util/errors.js';

describe('FileDispatcher', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'acars-dispatcher-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  function createDispatcher(overrides: FileDispatcherConfig = {}): FileDispatcher {
    return new FileDispatcher({
      ...overrides,
      properties: { directory: tmpDir, ...overrides.properties },
    });
  }

  describe('constructor', () => {
    it('should create with default values', () => {
      const dispatcher = new FileDispatcher();

      expect(dispatcher.getName()).toBe('File Writer');
      expect(dispatcher.getTransportName()).toBe('File');
      expect(dispatcher.getProperties().directory).toBe('acars_split');
    });

    it('should update properties', () => {
      const dispatcher = createDispatcher();

      dispatcher.setProperties({ splitBy: SplitStrategy.TAIL });

      expect(dispatcher.getOutputPath('PT-ZNG')).toBe(path.join(tmpDir, 'acars_tail_PT-ZNG.txt'));
    });
  });

  describe('start', () => {
    it('should create the output directory recursively', async () => {
      const directory = path.join(tmpDir, 'out', 'nested');
      const dispatcher = createDispatcher({ properties: { directory } });

      await dispatcher.start();

      expect((await fs.stat(directory)).isDirectory()).toBe(true);
      expect(dispatcher.isRunning()).toBe(true);
    });

    it('should accept an existing directory', async () => {
      const dispatcher = createDispatcher();

      await expect(dispatcher.start()).resolves.toBeUndefined();
    });

    it('should raise WriteError when the directory cannot be created', async () => {
      const blocker = path.join(tmpDir, 'blocker');
      await fs.writeFile(blocker, 'not a directory');
      const dispatcher = createDispatcher({ properties: { directory: path.join(blocker, 'out') } });

      await expect(dispatcher.start()).rejects.toBeInstanceOf(WriteError);
    });
  });

  describe('send', () => {
    it('should create a bucket on first write without a separator', async () => {
      const dispatcher = createDispatcher();
      await dispatcher.start();

      const filePath = await dispatcher.send('52', 'first message');

      expect(filePath).toBe(path.join(tmpDir, 'acars_label_52.txt'));
      expect(await fs.readFile(filePath, 'utf-8')).toBe('first message');
    });

    it('should separate appended messages with one blank line', async () => {
      const dispatcher = createDispatcher();
      await dispatcher.start();

      await dispatcher.send('52', 'first message');
      const filePath = await dispatcher.send('52', 'second message');

      expect(await fs.readFile(filePath, 'utf-8')).toBe('first message\n\nsecond message');
    });

    it('should append to a file left by an earlier run', async () => {
      const filePath = path.join(tmpDir, 'acars_label_H1.txt');
      await fs.writeFile(filePath, 'earlier run');
      const dispatcher = createDispatcher();

      await dispatcher.send('H1', 'this run');

      expect(await fs.readFile(filePath, 'utf-8')).toBe('earlier run\n\nthis run');
    });

    it('should not lead with a separator in an existing empty file', async () => {
      const filePath = path.join(tmpDir, 'acars_label_H1.txt');
      await fs.writeFile(filePath, '');
      const dispatcher = createDispatcher();

      await dispatcher.send('H1', 'only message');

      expect(await fs.readFile(filePath, 'utf-8')).toBe('only message');
    });

    it('should separate concurrent writes to one bucket', async () => {
      const filePath = path.join(tmpDir, 'acars_label_52.txt');
      await fs.writeFile(filePath, '');
      const dispatcher = createDispatcher();

      await Promise.all([
        dispatcher.send('52', 'from port 5551'),
        dispatcher.send('52', 'from port 5552'),
        dispatcher.send('52', 'from port 5553'),
      ]);

      expect(await fs.readFile(filePath, 'utf-8')).toBe(
        'from port 5551\n\nfrom port 5552\n\nfrom port 5553'
      );
    });

    it('should let concurrent writes to different buckets proceed', async () => {
      const dispatcher = createDispatcher();

      const [label52, labelH1] = await Promise.all([
        dispatcher.send('52', 'position'),
        dispatcher.send('H1', 'connect'),
      ]);

      expect(await fs.readFile(label52, 'utf-8')).toBe('position');
      expect(await fs.readFile(labelH1, 'utf-8')).toBe('connect');
    });

    it('should write unclassified messages to the fallback bucket', async () => {
      const dispatcher = createDispatcher();

      const filePath = await dispatcher.send(null, 'mystery');

      expect(filePath).toBe(path.join(tmpDir, 'acars_unclassified.txt'));
      expect(await fs.readFile(filePath, 'utf-8')).toBe('mystery');
    });

    it('should overwrite when append is off', async () => {
      const dispatcher = createDispatcher({ properties: { outputAppend: false } });

      await dispatcher.send('52', 'first message');
      const filePath = await dispatcher.send('52', 'second message');

      expect(await fs.readFile(filePath, 'utf-8')).toBe('second message');
    });

    it('should raise WriteError naming the bucket', async () => {
      const directory = path.join(tmpDir, 'missing');
      const dispatcher = createDispatcher({ properties: { directory } });
      const expectedPath = path.join(directory, 'acars_label_52.txt');

      const error = await dispatcher.send('52', 'lost').catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(WriteError);
      expect(error instanceof WriteError && error.filePath).toBe(expectedPath);
      expect(error instanceof Error && error.message.startsWith(`Failed to write ${expectedPath}: `)).toBe(true);
    });
  });

  describe('writeBatch', () => {
    it('should replace the bucket with the joined messages', async () => {
      const dispatcher = createDispatcher({ properties: { splitBy: SplitStrategy.TYPE } });
      const filePath = path.join(tmpDir, 'acars_type_CPDLC.txt');
      await fs.writeFile(filePath, 'stale');

      const written = await dispatcher.writeBatch('CPDLC', ['one', 'two', 'three']);

      expect(written).toBe(filePath);
      expect(await fs.readFile(filePath, 'utf-8')).toBe('one\n\ntwo\n\nthree');
    });
  });
});
