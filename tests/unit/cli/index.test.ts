import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { CommanderError } from 'commander';
import type { Command } from 'commander';
import { createProgram } from '../../../src/cli/index.js';
import { resolveSplitStrategy } from '../../../src/cli/commands/split.js';
import { SplitStrategy } from '../../../src/datatypes/acars/AcarsProperties.js';
import { MESSAGE_1, MESSAGE_2 } from '../../helpers/fixtures.js';

/**
 * Program that throws instead of exiting and prints nothing.
 */
function createTestProgram(): Command {
  const program = createProgram();
  for (const command of [program, ...program.commands]) {
    command.exitOverride();
    command.configureOutput({ writeOut: () => undefined, writeErr: () => undefined });
  }
  return program;
}

describe('CLI', () => {
  describe('createProgram', () => {
    it('should register the listen and split commands', () => {
      const program = createProgram();

      expect(program.name()).toBe('acars-splitter');
      expect(program.commands.map((command) => command.name())).toEqual(['listen', 'split']);
    });
  });

  describe('resolveSplitStrategy', () => {
    it('should default to label', () => {
      expect(resolveSplitStrategy({ outputDir: 'out' })).toBe(SplitStrategy.LABEL);
      expect(resolveSplitStrategy({ outputDir: 'out', byLabel: true })).toBe(SplitStrategy.LABEL);
    });

    it('should map each flag to its strategy', () => {
      expect(resolveSplitStrategy({ outputDir: 'out', byTail: true })).toBe(SplitStrategy.TAIL);
      expect(resolveSplitStrategy({ outputDir: 'out', byType: true })).toBe(SplitStrategy.TYPE);
      expect(resolveSplitStrategy({ outputDir: 'out', keyword: 'WARN' })).toBe(SplitStrategy.KEYWORD);
    });
  });

  describe('split command', () => {
    let tmpDir: string;

    beforeEach(async () => {
      tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'acars-cli-'));
      jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(async () => {
      jest.restoreAllMocks();
      await fs.rm(tmpDir, { recursive: true, force: true });
    });

    it('should reject more than one strategy flag', async () => {
      const program = createTestProgram();

      const error = await program
        .parseAsync(['node', 'acars-splitter', 'split', 'acars.log', '--by-tail', '--by-type'])
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(CommanderError);
      expect(error instanceof CommanderError && error.code).toBe('commander.conflictingOption');
    });

    it('should split a file into the chosen output directory', async () => {
      const input = path.join(tmpDir, 'acars.log');
      const outputDir = path.join(tmpDir, 'by_tail');
      await fs.writeFile(input, MESSAGE_1 + MESSAGE_2);
      const program = createTestProgram();

      await program.parseAsync(['node', 'acars-splitter', 'split', input, '-t', '-o', outputDir]);

      expect(await fs.readFile(path.join(outputDir, 'acars_tail_PT-ZNG.txt'), 'utf-8')).toBe(MESSAGE_1.trim());
      expect(await fs.readFile(path.join(outputDir, 'acars_tail_TEST01.txt'), 'utf-8')).toBe(MESSAGE_2.trim());
    });

    it('should split by keyword', async () => {
      const input = path.join(tmpDir, 'acars.log');
      const outputDir = path.join(tmpDir, 'keyword');
      await fs.writeFile(input, MESSAGE_1 + MESSAGE_2);
      const program = createTestProgram();

      await program.parseAsync(['node', 'acars-splitter', 'split', input, '--keyword', 'cpdlc', '-o', outputDir]);

      expect(await fs.readFile(path.join(outputDir, 'acars_containing_cpdlc.txt'), 'utf-8')).toBe(
        MESSAGE_2.trim()
      );
      expect(await fs.readFile(path.join(outputDir, 'acars_not_containing_cpdlc.txt'), 'utf-8')).toBe(
        MESSAGE_1.trim()
      );
    });
  });
});
