/**
 * Tests for the command-line front end, driven through in-memory streams
 */

import { runCli, VERSION } from '../../src/cli/program';
import { createIO } from '../helpers/streams';

describe('runCli', () => {
  const files = 'Readme.md\nmain.go\nREADME\n';

  // ============================================
  // Ranking output
  // ============================================

  describe('ranking', () => {
    it('should print the input unchanged without a query', async () => {
      const io = createIO(files);

      await expect(runCli([], io)).resolves.toBe(0);
      expect(io.stdout.text).toBe('Readme.md\nmain.go\nREADME\n');
    });

    it('should print candidates ranked by the query', async () => {
      const io = createIO(files);

      await expect(runCli(['readme'], io)).resolves.toBe(0);
      expect(io.stdout.text).toBe('README\nReadme.md\nmain.go\n');
    });

    it('should prefix scores when asked', async () => {
      const io = createIO(files);

      await runCli(['readme', '--scores'], io);
      expect(io.stdout.text).toBe('192\tREADME\n189\tReadme.md\n23\tmain.go\n');
    });

    it('should limit the number of printed lines', async () => {
      const io = createIO(files);

      await runCli(['readme', '--limit', '2'], io);
      expect(io.stdout.text).toBe('README\nReadme.md\n');
    });

    it('should print only the selected line, clamped to the last row', async () => {
      const selected = createIO(files);
      await runCli(['readme', '-s', '1'], selected);
      expect(selected.stdout.text).toBe('Readme.md\n');

      const clamped = createIO(files);
      await runCli(['readme', '--select', '7'], clamped);
      expect(clamped.stdout.text).toBe('main.go\n');
    });

    it('should pass the consecutive rule to the matcher', async () => {
      const io = createIO(' xx xxaa\n');

      await runCli(['abaa', '--scores', '--consecutive-rule', 'adjacent-run'], io);
      expect(io.stdout.text).toBe('26\t xx xxaa\n');
    });

    it('should exit 1 and print nothing when nothing matches', async () => {
      const io = createIO(files);

      await expect(runCli(['xyz'], io)).resolves.toBe(1);
      expect(io.stdout.text).toBe('');
    });
  });

  // ============================================
  // Errors and built-in options
  // ============================================

  describe('errors', () => {
    it('should explain how to provide input when stdin is a terminal', async () => {
      const io = createIO(null);

      await expect(runCli(['readme'], io)).resolves.toBe(2);
      expect(io.stderr.text).toBe(
        'Error: No input provided. Please pipe some input into line-picker.\n' +
          "Use 'line-picker --help' to learn more about how to use the program.\n"
      );
    });

    it('should report empty input the same way', async () => {
      const io = createIO('\n');

      await expect(runCli([], io)).resolves.toBe(2);
      expect(io.stdout.text).toBe('');
    });

    it('should reject an invalid limit', async () => {
      const io = createIO(files);

      await expect(runCli(['--limit', '0'], io)).resolves.toBe(1);
      expect(io.stderr.text).toContain('Limit must be an integer of at least 1.');
      expect(io.stdout.text).toBe('');
    });

    it('should refuse --select together with --limit', async () => {
      const io = createIO(files);

      await expect(runCli(['readme', '-s', '1', '-l', '2'], io)).resolves.toBe(1);
      expect(io.stderr.text).toContain(
        "option '-s, --select <index>' cannot be used with option '-l, --limit <n>'"
      );
      expect(io.stdout.text).toBe('');
    });

    it('should reject an unknown consecutive rule', async () => {
      const io = createIO(files);

      await expect(runCli(['--consecutive-rule', 'nearby'], io)).resolves.toBe(1);
      expect(io.stdout.text).toBe('');
    });

    it('should print the version', async () => {
      const io = createIO(files);

      await expect(runCli(['--version'], io)).resolves.toBe(0);
      expect(io.stdout.text).toBe(`${VERSION}\n`);
    });

    it('should print help', async () => {
      const io = createIO(files);

      await expect(runCli(['-h'], io)).resolves.toBe(0);
      expect(io.stdout.text).toContain('Usage: line-picker [options] [query]');
    });
  });
});
