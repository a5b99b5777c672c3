import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile, mkdir } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SummaryOutputWriter } from '../../src/services/summarization/output-writer.js';
import { ErrorCodes, OutputError } from '../../src/core/errors.js';

describe('Summary Output Writer', () => {
  let dir: string;
  let outputPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'summary-writer-'));
    outputPath = join(dir, 'summary.txt');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should separate paragraphs with a blank line', async () => {
    const writer = await SummaryOutputWriter.open(outputPath);
    await writer.write('First paragraph.');
    await writer.write('Second paragraph.');
    await writer.close();

    expect(await readFile(outputPath, 'utf8')).toBe('First paragraph.\n\nSecond paragraph.\n\n');
    expect(writer.paragraphsWritten).toBe(2);
  });

  it('should make each paragraph readable before the writer is closed', async () => {
    const writer = await SummaryOutputWriter.open(outputPath);
    await writer.write('Durable.');

    expect(await readFile(outputPath, 'utf8')).toBe('Durable.\n\n');
    await writer.close();
  });

  it('should replace the content of a previous run', async () => {
    await writeFile(outputPath, 'Old run content.\n\n');

    const writer = await SummaryOutputWriter.open(outputPath);
    await writer.writeAll(['New one.', 'New two.']);
    await writer.close();

    expect(await readFile(outputPath, 'utf8')).toBe('New one.\n\nNew two.\n\n');
  });

  it('should create an empty file when nothing is written', async () => {
    const writer = await SummaryOutputWriter.open(outputPath);
    await writer.close();

    expect(await readFile(outputPath, 'utf8')).toBe('');
  });

  it('should fail to open when the existing output cannot be removed', async () => {
    const blocked = join(dir, 'blocked');
    await mkdir(blocked);
    await writeFile(join(blocked, 'inner.txt'), 'x');

    const error = await SummaryOutputWriter.open(blocked).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(OutputError);
    expect(error).toMatchObject({ code: ErrorCodes.OUTPUT_REMOVE_FAILED, outputPath: blocked });
  });

  it('should reject writes after close', async () => {
    const writer = await SummaryOutputWriter.open(outputPath);
    await writer.close();
    await writer.close();

    await expect(writer.write('late')).rejects.toThrow(`Writer is closed: ${outputPath}`);
    expect(writer.isOpen).toBe(false);
  });
});
