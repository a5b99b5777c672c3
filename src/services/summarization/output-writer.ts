/**
 * Output Writer
 *
 * Appends summary paragraphs to the output file, one blank line apart, and
 * flushes each write to disk before it resolves. Opening a writer removes
 * whatever a previous run left at the path.
 */

import { open, rm, type FileHandle } from 'node:fs/promises';
import { ErrorCodes, OutputError } from '../../core/errors.js';
import { createComponentLogger } from '../../utils/logger.js';

const logger = createComponentLogger('output-writer');

export const PARAGRAPH_SEPARATOR = '\n\n';

export class SummaryOutputWriter {
  private handle: FileHandle | null;
  private written = 0;

  private constructor(
    readonly outputPath: string,
    handle: FileHandle
  ) {
    this.handle = handle;
  }

  /**
   * Remove any existing file at `outputPath` and open it for appending
   */
  static async open(outputPath: string): Promise<SummaryOutputWriter> {
    try {
      await rm(outputPath, { force: true });
    } catch (error) {
      throw new OutputError(
        outputPath,
        `Could not remove existing output (${error instanceof Error ? error.message : String(error)})`,
        ErrorCodes.OUTPUT_REMOVE_FAILED
      );
    }

    try {
      const handle = await open(outputPath, 'a');
      logger.debug({ outputPath }, 'Output file opened');
      return new SummaryOutputWriter(outputPath, handle);
    } catch (error) {
      throw new OutputError(
        outputPath,
        `Could not open output (${error instanceof Error ? error.message : String(error)})`
      );
    }
  }

  /** Paragraphs written so far */
  get paragraphsWritten(): number {
    return this.written;
  }

  get isOpen(): boolean {
    return this.handle !== null;
  }

  async write(paragraph: string): Promise<void> {
    const handle = this.handle;
    if (!handle) {
      throw new OutputError(this.outputPath, 'Writer is closed');
    }

    try {
      await handle.appendFile(paragraph + PARAGRAPH_SEPARATOR, 'utf8');
      await handle.sync();
    } catch (error) {
      throw new OutputError(
        this.outputPath,
        `Could not write paragraph (${error instanceof Error ? error.message : String(error)})`
      );
    }

    this.written++;
  }

  async writeAll(paragraphs: readonly string[]): Promise<void> {
    for (const paragraph of paragraphs) {
      await this.write(paragraph);
    }
  }

  /**
   * Release the file handle. Safe to call more than once.
   */
  async close(): Promise<void> {
    const handle = this.handle;
    if (!handle) return;

    this.handle = null;
    await handle.close();
    logger.debug({ outputPath: this.outputPath, paragraphs: this.written }, 'Output file closed');
  }
}
