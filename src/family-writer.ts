import { open, rename, rm, FileHandle } from 'fs/promises';
import { unparse } from 'papaparse';
import { DestinationWriteError } from './errors.js';
import { Family, FamilyDefinition, FamilyRows } from './types.js';

type WriterState = 'idle' | 'open' | 'closed' | 'aborted';

/** The family-independent face of a writer, used to commit or discard it. */
export interface WriterHandle {
  readonly fileName: string;
  readonly label: string;
  readonly rowCount: number;
  open(destination: string): Promise<void>;
  close(): Promise<string>;
  abort(): Promise<void>;
}

/**
 * Streams the rows of one family to a CSV file with a fixed column order.
 *
 * Rows go to `<destination>.partial`; `close()` commits it onto the
 * destination and `abort()` deletes it, so a failed run never leaves a
 * truncated file under the final name.
 */
export class FamilyWriter<F extends Family> implements WriterHandle {
  private handle: FileHandle | null = null;
  private destination: string | null = null;
  private buffer = '';
  private state: WriterState = 'idle';
  private rows = 0;

  constructor(
    readonly definition: FamilyDefinition<F>,
    private readonly flushThreshold: number = 64 * 1024
  ) {}

  get fileName(): string {
    return this.definition.fileName;
  }

  get label(): string {
    return this.definition.label;
  }

  get rowCount(): number {
    return this.rows;
  }

  get partialPath(): string | null {
    return this.destination ? `${this.destination}.partial` : null;
  }

  async open(destination: string): Promise<void> {
    if (this.state !== 'idle') {
      throw new DestinationWriteError(destination, new Error(`writer already ${this.state}`));
    }

    const partial = `${destination}.partial`;
    try {
      this.handle = await open(partial, 'w');
    } catch (error) {
      throw new DestinationWriteError(partial, error);
    }

    this.destination = destination;
    this.state = 'open';
    this.buffer = formatLine(this.definition.columns);
  }

  async write(row: FamilyRows[F]): Promise<void> {
    if (this.state !== 'open') {
      throw new DestinationWriteError(this.destination ?? this.definition.fileName, new Error('writer is not open'));
    }

    this.buffer += formatLine(this.definition.columns.map(column => row[column]));
    this.rows += 1;

    if (this.buffer.length >= this.flushThreshold) {
      await this.flush();
    }
  }

  /**
   * Flush, release the handle and move the finished file into place.
   * Returns the committed destination.
   */
  async close(): Promise<string> {
    const { destination, handle } = this;
    if (!destination || !handle || this.state !== 'open') {
      throw new DestinationWriteError(destination ?? this.definition.fileName, new Error(`writer is ${this.state}`));
    }

    try {
      await this.flush();
    } finally {
      this.handle = null;
      await handle.close();
    }

    try {
      await rename(`${destination}.partial`, destination);
    } catch (error) {
      throw new DestinationWriteError(destination, error);
    }
    this.state = 'closed';
    return destination;
  }

  /**
   * Release the handle and delete the partial file. Safe to call in any
   * state; a committed file is left alone.
   */
  async abort(): Promise<void> {
    if (this.state !== 'open') {
      return;
    }
    this.state = 'aborted';
    this.buffer = '';

    const handle = this.handle;
    this.handle = null;
    try {
      await handle?.close();
    } finally {
      const partial = this.partialPath;
      if (partial) {
        await rm(partial, { force: true });
      }
    }
  }

  private async flush(): Promise<void> {
    if (!this.handle || this.buffer === '') {
      return;
    }
    const chunk = this.buffer;
    this.buffer = '';
    try {
      await this.handle.appendFile(chunk, 'utf8');
    } catch (error) {
      throw new DestinationWriteError(this.partialPath ?? this.definition.fileName, error);
    }
  }
}

/**
 * One CSV line. papaparse quotes a value holding the delimiter, a quote or
 * a line break, and doubles embedded quotes.
 */
export function formatLine(values: readonly unknown[]): string {
  return `${unparse([[...values]], { newline: '\n' })}\n`;
}
