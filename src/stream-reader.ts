import { createReadStream, existsSync, statSync } from 'fs';
import { TextDecoder } from 'util';
import { SaxesParser } from 'saxes';
import { InputNotFoundError, MalformedInputError } from './errors.js';
import { RawEntry } from './types.js';

export interface StreamReaderOptions {
  /** Bytes read from disk per chunk (default 64 KiB). */
  chunkSize?: number;
}

// Depth 1 is the document root.
const ENTRY_DEPTH = 2;
const SUB_ENTRY_DEPTH = 3;

/**
 * Lazily scan an export and yield the children of its root element in
 * document order, each with its direct sub-entries attached.
 *
 * Only the entries completed by the current chunk are held in memory, so a
 * multi-gigabyte export is read in near-constant space. The sequence cannot
 * be restarted; call again to re-scan.
 */
export async function* readEntries(
  path: string,
  options: StreamReaderOptions = {}
): AsyncGenerator<RawEntry, void, undefined> {
  if (!existsSync(path) || statSync(path).isDirectory()) {
    throw new InputNotFoundError(path);
  }

  const parser = new SaxesParser<{ xmlns?: false; position: boolean; fileName: string }>({ position: true, fileName: path });
  const decoder = new TextDecoder('utf-8', { fatal: true });
  const completed: RawEntry[] = [];

  let depth = 0;
  let entry: RawEntry | null = null;
  let subEntry: RawEntry | null = null;

  parser.on('opentag', tag => {
    depth += 1;
    if (depth === ENTRY_DEPTH) {
      entry = { tag: tag.name, attributes: tag.attributes, text: '', children: [] };
    } else if (depth === SUB_ENTRY_DEPTH && entry) {
      subEntry = { tag: tag.name, attributes: tag.attributes, text: '', children: [] };
      entry.children.push(subEntry);
    }
  });

  const appendText = (text: string): void => {
    if (depth === ENTRY_DEPTH && entry) {
      entry.text += text;
    } else if (depth === SUB_ENTRY_DEPTH && subEntry) {
      subEntry.text += text;
    }
  };

  parser.on('text', appendText);
  parser.on('cdata', appendText);

  parser.on('closetag', () => {
    if (depth === SUB_ENTRY_DEPTH && subEntry) {
      subEntry.text = subEntry.text.trim();
      subEntry = null;
    } else if (depth === ENTRY_DEPTH && entry) {
      entry.text = entry.text.trim();
      completed.push(entry);
      entry = null;
    }
    depth -= 1;
  });

  const feed = (bytes?: Uint8Array): void => {
    try {
      if (bytes) {
        parser.write(decoder.decode(bytes, { stream: true }));
      } else {
        parser.write(decoder.decode());
        parser.close();
      }
    } catch (error) {
      const reason = error instanceof TypeError
        ? 'invalid UTF-8 byte sequence'
        : error instanceof Error ? error.message : String(error);
      throw new MalformedInputError(path, reason, error);
    }
  };

  const stream = createReadStream(path, { highWaterMark: options.chunkSize ?? 64 * 1024 });
  try {
    for await (const chunk of stream) {
      feed(chunk);
      while (completed.length > 0) {
        const next = completed.shift();
        if (next) {
          yield next;
        }
      }
    }
    feed();
    yield* completed.splice(0);
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new InputNotFoundError(path, error);
    }
    throw error;
  } finally {
    stream.destroy();
  }
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'EISDIR');
}
