import { existsSync } from 'fs';
import { mkdir, stat } from 'fs/promises';
import { join, relative, sep } from 'path';
import { glob } from 'glob';
import { formatDuration, intervalToDuration } from 'date-fns';
import { classifyEntry, familyForTag } from './classifier.js';
import { resolveConfig, resolveFamilies } from './config.js';
import {
  DestinationWriteError,
  InputNotFoundError,
  SchemaMismatchError
} from './errors.js';
import { FamilyWriter, WriterHandle } from './family-writer.js';
import { readEntries, StreamReaderOptions } from './stream-reader.js';
import {
  ClassifiedEntry,
  ExtractionSummary,
  ExtractorConfig,
  Family,
  FAMILY_DEFINITIONS,
  RawEntry
} from './types.js';

type WriterSet = { [F in Family]?: FamilyWriter<F> };

/** Everything that changes during one run. Owned by a single `extract` call. */
interface RunState {
  writers: WriterSet;
  opened: WriterHandle[];
  counts: Partial<Record<Family, number>>;
  skippedByFamily: Partial<Record<Family, number>>;
  skipped: number;
  unrecognized: number;
}

export interface ExtractOptions extends Partial<ExtractorConfig> {
  reader?: StreamReaderOptions;
}

export class HealthExportExtractor {
  private config: ExtractorConfig;
  private readerOptions: StreamReaderOptions;

  constructor(options: ExtractOptions = {}) {
    const { reader, ...config } = options;
    this.config = resolveConfig(config);
    this.readerOptions = reader ?? {};
  }

  get outputDirectory(): string {
    return this.config.outputDirectory;
  }

  /**
   * Stream the export once and write one CSV per requested family.
   *
   * Fatal errors (unreadable export, unwritable destination) abort every
   * opened writer before propagating; files of families that were not
   * requested are never touched.
   */
  async extract(inputPath: string, families?: readonly string[]): Promise<ExtractionSummary> {
    const startedAt = Date.now();
    const requested = resolveFamilies(families);
    const exportPath = await resolveExportPath(inputPath);
    const { logger, outputDirectory } = this.config;

    try {
      await mkdir(outputDirectory, { recursive: true });
    } catch (error) {
      throw new DestinationWriteError(outputDirectory, error);
    }

    const run: RunState = {
      writers: {},
      opened: [],
      counts: {},
      skippedByFamily: {},
      skipped: 0,
      unrecognized: 0
    };

    logger.info(`Extracting ${requested.map(family => FAMILY_DEFINITIONS[family].label).join(', ')} from ${exportPath}...`);

    const filesWritten: string[] = [];
    try {
      for (const family of requested) {
        await this.openWriter(family, run);
      }

      for await (const entry of readEntries(exportPath, this.readerOptions)) {
        await this.route(entry, run);
      }

      for (const writer of run.opened) {
        const destination = await writer.close();
        filesWritten.push(destination);
        logger.info(`  Saved ${formatCount(writer.rowCount)} ${writer.label} to ${destination}`);
      }
    } catch (error) {
      await this.abortAll(run);
      const reason = error instanceof Error ? error.message : String(error);
      logger.warn(`Extraction failed, partial output discarded: ${reason}`);
      throw error;
    }

    const durationMs = Date.now() - startedAt;
    const total = Object.values(run.counts).reduce<number>((sum, count) => sum + (count ?? 0), 0);
    logger.info(
      `Done! Extracted ${formatCount(total)} total rows, skipped ${formatCount(run.skipped)} ` +
      `in ${formatDuration(intervalToDuration({ start: 0, end: durationMs })) || '0 seconds'}.`
    );

    return {
      perFamilyCounts: run.counts,
      skippedCount: run.skipped,
      skippedByFamily: run.skippedByFamily,
      unrecognizedCount: run.unrecognized,
      filesWritten,
      durationMs
    };
  }

  private async openWriter(family: Family, run: RunState): Promise<void> {
    const writer = this.createWriter(family, run.writers);
    await writer.open(join(this.config.outputDirectory, writer.fileName));
    run.opened.push(writer);
    run.counts[family] = 0;
    run.skippedByFamily[family] = 0;
  }

  private createWriter(family: Family, writers: WriterSet): WriterHandle {
    const { flushThreshold } = this.config;
    switch (family) {
      case 'records':
        return (writers.records = new FamilyWriter(FAMILY_DEFINITIONS.records, flushThreshold));
      case 'workouts':
        return (writers.workouts = new FamilyWriter(FAMILY_DEFINITIONS.workouts, flushThreshold));
      case 'activity':
        return (writers.activity = new FamilyWriter(FAMILY_DEFINITIONS.activity, flushThreshold));
    }
  }

  private async route(entry: RawEntry, run: RunState): Promise<void> {
    const family = familyForTag(entry.tag);

    if (family === null) {
      run.unrecognized += 1;
      // Containers such as Correlation nest member records.
      for (const child of entry.children) {
        if (familyForTag(child.tag) !== null) {
          await this.route(child, run);
        }
      }
      return;
    }

    if (!run.writers[family]) {
      return;
    }

    let classified: ClassifiedEntry;
    try {
      classified = classifyEntry(entry);
    } catch (error) {
      if (error instanceof SchemaMismatchError) {
        this.recordSkip(family, error, run);
        return;
      }
      throw error;
    }

    await this.dispatch(classified, run);
  }

  private async dispatch(classified: ClassifiedEntry, run: RunState): Promise<void> {
    if (classified.family === null) {
      return;
    }

    switch (classified.family) {
      case 'records':
        await run.writers.records?.write(classified.row);
        break;
      case 'workouts':
        await run.writers.workouts?.write(classified.row);
        break;
      case 'activity':
        await run.writers.activity?.write(classified.row);
        break;
    }

    const family = classified.family;
    const count = (run.counts[family] ?? 0) + 1;
    run.counts[family] = count;

    if (count % this.config.progressIntervals[family] === 0) {
      this.config.logger.info(`  Processed ${formatCount(count)} ${FAMILY_DEFINITIONS[family].label}...`);
    }
  }

  private recordSkip(family: Family, error: SchemaMismatchError, run: RunState): void {
    run.skipped += 1;
    run.skippedByFamily[family] = (run.skippedByFamily[family] ?? 0) + 1;

    const { logger, maxSkipWarnings } = this.config;
    if (run.skipped <= maxSkipWarnings) {
      logger.warn(error.message);
    }
    if (run.skipped === maxSkipWarnings + 1) {
      logger.warn('Further skipped entries are counted but not logged');
    }
  }

  private async abortAll(run: RunState): Promise<void> {
    for (const writer of run.opened) {
      try {
        await writer.abort();
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        this.config.logger.warn(`Could not discard partial ${writer.fileName}: ${reason}`);
      }
    }
  }
}

/**
 * Extract `families` (default: all) from the export at `inputPath` into
 * `outputDir` (default: the configured output directory).
 */
export async function extract(
  inputPath: string,
  outputDir?: string,
  families?: readonly string[],
  options: ExtractOptions = {}
): Promise<ExtractionSummary> {
  const extractor = new HealthExportExtractor(
    outputDir ? { ...options, outputDirectory: outputDir } : options
  );
  return extractor.extract(inputPath, families);
}

/**
 * Accept either the export file itself or the unzipped export directory,
 * in which `export.xml` is searched for.
 */
export async function resolveExportPath(inputPath: string): Promise<string> {
  if (!existsSync(inputPath)) {
    throw new InputNotFoundError(inputPath);
  }
  if (!(await stat(inputPath)).isDirectory()) {
    return inputPath;
  }

  const matches = await glob('**/export.xml', { cwd: inputPath, absolute: true, nodir: true });
  if (matches.length === 0) {
    throw new InputNotFoundError(join(inputPath, 'export.xml'));
  }
  // Shallowest match wins; ties break alphabetically.
  const depthOf = (match: string): number => relative(inputPath, match).split(sep).length;
  return matches.sort((a, b) => depthOf(a) - depthOf(b) || a.localeCompare(b))[0];
}

function formatCount(count: number): string {
  return count.toLocaleString('en-US');
}
