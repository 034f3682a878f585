#!/usr/bin/env node

import { z } from 'zod';
import { extract, ExtractOptions } from './extractor.js';
import { ALL_FAMILIES, ExtractionSummary } from './types.js';

const USAGE = `Usage: health-export-extract <export.xml | export-dir> [--output DIR] [--types TYPE...]

Extract Health export data to CSV files.

Options:
  -o, --output DIR     Output directory for CSV files (default: current directory)
  -t, --types TYPE...  Families to extract: ${ALL_FAMILIES.join(', ')} (default: all)
  -h, --help           Show this message

Examples:
  health-export-extract data/export.xml --output data/
  health-export-extract data/export.xml --output data/ --types records workouts`;

const CliArgsSchema = z.object({
  input: z.string({ required_error: 'Path to the export file is required' }).min(1),
  output: z.string().min(1).optional(),
  types: z.array(z.enum(ALL_FAMILIES)).min(1).optional()
});

export type CliArgs = z.infer<typeof CliArgsSchema>;

/**
 * `--types` takes every following value up to the next flag, so both
 * `-t records workouts` and `-t records,workouts` work.
 */
export function parseCliArgs(argv: readonly string[]): CliArgs | 'help' {
  const raw: { input?: string; output?: string; types?: string[] } = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--help' || arg === '-h') {
      return 'help';
    } else if (arg === '--output' || arg === '-o') {
      raw.output = argv[++i];
    } else if (arg.startsWith('--output=')) {
      raw.output = arg.slice('--output='.length);
    } else if (arg === '--types' || arg === '-t') {
      const types: string[] = raw.types ?? [];
      while (i + 1 < argv.length && !argv[i + 1].startsWith('-')) {
        types.push(...argv[++i].split(',').filter(Boolean));
      }
      raw.types = types;
    } else if (arg.startsWith('-')) {
      throw new Error(`Unknown option: ${arg}`);
    } else if (raw.input === undefined) {
      raw.input = arg;
    } else {
      throw new Error(`Unexpected argument: ${arg}`);
    }
  }

  return CliArgsSchema.parse(raw);
}

export async function runCli(
  argv: readonly string[],
  options: ExtractOptions = {},
  print: (text: string) => void = text => console.log(text)
): Promise<number> {
  let args: CliArgs | 'help';
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    console.error(`Error: ${describeError(error)}\n\n${USAGE}`);
    return 2;
  }

  if (args === 'help') {
    print(USAGE);
    return 0;
  }

  try {
    const summary: ExtractionSummary = await extract(args.input, args.output, args.types, options);
    print(JSON.stringify(summary, null, 2));
    return 0;
  } catch (error) {
    console.error(`Error: ${describeError(error)}`);
    return 1;
  }
}

function describeError(error: unknown): string {
  if (error instanceof z.ZodError) {
    return error.issues.map(issue => issue.message).join('; ');
  }
  return error instanceof Error ? error.message : String(error);
}

if (require.main === module) {
  runCli(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    error => {
      console.error(error);
      process.exitCode = 1;
    }
  );
}
