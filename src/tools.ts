import { z } from 'zod';
import { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import { extract, ExtractOptions } from './extractor.js';
import { ALL_FAMILIES, FAMILY_DEFINITIONS } from './types.js';

export const ExtractArgsSchema = z.object({
  input_path: z.string().min(1, 'input_path is required'),
  output_dir: z.string().min(1).optional(),
  types: z.array(z.enum(ALL_FAMILIES)).optional()
});

export type ExtractArgs = z.infer<typeof ExtractArgsSchema>;

export const TOOLS: Tool[] = [
  {
    name: 'health_export_extract',
    description: 'Extract health records, workouts and daily activity summaries from a Health export.xml into CSV files',
    inputSchema: {
      type: 'object',
      properties: {
        input_path: {
          type: 'string',
          description: 'Path to export.xml, or to the unzipped export directory containing it'
        },
        output_dir: {
          type: 'string',
          description: 'Directory for the CSV files (default: HEALTH_EXPORT_OUTPUT_DIR or the working directory)'
        },
        types: {
          type: 'array',
          items: { type: 'string', enum: [...ALL_FAMILIES] },
          description: 'Families to extract (default: all). Files of other families are left untouched.'
        }
      },
      required: ['input_path']
    }
  },
  {
    name: 'health_export_schema',
    description: 'List the extractable families with their output file names and column order',
    inputSchema: {
      type: 'object',
      properties: {}
    }
  }
];

export async function runExtractTool(args: unknown, options: ExtractOptions = {}): Promise<CallToolResult> {
  const { input_path, output_dir, types } = ExtractArgsSchema.parse(args ?? {});
  const summary = await extract(input_path, output_dir, types, options);

  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify(summary, null, 2)
      }
    ]
  };
}

export function describeSchema(): CallToolResult {
  const families = ALL_FAMILIES.map(family => {
    const { tag, fileName, columns } = FAMILY_DEFINITIONS[family];
    return { family, sourceElement: tag, fileName, columns };
  });

  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify({ families }, null, 2)
      }
    ]
  };
}
