import { readFile } from 'node:fs/promises';
import { ok, err, type Result } from 'neverthrow';
import { z } from 'zod';
import { LoaderError } from '../types/provider.js';

/**
 * A paper section as extracted from the PDF. Extraction tools disagree on
 * key casing, so both `text`/`Text` and `entities`/`Entities` are accepted.
 */
const paperSectionSchema = z
  .object({
    text: z.string().optional(),
    Text: z.string().optional(),
    entities: z.record(z.string(), z.unknown()).optional(),
    Entities: z.record(z.string(), z.unknown()).optional(),
  })
  .passthrough();

export const paperDocumentSchema = z.object({
  file_path: z.string(),
  file_size_human: z.string(),
  page_count: z.number().int().nonnegative(),
  metadata: z
    .object({
      author: z.string().default(''),
      creator: z.string().default(''),
      title: z.string().optional(),
    })
    .passthrough(),
  Sections: z
    .object({
      Abstract: paperSectionSchema,
      Introduction: paperSectionSchema,
      Methodology: paperSectionSchema.optional(),
      Results: paperSectionSchema.optional(),
      Conclusion: paperSectionSchema.optional(),
    })
    .passthrough(),
});

export type PaperDocument = z.infer<typeof paperDocumentSchema>;
export type PaperSection = z.infer<typeof paperSectionSchema>;

export function sectionText(section: PaperSection | undefined): string {
  return section?.text ?? section?.Text ?? '';
}

export function sectionEntities(section: PaperSection | undefined): Record<string, unknown> {
  return section?.entities ?? section?.Entities ?? {};
}

/**
 * Normalize an entity value to a list of trimmed, non-empty names.
 * Values arrive either as arrays or as one comma-separated string.
 */
export function entityList(value: unknown): string[] {
  const raw: unknown[] = typeof value === 'string' ? value.split(',') : Array.isArray(value) ? value : [];
  return raw
    .filter((item): item is string | number => typeof item === 'string' || typeof item === 'number')
    .map((item) => String(item).trim())
    .filter((item) => item.length > 0);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'root'}: ${issue.message}`)
    .join('; ');
}

export function parsePaperDocument(data: unknown): Result<PaperDocument, LoaderError> {
  const parsed = paperDocumentSchema.safeParse(data);
  if (!parsed.success) {
    return err(new LoaderError(`Invalid paper document: ${formatIssues(parsed.error)}`));
  }
  return ok(parsed.data);
}

export async function readPaperDocument(filePath: string): Promise<Result<PaperDocument, LoaderError>> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch {
    return err(new LoaderError(`Paper document not found: ${filePath}`));
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    return err(new LoaderError(`Invalid JSON in ${filePath}: ${message}`));
  }

  return parsePaperDocument(data);
}
