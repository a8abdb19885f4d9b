import { z } from 'zod';
import { ValidationError } from '@/types/pipeline-errors';

export const pipelineConfigSchema = z
  .object({
    /** OCR confidence (0..1) below which a region is skipped. */
    minOcrConfidence: z.number().min(0).max(1).default(0.4),
    /** Page workers per document; required. */
    maxPageConcurrency: z.number().int().positive(),
    translationTimeoutMs: z.number().int().positive().default(30_000),
    minFontSize: z.number().int().positive().default(10),
    maxFontSize: z.number().int().positive().default(48),
    /** OCR and translation calls in flight per page. */
    regionConcurrency: z.number().int().positive().default(4),
    /** Reject submissions whose source and target language match instead of warning. */
    strictLanguagePair: z.boolean().default(false),
    maxSourceBytes: z.number().int().positive().default(50 * 1024 * 1024),
    eraseMode: z.enum(['fill', 'inpaint']).default('fill'),
    /** PDF rasterisation scale; 2 renders a 72 dpi page at 144 dpi. */
    pdfRenderScale: z.number().positive().max(8).default(2),
  })
  .refine((config) => config.maxFontSize >= config.minFontSize, {
    message: 'maxFontSize must not be smaller than minFontSize',
    path: ['maxFontSize'],
  });

export type PipelineConfig = z.output<typeof pipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>;
export type PipelineConfigOverrides = Partial<PipelineConfigInput>;

export function parsePipelineConfig(input: unknown): PipelineConfig {
  const parsed = pipelineConfigSchema.safeParse(input);
  if (!parsed.success) {
    const invalid = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join(', ');
    throw new ValidationError(`Invalid pipeline configuration: ${invalid}`, 'INVALID_CONFIG');
  }
  return parsed.data;
}

/** Per-submission overrides on top of the service configuration; undefined keys keep the base value. */
export function mergePipelineConfig(
  base: PipelineConfig,
  overrides: PipelineConfigOverrides = {}
): PipelineConfig {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  return parsePipelineConfig({ ...base, ...defined });
}

const ENV_KEYS = {
  minOcrConfidence: 'PANEL_MIN_OCR_CONFIDENCE',
  maxPageConcurrency: 'PANEL_MAX_PAGE_CONCURRENCY',
  translationTimeoutMs: 'PANEL_TRANSLATION_TIMEOUT_MS',
  minFontSize: 'PANEL_MIN_FONT_SIZE',
  maxFontSize: 'PANEL_MAX_FONT_SIZE',
  regionConcurrency: 'PANEL_REGION_CONCURRENCY',
  strictLanguagePair: 'PANEL_STRICT_LANGUAGE_PAIR',
  maxSourceBytes: 'PANEL_MAX_SOURCE_BYTES',
  eraseMode: 'PANEL_ERASE_MODE',
  pdfRenderScale: 'PANEL_PDF_RENDER_SCALE',
} as const satisfies Record<keyof PipelineConfigInput, string>;

const BOOLEAN_KEYS = new Set<string>(['strictLanguagePair']);
const STRING_KEYS = new Set<string>(['eraseMode']);

const coerceEnvValue = (key: string, raw: string): unknown => {
  if (STRING_KEYS.has(key)) return raw;
  if (BOOLEAN_KEYS.has(key)) {
    if (/^(1|true|yes)$/i.test(raw)) return true;
    if (/^(0|false|no)$/i.test(raw)) return false;
    return raw;
  }
  return Number(raw);
};

export function loadPipelineConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): PipelineConfig {
  const input: Record<string, unknown> = {};
  for (const [key, variable] of Object.entries(ENV_KEYS)) {
    const raw = env[variable]?.trim();
    if (raw) {
      input[key] = coerceEnvValue(key, raw);
    }
  }
  return parsePipelineConfig(input);
}
