/**
 * Request and rendering option validation
 * Pure functions: no engine state is touched here.
 */
import { ValidationError } from '../errors';
import { PAPER_FORMATS, PaperFormat, PageMargin, RenderOptions, RenderRequest } from '../types';

export const MIN_SCALE = 0.1;
export const MAX_SCALE = 2.0;

export const DEFAULT_RENDER_OPTIONS: RenderOptions = Object.freeze<RenderOptions>({
  format: 'A4',
  landscape: false,
  printBackground: true,
  margin: Object.freeze({}),
  fitContent: false,
});

export type NormalizeResult<T> = { valid: true; value: T } | { valid: false; error: ValidationError };

function fail(field: string, constraint: string): { valid: false; error: ValidationError } {
  return { valid: false, error: new ValidationError(field, constraint) };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** `null` on the wire means the same as omitted */
function present(value: unknown): boolean {
  return value !== undefined && value !== null;
}

const FORMAT_LOOKUP = new Map<string, PaperFormat>(PAPER_FORMATS.map(format => [format.toLowerCase(), format]));

function readBoolean(
  raw: Record<string, unknown>,
  field: string,
  defaultValue: boolean
): { ok: true; value: boolean } | { ok: false } {
  const value = raw[field];
  if (!present(value)) return { ok: true, value: defaultValue };
  if (typeof value !== 'boolean') return { ok: false };
  return { ok: true, value };
}

const MARGIN_FIELDS: ReadonlyArray<[string, keyof PageMargin]> = [
  ['margin_top', 'top'],
  ['margin_bottom', 'bottom'],
  ['margin_left', 'left'],
  ['margin_right', 'right'],
];

/**
 * Fill defaults and validate rendering options.
 * Margin strings are passed through verbatim; the engine validates units.
 */
export function normalizeOptions(raw: unknown): NormalizeResult<RenderOptions> {
  if (!present(raw)) {
    return { valid: true, value: DEFAULT_RENDER_OPTIONS };
  }
  if (!isPlainObject(raw)) {
    return fail('options', 'must be an object');
  }

  let format: PaperFormat = DEFAULT_RENDER_OPTIONS.format;
  if (present(raw.format)) {
    if (typeof raw.format !== 'string') {
      return fail('format', 'must be a string');
    }
    const known = FORMAT_LOOKUP.get(raw.format.trim().toLowerCase());
    if (!known) {
      return fail('format', `must be one of ${PAPER_FORMATS.join(', ')}`);
    }
    format = known;
  }

  const landscape = readBoolean(raw, 'landscape', DEFAULT_RENDER_OPTIONS.landscape);
  if (!landscape.ok) return fail('landscape', 'must be a boolean');

  const printBackground = readBoolean(raw, 'print_background', DEFAULT_RENDER_OPTIONS.printBackground);
  if (!printBackground.ok) return fail('print_background', 'must be a boolean');

  const fitContent = readBoolean(raw, 'fit_content', DEFAULT_RENDER_OPTIONS.fitContent);
  if (!fitContent.ok) return fail('fit_content', 'must be a boolean');

  const margin: PageMargin = {};
  for (const [field, side] of MARGIN_FIELDS) {
    const value = raw[field];
    if (!present(value)) continue;
    if (typeof value !== 'string') {
      return fail(field, 'must be a length string such as "1cm"');
    }
    margin[side] = value;
  }

  let scale: number | undefined;
  if (present(raw.scale)) {
    if (typeof raw.scale !== 'number' || !Number.isFinite(raw.scale)) {
      return fail('scale', 'must be a number');
    }
    if (raw.scale < MIN_SCALE || raw.scale > MAX_SCALE) {
      return fail('scale', `must be between ${MIN_SCALE} and ${MAX_SCALE.toFixed(1)}`);
    }
    scale = raw.scale;
  }

  const options: RenderOptions = {
    format,
    landscape: landscape.value,
    printBackground: printBackground.value,
    margin: Object.freeze(margin),
    fitContent: fitContent.value,
    ...(scale !== undefined ? { scale } : {}),
  };
  return { valid: true, value: Object.freeze(options) };
}

/**
 * Validate a POST /pdf body
 */
export function parseRenderRequest(
  payload: unknown,
  limits: { maxHtmlBytes: number }
): NormalizeResult<RenderRequest> {
  if (!isPlainObject(payload)) {
    return fail('body', 'must be a JSON object');
  }

  const { html } = payload;
  if (typeof html !== 'string') {
    return fail('html', 'is required and must be a string');
  }
  if (html.trim().length === 0) {
    return fail('html', 'must not be empty');
  }
  const htmlBytes = Buffer.byteLength(html, 'utf8');
  if (htmlBytes > limits.maxHtmlBytes) {
    return fail('html', `must not exceed ${limits.maxHtmlBytes} bytes (got ${htmlBytes})`);
  }

  const options = normalizeOptions(payload.options);
  if (!options.valid) {
    return options;
  }

  return { valid: true, value: Object.freeze({ html, options: options.value }) };
}
