/**
 * Conversion errors and the warning collector.
 *
 * Fatal conditions are thrown as {@link ConversionError} subclasses and
 * abort the conversion. Recoverable conditions are recorded on a
 * {@link WarningSink} and returned alongside the result.
 */

import { ConversionWarning, RecordPath, WarningCode } from './types.js';

/**
 * Render a record path, e.g. `bundle[ex:b1]/wasGeneratedBy[_:g1].prov:time`.
 * The document root renders as `$`.
 */
export function formatPath(path: RecordPath): string {
  const segments = path.bundles.map((bundle) => `bundle[${bundle}]`);

  if (path.kind !== undefined) {
    let record = path.kind;
    if (path.identifier !== undefined) record += `[${path.identifier}]`;
    if (path.field !== undefined) record += `.${path.field}`;
    segments.push(record);
  }

  return segments.length === 0 ? '$' : segments.join('/');
}

export class ConversionError extends Error {
  /** Message without the location suffix */
  readonly detail: string;
  readonly recordPath: RecordPath;

  constructor(detail: string, recordPath: RecordPath = { bundles: [] }) {
    super(`${detail} at ${formatPath(recordPath)}`);
    this.name = new.target.name;
    this.detail = detail;
    this.recordPath = recordPath;
  }
}

/** Input is not JSON, or violates the PROV-JSON record shape */
export class ParseError extends ConversionError {}

/** A qualified name uses a prefix absent from the active table */
export class PrefixResolutionError extends ConversionError {
  readonly prefix: string;

  constructor(prefix: string, qualifiedName: string, recordPath: RecordPath) {
    super(`Unresolved prefix '${prefix}' in qualified name '${qualifiedName}'`, recordPath);
    this.prefix = prefix;
  }
}

/**
 * A typed-literal or language-tagged value missing a required part.
 * The normalizer downgrades it to a warning.
 */
export class MalformedAttributeError extends ConversionError {}

/** Input exceeds a configured resource limit */
export class ResourceLimitError extends ConversionError {}

// ── Warnings ──────────────────────────────────────────────────────

export class WarningSink {
  private readonly items: ConversionWarning[] = [];

  add(code: WarningCode, message: string, path: RecordPath): void {
    this.items.push({ code, path: formatPath(path), message });
  }

  /** Record a recoverable error as a warning */
  recover(code: WarningCode, error: ConversionError): void {
    this.add(code, error.detail, error.recordPath);
  }

  get warnings(): ConversionWarning[] {
    return [...this.items];
  }
}
