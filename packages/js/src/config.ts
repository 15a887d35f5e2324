/**
 * Converter configuration.
 *
 * A resolved {@link ConverterConfig} is frozen and passed explicitly
 * through the engine; nothing is read from process-wide state.
 */

import { ConverterConfig, ConverterOptions, ResourceLimits } from './types.js';
import { ConverterOptionsSchema, validate } from './schemas.js';
import { PREDECLARED_PREFIXES, PROV_JSONLD_CONTEXT } from './vocabulary.js';

export const DEFAULT_RESOURCE_LIMITS: Readonly<Required<ResourceLimits>> = Object.freeze({
  maxDocumentSize: 10 * 1024 * 1024, // 10 MB
  maxBundleDepth: 8,
  maxExpansionTime: 30_000, // 30 seconds
});

export const DEFAULT_CONVERTER_CONFIG: ConverterConfig = Object.freeze({
  contextUrl: PROV_JSONLD_CONTEXT,
  predeclaredPrefixes: Object.freeze([...PREDECLARED_PREFIXES]),
  strictPrefixes: true,
  typedBundles: false,
  resourceLimits: DEFAULT_RESOURCE_LIMITS,
});

/**
 * Validate user options and merge them over the defaults.
 *
 * @throws ZodError when an option has the wrong shape
 */
export function resolveConfig(options: ConverterOptions = {}): ConverterConfig {
  const valid = validate(ConverterOptionsSchema, options);

  return Object.freeze({
    contextUrl: valid.contextUrl ?? DEFAULT_CONVERTER_CONFIG.contextUrl,
    predeclaredPrefixes: Object.freeze([
      ...(valid.predeclaredPrefixes ?? DEFAULT_CONVERTER_CONFIG.predeclaredPrefixes),
    ]),
    strictPrefixes: valid.strictPrefixes ?? DEFAULT_CONVERTER_CONFIG.strictPrefixes,
    typedBundles: valid.typedBundles ?? DEFAULT_CONVERTER_CONFIG.typedBundles,
    resourceLimits: Object.freeze({
      maxDocumentSize: valid.resourceLimits?.maxDocumentSize ?? DEFAULT_RESOURCE_LIMITS.maxDocumentSize,
      maxBundleDepth: valid.resourceLimits?.maxBundleDepth ?? DEFAULT_RESOURCE_LIMITS.maxBundleDepth,
      maxExpansionTime: valid.resourceLimits?.maxExpansionTime ?? DEFAULT_RESOURCE_LIMITS.maxExpansionTime,
    }),
  });
}
