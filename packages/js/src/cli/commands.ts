/**
 * Command implementations behind the `prov2jsonld` and `ld2dot` binaries.
 *
 * Each command takes its argument vector (without the node and script
 * paths) and resolves to a process exit code.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { parseArgs } from 'node:util';
import { ProvJsonLdConverter, SerializationFormat } from '../converter.js';
import { ConversionError } from '../errors.js';
import { Logger } from '../logger.js';
import { ProvJsonLdDocumentSchema, validate } from '../schemas.js';
import { RankDirection, toDot } from '../viz/dot.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const PROV2JSONLD_USAGE =
  'Usage: prov2jsonld <input> <output> [--format json|cbor] [--typed-bundles] [--lenient-prefixes]';
const LD2DOT_USAGE = 'Usage: ld2dot <input> <output> [--show-attr] [--direction LR|TB]';

// ── prov2jsonld ───────────────────────────────────────────────────

function prov2jsonldArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      format: { type: 'string', default: 'json' },
      'typed-bundles': { type: 'boolean', default: false },
      'lenient-prefixes': { type: 'boolean', default: false },
    },
  });
}

export async function runProv2JsonLd(argv: string[], logger = new Logger('prov2jsonld')): Promise<number> {
  let args: ReturnType<typeof prov2jsonldArgs>;
  try {
    args = prov2jsonldArgs(argv);
  } catch (error) {
    return usage(logger, PROV2JSONLD_USAGE, error);
  }

  const [input, output] = args.positionals;
  const format = args.values.format;
  if (args.positionals.length !== 2 || !isSerializationFormat(format)) {
    return usage(logger, PROV2JSONLD_USAGE);
  }

  try {
    const converter = new ProvJsonLdConverter({
      typedBundles: args.values['typed-bundles'],
      strictPrefixes: !args.values['lenient-prefixes'],
    });

    const text = await readFile(input, 'utf8');
    logger.debug(`Read ${text.length} characters from ${input}`);

    const { document, warnings } = converter.convert(text);
    for (const warning of warnings) {
      logger.warn(`${warning.code} at ${warning.path}: ${warning.message}`);
    }

    await writeFile(output, converter.serialize(document, format));
    logger.info(`Converted PROV-JSON to PROV-JSONLD: ${output}`);
    return EXIT_OK;
  } catch (error) {
    return failure(logger, 'Conversion failed', error);
  }
}

// ── ld2dot ────────────────────────────────────────────────────────

function ld2dotArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      'show-attr': { type: 'boolean', default: false },
      direction: { type: 'string', default: 'LR' },
    },
  });
}

export async function runLd2Dot(argv: string[], logger = new Logger('ld2dot')): Promise<number> {
  let args: ReturnType<typeof ld2dotArgs>;
  try {
    args = ld2dotArgs(argv);
  } catch (error) {
    return usage(logger, LD2DOT_USAGE, error);
  }

  const [input, output] = args.positionals;
  const direction = args.values.direction;
  if (args.positionals.length !== 2 || !isRankDirection(direction)) {
    return usage(logger, LD2DOT_USAGE);
  }

  try {
    const parsed: unknown = JSON.parse(await readFile(input, 'utf8'));
    const document = validate(ProvJsonLdDocumentSchema, parsed);

    await writeFile(output, toDot(document, { showAttributes: args.values['show-attr'], direction }));
    logger.info(`Generated DOT file: ${output}`);
    return EXIT_OK;
  } catch (error) {
    return failure(logger, 'DOT export failed', error);
  }
}

// ── Internal Helpers ──────────────────────────────────────────────

function isSerializationFormat(value: string | undefined): value is SerializationFormat {
  return value === 'json' || value === 'cbor';
}

function isRankDirection(value: string | undefined): value is RankDirection {
  return value === 'LR' || value === 'TB';
}

function usage(logger: Logger, text: string, error?: unknown): number {
  if (error instanceof Error) logger.error(error.message);
  logger.error(text);
  return EXIT_USAGE;
}

function failure(logger: Logger, context: string, error: unknown): number {
  const message = error instanceof Error ? error.message : String(error);
  logger.error(`${context}: ${message}`);
  if (!(error instanceof ConversionError)) {
    logger.debug('Stack trace', error);
  }
  return EXIT_FAILURE;
}
