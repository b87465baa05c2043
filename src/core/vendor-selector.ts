import { z } from 'zod';
import { createChildLogger } from '../utils/logger.js';
import { ErrorCode, SelectionError } from '../utils/errors.js';
import { ouiToString } from '../utils/mac.js';
import type { RandomSource } from '../utils/random.js';
import type { VendorStore } from '../infra/vendor-store.js';
import type { SurveyBrowser } from '../types/interface.js';
import type {
  ProductDescription,
  RegistryRecord,
  SurveyRecord,
  VendorSelection,
} from '../types/vendor.js';

const logger = createChildLogger('vendor-selector');

export const LINE_NUMBER_PROMPT = 'enter line number of desired entry; Ctrl-C to abort: ';
export const INVALID_LINE_NUMBER_MESSAGE = 'error: response not a positive integer.';

export const LineNumberInputSchema = z
  .string()
  .trim()
  .regex(/^[0-9]+$/)
  .transform(Number)
  .pipe(z.number().int().positive().safe());

export function describeProduct(record: SurveyRecord): ProductDescription {
  return {
    productType: record.productType,
    manufacturer: record.manufacturer,
    productName: record.productName,
    model: record.model,
  };
}

/**
 * Builds a case-insensitive predicate over whole survey lines. The search
 * string is a regular expression (`dell|hp`, `lap.op`, `^1 `); one that does
 * not compile is matched as literal text instead.
 */
export function compileSearch(searchString: string): (line: string) => boolean {
  let pattern: RegExp;
  try {
    pattern = new RegExp(searchString, 'i');
  } catch (err) {
    if (!(err instanceof SyntaxError)) throw err;
    logger.debug({ searchString, reason: err.message }, 'Search string is not a valid pattern, matching literally');
    const needle = searchString.toLowerCase();
    return line => line.toLowerCase().includes(needle);
  }
  return line => pattern.test(line);
}

export class VendorSelector {
  private readonly random: RandomSource;

  constructor(random: RandomSource) {
    this.random = random;
  }

  /**
   * Shows the survey, then prompts until the operator enters a positive
   * integer. Cancellation from the browser propagates unchanged.
   */
  async browse(survey: VendorStore<SurveyRecord>, browser: SurveyBrowser): Promise<VendorSelection> {
    let lineNumber: number | undefined;
    try {
      await browser.render(survey.listing());
      while (lineNumber === undefined) {
        const input = await browser.promptLine(LINE_NUMBER_PROMPT);
        const parsed = LineNumberInputSchema.safeParse(input);
        if (parsed.success) {
          lineNumber = parsed.data;
        } else {
          logger.debug({ input }, 'Rejected line number input');
          browser.reportInvalid(INVALID_LINE_NUMBER_MESSAGE);
        }
      }
    } finally {
      browser.close();
    }

    const record = survey.getByLineNumber(lineNumber);
    if (!record) {
      throw new SelectionError(
        ErrorCode.RECORD_NOT_FOUND,
        `no survey entry on line ${lineNumber} (survey has ${survey.size} entries)`,
        { context: { lineNumber, entries: survey.size } }
      );
    }

    logger.info({ lineNumber, oui: ouiToString(record.vendorOui) }, 'Survey entry chosen');
    return { strategy: 'browse', oui: record.vendorOui, record, description: describeProduct(record) };
  }

  /**
   * Uniformly picks one of the survey entries that match the search string.
   * The interface name does not narrow the result, so a search for `laptop`
   * on `wlan0` also finds `eth` entries.
   */
  pickMatching(survey: VendorStore<SurveyRecord>, interfaceName: string, searchString: string): VendorSelection {
    const matchesLine = compileSearch(searchString);
    const matches = survey.records.filter(record => matchesLine(record.line));

    if (matches.length === 0) {
      throw new SelectionError(
        ErrorCode.PATTERN_NOT_FOUND,
        `pattern to match ${searchString} was not found for interface ${interfaceName}`,
        { context: { searchString, interfaceName } }
      );
    }

    const draw = this.random.nextInt(1, matches.length);
    const record = matches[draw - 1];
    if (!record) {
      throw new RangeError(`Random draw ${draw} outside [1, ${matches.length}]`);
    }

    logger.info(
      { searchString, matchCount: matches.length, draw, lineNumber: record.lineNumber },
      'Survey entry picked from matches'
    );
    return {
      strategy: 'search',
      oui: record.vendorOui,
      record,
      description: describeProduct(record),
      matchCount: matches.length,
      draw,
    };
  }

  /** Uniformly picks one entry of the whole registry, 1-indexed in file order. */
  pickFromRegistry(registry: VendorStore<RegistryRecord>): VendorSelection {
    if (registry.size === 0) {
      throw new SelectionError(ErrorCode.REGISTRY_NOT_FOUND, 'oui list contains no usable entries');
    }

    const draw = this.random.nextInt(1, registry.size);
    const record = registry.at(draw);
    if (!record) {
      throw new RangeError(`Random draw ${draw} outside [1, ${registry.size}]`);
    }

    logger.info({ draw, entryCount: registry.size, lineNumber: record.lineNumber }, 'Registry entry picked');
    return { strategy: 'registry', oui: record.oui, record, entryCount: registry.size, draw };
  }
}
