import { promises as fs } from 'fs';
import { createChildLogger } from '../utils/logger.js';
import { ErrorCode, SelectionError } from '../utils/errors.js';
import { hasLocalBit, hasMulticastBit, parseOui, ouiToString } from '../utils/mac.js';
import type {
  NumberedRecord,
  RegistryChoice,
  RegistryPaths,
  RegistryRecord,
  SurveyRecord,
} from '../types/vendor.js';

const logger = createChildLogger('vendor-store');

const SURVEY_DESCRIPTION_FIELDS = 6;

/**
 * Filesystem queries used to pick a registry file. Injected so resolution can
 * be exercised without touching real paths.
 */
export interface FileStat {
  exists(path: string): Promise<boolean>;
  /** Number of non-blank lines. */
  countLines(path: string): Promise<number>;
}

export const nodeFileStat: FileStat = {
  async exists(path: string): Promise<boolean> {
    try {
      const stat = await fs.stat(path);
      return stat.isFile();
    } catch {
      return false;
    }
  },
  async countLines(path: string): Promise<number> {
    const text = await fs.readFile(path, 'utf-8');
    return countNonBlankLines(text);
  },
};

export function countNonBlankLines(text: string): number {
  return splitLines(text).filter(line => line.trim() !== '').length;
}

function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/** Read-only, ordered collection of parsed records keyed by physical line. */
export class VendorStore<T extends NumberedRecord> {
  readonly records: readonly T[];
  readonly skippedLines: readonly number[];
  private readonly byLineNumber: Map<number, T>;

  constructor(records: readonly T[], skippedLines: readonly number[] = []) {
    this.records = Object.freeze([...records]);
    this.skippedLines = Object.freeze([...skippedLines]);
    this.byLineNumber = new Map(records.map((record): [number, T] => [record.lineNumber, record]));
  }

  get size(): number {
    return this.records.length;
  }

  getByLineNumber(lineNumber: number): T | undefined {
    return this.byLineNumber.get(lineNumber);
  }

  /** Record at a 1-based position in file order. */
  at(position: number): T | undefined {
    return this.records[position - 1];
  }

  /** Display listing, each entry prefixed with the line number the operator types. */
  listing(): string[] {
    const width = String(this.records[this.records.length - 1]?.lineNumber ?? 0).length;
    return this.records.map(record => `${String(record.lineNumber).padStart(width)}  ${record.line}`);
  }
}

function parseLines<T extends NumberedRecord>(
  text: string,
  source: string,
  parseLine: (line: string, lineNumber: number) => T | null
): VendorStore<T> {
  const records: T[] = [];
  const skipped: number[] = [];

  splitLines(text).forEach((line, index) => {
    if (line.trim() === '') return;
    const record = parseLine(line, index + 1);
    if (record) {
      Object.freeze(record);
      records.push(record);
    } else {
      skipped.push(index + 1);
    }
  });

  if (skipped.length > 0) {
    logger.warn({ source, skippedLines: skipped }, `Skipped ${skipped.length} malformed line(s)`);
  }
  logger.debug({ source, records: records.length }, 'Parsed vendor data');

  return new VendorStore(records, skipped);
}

export function parseSurveyLine(line: string, lineNumber: number): SurveyRecord | null {
  const tokens = line.trim().split(/\s+/);
  const [surveyIndex, interfaceClass, productType, manufacturer, productName, model] = tokens;
  if (
    surveyIndex === undefined ||
    interfaceClass === undefined ||
    productType === undefined ||
    manufacturer === undefined ||
    productName === undefined ||
    model === undefined
  ) {
    return null;
  }

  const vendorOui = parseOui(tokens.slice(SURVEY_DESCRIPTION_FIELDS));
  if (!vendorOui) return null;

  if (hasMulticastBit(vendorOui)) {
    logger.warn({ lineNumber, oui: ouiToString(vendorOui) }, 'Survey OUI has the multicast bit set');
  }
  if (hasLocalBit(vendorOui)) {
    logger.warn({ lineNumber, oui: ouiToString(vendorOui) }, 'Survey OUI has the locally administered bit set');
  }

  return {
    lineNumber,
    surveyIndex,
    interfaceClass,
    productType,
    manufacturer,
    productName,
    model,
    vendorOui,
    line: line.trim(),
  };
}

const REGISTRY_LINE = /^\s*(\S+)\s+(\S+)\s+(\S+)(?:\s+(.*?))?\s*$/;
const REGISTRY_LINE_SINGLE = /^\s*(\S+)(?:\s+(.*?))?\s*$/;

export function parseRegistryLine(line: string, lineNumber: number): RegistryRecord | null {
  const spaced = REGISTRY_LINE.exec(line);
  if (spaced?.[1] !== undefined && spaced[2] !== undefined && spaced[3] !== undefined) {
    const oui = parseOui([spaced[1], spaced[2], spaced[3]]);
    if (oui) {
      return { lineNumber, oui, vendorName: spaced[4] ?? '', line: line.trim() };
    }
  }

  // `00-00-0C Cisco` / `00:00:0C Cisco`
  const joined = REGISTRY_LINE_SINGLE.exec(line);
  if (joined?.[1] !== undefined) {
    const oui = parseOui([joined[1]]);
    if (oui) {
      return { lineNumber, oui, vendorName: joined[2] ?? '', line: line.trim() };
    }
  }

  return null;
}

export function parseSurvey(text: string, source = 'survey'): VendorStore<SurveyRecord> {
  return parseLines(text, source, parseSurveyLine);
}

export function parseRegistry(text: string, source = 'registry'): VendorStore<RegistryRecord> {
  return parseLines(text, source, parseRegistryLine);
}

export async function loadSurvey(
  path: string,
  readFile: (path: string) => Promise<string> = file => fs.readFile(file, 'utf-8')
): Promise<VendorStore<SurveyRecord>> {
  return parseSurvey(await readFile(path), path);
}

/**
 * Picks the registry file with more entries; the primary wins ties and is
 * used alone when the fallback is missing.
 */
export async function resolveRegistryFile(
  paths: RegistryPaths,
  fileStat: FileStat = nodeFileStat
): Promise<RegistryChoice> {
  const [primaryExists, fallbackExists] = await Promise.all([
    fileStat.exists(paths.primaryPath),
    fileStat.exists(paths.fallbackPath),
  ]);

  if (primaryExists) {
    const lineCount = await fileStat.countLines(paths.primaryPath);
    if (fallbackExists) {
      const fallbackLineCount = await fileStat.countLines(paths.fallbackPath);
      if (fallbackLineCount > lineCount) {
        logger.info({ primary: lineCount, fallback: fallbackLineCount }, 'Bundled OUI list has more entries');
        return {
          source: 'fallback',
          path: paths.fallbackPath,
          lineCount: fallbackLineCount,
          supersededLineCount: lineCount,
        };
      }
    }
    return { source: 'primary', path: paths.primaryPath, lineCount };
  }

  if (fallbackExists) {
    const lineCount = await fileStat.countLines(paths.fallbackPath);
    return { source: 'fallback', path: paths.fallbackPath, lineCount };
  }

  throw new SelectionError(ErrorCode.REGISTRY_NOT_FOUND, 'can not find oui list', {
    context: { primaryPath: paths.primaryPath, fallbackPath: paths.fallbackPath },
  });
}

export interface LoadedRegistry {
  choice: RegistryChoice;
  store: VendorStore<RegistryRecord>;
}

export async function loadRegistry(
  paths: RegistryPaths,
  fileStat: FileStat = nodeFileStat,
  readFile: (path: string) => Promise<string> = file => fs.readFile(file, 'utf-8')
): Promise<LoadedRegistry> {
  const choice = await resolveRegistryFile(paths, fileStat);
  const store = parseRegistry(await readFile(choice.path), choice.path);
  return { choice, store };
}
