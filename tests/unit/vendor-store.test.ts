import { describe, it, expect, vi } from 'vitest';
import {
  VendorStore,
  countNonBlankLines,
  loadRegistry,
  loadSurvey,
  parseRegistry,
  parseRegistryLine,
  parseSurvey,
  parseSurveyLine,
  resolveRegistryFile,
  type FileStat,
} from '../../src/infra/vendor-store.js';
import { ErrorCode, SelectionError } from '../../src/utils/errors.js';

const SURVEY = [
  '1 wlan laptop Acme Book 100 00 1A 2B',
  '2 wlan tablet Zeta Slate S2 aa:bb:cc',
  '',
  '3 eth desktop Acme Tower T9 AA BB CC',
  'broken line',
  '4 wlan laptop Zeta Note N1 12 34 56',
  '',
].join('\n');

const REGISTRY = [
  '00 00 0C Cisco Systems, Inc',
  '08-00-2B Digital Equipment',
  'not an oui line',
  '00 26 59   Nintendo Co., Ltd.  ',
].join('\n');

function statFor(counts: Record<string, number>): FileStat {
  return {
    exists: vi.fn(async (path: string) => path in counts),
    countLines: vi.fn(async (path: string) => counts[path] ?? 0),
  };
}

const PATHS = { primaryPath: '/usr/share/macchanger/OUI.list', fallbackPath: '/opt/vendormac/OUI.list' };

describe('parseSurveyLine', () => {
  it('should split the fixed layout', () => {
    expect(parseSurveyLine('  7  wlan  laptop  Acme  Book  _  00 1a 2b ', 7)).toEqual({
      lineNumber: 7,
      surveyIndex: '7',
      interfaceClass: 'wlan',
      productType: 'laptop',
      manufacturer: 'Acme',
      productName: 'Book',
      model: '_',
      vendorOui: ['00', '1A', '2B'],
      line: '7  wlan  laptop  Acme  Book  _  00 1a 2b',
    });
  });

  it('should reject a wrong field count or a bad OUI', () => {
    expect(parseSurveyLine('1 wlan laptop Acme Book', 1)).toBeNull();
    expect(parseSurveyLine('1 wlan laptop Acme Book 100 00 1A', 1)).toBeNull();
    expect(parseSurveyLine('1 wlan laptop Acme Book 100 00 1A 2B 3C', 1)).toBeNull();
    expect(parseSurveyLine('1 wlan laptop Acme Book 100 GG 1A 2B', 1)).toBeNull();
  });
});

describe('parseSurvey', () => {
  const store = parseSurvey(SURVEY);

  it('should number records by physical line', () => {
    expect(store.size).toBe(4);
    expect(store.records.map(record => record.lineNumber)).toEqual([1, 2, 4, 6]);
    expect(store.getByLineNumber(4)?.vendorOui).toEqual(['AA', 'BB', 'CC']);
    expect(store.getByLineNumber(2)?.vendorOui).toEqual(['AA', 'BB', 'CC']);
  });

  it('should skip malformed lines but not blank ones', () => {
    expect(store.skippedLines).toEqual([5]);
    expect(store.getByLineNumber(3)).toBeUndefined();
    expect(store.getByLineNumber(5)).toBeUndefined();
  });

  it('should index positions in file order', () => {
    expect(store.at(3)?.lineNumber).toBe(4);
    expect(store.at(0)).toBeUndefined();
    expect(store.at(5)).toBeUndefined();
  });

  it('should freeze records', () => {
    expect(Object.isFrozen(store.records)).toBe(true);
    expect(Object.isFrozen(store.records[0])).toBe(true);
  });

  it('should list entries prefixed with their line number', () => {
    expect(store.listing()[0]).toBe('1  1 wlan laptop Acme Book 100 00 1A 2B');
    expect(store.listing()[3]).toBe('6  4 wlan laptop Zeta Note N1 12 34 56');
  });

  it('should pad line numbers to a common width', () => {
    const lines = Array.from({ length: 10 }, (_, i) => `${i + 1} wlan laptop Acme Book ${i} 00 1A 2B`);
    const listing = parseSurvey(lines.join('\n')).listing();
    expect(listing[0]).toBe(' 1  1 wlan laptop Acme Book 0 00 1A 2B');
    expect(listing[9]).toBe('10  10 wlan laptop Acme Book 9 00 1A 2B');
  });

  it('should handle CRLF line endings', () => {
    expect(parseSurvey('1 wlan laptop Acme Book 100 00 1A 2B\r\n').records[0]?.line).toBe(
      '1 wlan laptop Acme Book 100 00 1A 2B'
    );
  });

  it('should give an empty store for an empty file', () => {
    expect(parseSurvey('').size).toBe(0);
  });
});

describe('parseRegistryLine', () => {
  it('should read three octets and the vendor name', () => {
    expect(parseRegistryLine('00 00 0C Cisco Systems, Inc', 1)).toEqual({
      lineNumber: 1,
      oui: ['00', '00', '0C'],
      vendorName: 'Cisco Systems, Inc',
      line: '00 00 0C Cisco Systems, Inc',
    });
  });

  it('should accept a joined OUI token', () => {
    expect(parseRegistryLine('08-00-2B Digital Equipment', 2)?.oui).toEqual(['08', '00', '2B']);
    expect(parseRegistryLine('08-00-2B Digital Equipment', 2)?.vendorName).toBe('Digital Equipment');
  });

  it('should allow a missing vendor name', () => {
    expect(parseRegistryLine('00 26 59', 1)?.vendorName).toBe('');
  });

  it('should reject lines without an OUI', () => {
    expect(parseRegistryLine('not an oui line', 1)).toBeNull();
  });
});

describe('parseRegistry', () => {
  it('should keep file order and skip malformed lines', () => {
    const store = parseRegistry(REGISTRY);

    expect(store.size).toBe(3);
    expect(store.skippedLines).toEqual([3]);
    expect(store.at(3)).toEqual({
      lineNumber: 4,
      oui: ['00', '26', '59'],
      vendorName: 'Nintendo Co., Ltd.',
      line: '00 26 59   Nintendo Co., Ltd.',
    });
  });
});

describe('countNonBlankLines', () => {
  it('should ignore blank lines and the trailing newline', () => {
    expect(countNonBlankLines('a\n\n b\n')).toBe(2);
    expect(countNonBlankLines('')).toBe(0);
  });
});

describe('resolveRegistryFile', () => {
  it('should prefer the fallback when it has more entries', async () => {
    const choice = await resolveRegistryFile(PATHS, statFor({ [PATHS.primaryPath]: 10, [PATHS.fallbackPath]: 20 }));

    expect(choice).toEqual({ source: 'fallback', path: PATHS.fallbackPath, lineCount: 20, supersededLineCount: 10 });
  });

  it('should keep the primary on a tie', async () => {
    const choice = await resolveRegistryFile(PATHS, statFor({ [PATHS.primaryPath]: 10, [PATHS.fallbackPath]: 10 }));

    expect(choice).toEqual({ source: 'primary', path: PATHS.primaryPath, lineCount: 10 });
  });

  it('should keep the primary when it is larger', async () => {
    const choice = await resolveRegistryFile(PATHS, statFor({ [PATHS.primaryPath]: 30, [PATHS.fallbackPath]: 20 }));

    expect(choice).toEqual({ source: 'primary', path: PATHS.primaryPath, lineCount: 30 });
  });

  it('should use whichever file exists', async () => {
    await expect(resolveRegistryFile(PATHS, statFor({ [PATHS.primaryPath]: 3 }))).resolves.toEqual({
      source: 'primary',
      path: PATHS.primaryPath,
      lineCount: 3,
    });
    await expect(resolveRegistryFile(PATHS, statFor({ [PATHS.fallbackPath]: 4 }))).resolves.toEqual({
      source: 'fallback',
      path: PATHS.fallbackPath,
      lineCount: 4,
    });
  });

  it('should fail when neither file exists', async () => {
    const promise = resolveRegistryFile(PATHS, statFor({}));

    await expect(promise).rejects.toBeInstanceOf(SelectionError);
    await expect(promise).rejects.toMatchObject({ code: ErrorCode.REGISTRY_NOT_FOUND });
  });
});

describe('loadRegistry / loadSurvey', () => {
  it('should parse the chosen registry file', async () => {
    const readFile = vi.fn(async (_path: string) => REGISTRY);
    const { choice, store } = await loadRegistry(PATHS, statFor({ [PATHS.fallbackPath]: 3 }), readFile);

    expect(readFile).toHaveBeenCalledWith(PATHS.fallbackPath);
    expect(choice.source).toBe('fallback');
    expect(store.size).toBe(3);
  });

  it('should parse the survey through the given reader', async () => {
    const store = await loadSurvey('/srv/survey.txt', async () => SURVEY);

    expect(store).toBeInstanceOf(VendorStore);
    expect(store.size).toBe(4);
  });
});
