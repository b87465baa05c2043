/** Three uppercase two-digit hex octets, e.g. `['00', '1A', '2B']`. */
export type Oui = readonly [string, string, string];

export interface SurveyRecord {
  /** 1-based physical line in the survey file. */
  readonly lineNumber: number;
  /** Index written in the first column of the file; display only. */
  readonly surveyIndex: string;
  readonly interfaceClass: string;
  readonly productType: string;
  readonly manufacturer: string;
  readonly productName: string;
  readonly model: string;
  readonly vendorOui: Oui;
  readonly line: string;
}

export interface RegistryRecord {
  readonly lineNumber: number;
  readonly oui: Oui;
  readonly vendorName: string;
  readonly line: string;
}

export interface NumberedRecord {
  readonly lineNumber: number;
  readonly line: string;
}

export type RegistrySource = 'primary' | 'fallback';

export interface RegistryPaths {
  primaryPath: string;
  fallbackPath: string;
}

export interface RegistryChoice {
  source: RegistrySource;
  path: string;
  lineCount: number;
  /** Line count of the primary file when the fallback won over it. */
  supersededLineCount?: number;
}

export type SelectionStrategy = 'browse' | 'search' | 'registry';

export interface ProductDescription {
  productType: string;
  manufacturer: string;
  productName: string;
  model: string;
}

/** For registry picks, `entryCount` is the number of parsed entries the draw ranged over. */
export type VendorSelection =
  | { strategy: 'browse'; oui: Oui; record: SurveyRecord; description: ProductDescription }
  | { strategy: 'search'; oui: Oui; record: SurveyRecord; description: ProductDescription; matchCount: number; draw: number }
  | { strategy: 'registry'; oui: Oui; record: RegistryRecord; entryCount: number; draw: number };

export interface GeneratedAddress {
  oui: Oui;
  suffix: readonly [string, string, string];
  /** Six colon-separated uppercase octets. */
  address: string;
  /** True when the reserved all-zero address was replaced. */
  corrected: boolean;
}
