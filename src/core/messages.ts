import {
  ErrorCode,
  InterfaceMutationError,
  VendorMacError,
  describeInterfaceState,
  getErrorCode,
} from '../utils/errors.js';
import type { GeneratedAddress, RegistryChoice, VendorSelection } from '../types/vendor.js';

const CONTINUATION = '       ';

export function usageText(registryKeyword: string): string {
  return [
    'USAGE: vendormac [--dry-run] interface [ option | search_string ]',
    '    interface      eg. wlan0, eth0',
    `    option         currently, just '${registryKeyword}'`,
    '    search_string  eg. tablet, lAptOp, Lenovo, mac',
    '',
    '    vendormac wlan0                browse the survey and pick an entry',
    `    vendormac wlan0 ${registryKeyword.padEnd(14)} random vendor from the IEEE OUI list`,
    '    vendormac wlan0 laptop         random survey entry matching "laptop"',
    '',
    'Environment:',
    '  VENDORMAC_SURVEY_FILE      survey data file',
    '  VENDORMAC_OUI_LIST         system OUI list (default /usr/share/macchanger/OUI.list)',
    '  VENDORMAC_LOCAL_OUI_LIST   bundled OUI list',
    '  VENDORMAC_PAGER            pager command (default "less -SFX")',
    '  LOG_LEVEL                  trace|debug|info|warn|error|fatal|silent',
  ].join('\n');
}

export function formatSelection(selection: VendorSelection): string {
  if (selection.strategy === 'registry') {
    return `selected: ${selection.record.line}`;
  }
  const { productType, manufacturer, productName, model } = selection.description;
  return `selected: ${productType} ${manufacturer} ${productName} model_#:${model}`;
}

export function formatGeneratedAddress(generated: GeneratedAddress): string {
  return `new mac string will be: ${generated.address}`;
}

/** Shown when the bundled OUI list is used instead of a smaller system copy. */
export function formatRegistryNotice(choice: RegistryChoice): string | null {
  if (choice.source !== 'fallback' || choice.supersededLineCount === undefined) {
    return null;
  }
  const format = (count: number): string => count.toLocaleString('en-US');
  return [
    'NOTE!: The bundled copy of the oui list seems to be more comprehensive',
    `${CONTINUATION}than the system one (${format(choice.lineCount)} vs. ${format(choice.supersededLineCount)} entries).`,
    `${CONTINUATION}We will use ours. You may want to consider updating the system copy.`,
  ].join('\n');
}

export function formatError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  const lines = [`error: ${message}`];

  if (error instanceof VendorMacError && error.code !== ErrorCode.UNKNOWN_ERROR) {
    lines.push(`${CONTINUATION}${describeInterfaceState(error)}`);
  }
  if (error instanceof InterfaceMutationError && error.cause) {
    lines.push(`${CONTINUATION}cause: ${error.cause.message}`);
  }
  if (getErrorCode(error) === ErrorCode.INTERFACE_DOWN_FAILED) {
    lines.push(`${CONTINUATION}Are you running this with sudo?`);
  }

  return lines.join('\n');
}

/** Invocation errors are followed by the usage text. */
export function shouldShowUsage(error: unknown): boolean {
  const code = getErrorCode(error);
  return code === ErrorCode.INTERFACE_NOT_SUPPLIED || code === ErrorCode.TOO_MANY_PARAMETERS;
}
