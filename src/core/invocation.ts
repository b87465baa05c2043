import { ErrorCode, InvocationError } from '../utils/errors.js';
import { DEFAULT_REGISTRY_KEYWORD } from '../config/index.js';

export type Invocation =
  | { mode: 'help' }
  | { mode: 'browse'; interfaceName: string }
  | { mode: 'search'; interfaceName: string; searchString: string }
  | { mode: 'registry'; interfaceName: string };

const HELP_PATTERN = /^-{0,2}(usage|help)$/i;
const DRY_RUN_FLAGS = new Set(['-n', '--dry-run']);

export interface InvocationOptions {
  dryRun: boolean;
}

/** Separates option flags from the positional arguments. */
export function splitOptions(argv: readonly string[]): { options: InvocationOptions; args: string[] } {
  const args = argv.filter(arg => !DRY_RUN_FLAGS.has(arg));
  return { options: { dryRun: args.length !== argv.length }, args };
}

export function isHelpRequest(arg: string | undefined): boolean {
  return arg !== undefined && HELP_PATTERN.test(arg);
}

/**
 * Maps positional arguments to a selection mode. Argument-count errors are
 * raised here, before anything touches the system.
 */
export function parseInvocation(args: readonly string[], registryKeyword = DEFAULT_REGISTRY_KEYWORD): Invocation {
  const [first, second] = args;

  if (isHelpRequest(first)) {
    return { mode: 'help' };
  }

  if (first === undefined || args.length > 2) {
    throw new InvocationError(
      ErrorCode.TOO_MANY_PARAMETERS,
      `expected an interface and at most one option or search string, got ${args.length} parameter(s)`,
      { context: { args: [...args] } }
    );
  }

  if (second === undefined) {
    if (first === registryKeyword) {
      throw new InvocationError(ErrorCode.INTERFACE_NOT_SUPPLIED, "you didn't tell me for which interface", {
        context: { args: [...args] },
      });
    }
    return { mode: 'browse', interfaceName: first };
  }

  if (second === registryKeyword) {
    return { mode: 'registry', interfaceName: first };
  }

  return { mode: 'search', interfaceName: first, searchString: second };
}
