import { z } from 'zod';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { ConfigurationError } from '../utils/errors.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

// data/ sits beside src/ and dist/
export const BUNDLED_DATA_DIR = join(__dirname, '..', '..', 'data');

export const DEFAULT_REGISTRY_KEYWORD = 'ouilist';

const commandSchema = z.string().trim().min(1);

export const ConfigSchema = z.object({
  data: z.object({
    surveyFile: z.string().min(1).default(join(BUNDLED_DATA_DIR, 'mac_address_survey.output')),
    registryPrimaryFile: z.string().min(1).default('/usr/share/macchanger/OUI.list'),
    registryFallbackFile: z.string().min(1).default(join(BUNDLED_DATA_DIR, 'OUI.list')),
  }),
  registryKeyword: z.string().trim().min(1).default(DEFAULT_REGISTRY_KEYWORD),
  commands: z.object({
    ip: commandSchema.default('ip'),
    ifconfig: commandSchema.default('ifconfig'),
    macchanger: commandSchema.default('macchanger'),
    pager: commandSchema.default('less'),
    pagerArgs: z.array(z.string()).default(['-SFX']),
  }),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('warn'),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Config {
  const pager = splitCommandLine(env['VENDORMAC_PAGER']);

  const result = ConfigSchema.safeParse({
    data: {
      surveyFile: env['VENDORMAC_SURVEY_FILE'],
      registryPrimaryFile: env['VENDORMAC_OUI_LIST'],
      registryFallbackFile: env['VENDORMAC_LOCAL_OUI_LIST'],
    },
    registryKeyword: env['VENDORMAC_REGISTRY_KEYWORD'],
    commands: {
      ip: env['VENDORMAC_IP'],
      ifconfig: env['VENDORMAC_IFCONFIG'],
      macchanger: env['VENDORMAC_MACCHANGER'],
      pager: pager?.command,
      pagerArgs: pager?.args,
    },
    logging: {
      level: env['LOG_LEVEL'],
    },
  });

  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, {
      cause: result.error,
      context: { issues },
    });
  }

  return result.data;
}

function splitCommandLine(value: string | undefined): { command: string; args: string[] } | undefined {
  if (!value || value.trim() === '') return undefined;

  const [command, ...args] = value.trim().split(/\s+/);
  if (command === undefined) return undefined;
  return { command, args };
}
