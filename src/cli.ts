#!/usr/bin/env node
import { loadConfigFromEnv, type Config } from './config/index.js';
import { parseInvocation, splitOptions, type Invocation } from './core/invocation.js';
import { VendorMacChanger } from './core/mac-changer.js';
import {
  formatError,
  formatGeneratedAddress,
  formatRegistryNotice,
  formatSelection,
  shouldShowUsage,
  usageText,
} from './core/messages.js';
import { SystemInterfaceController } from './infra/system-interface-controller.js';
import { TerminalSurveyBrowser } from './infra/terminal-survey-browser.js';
import { getExitCode } from './utils/errors.js';
import { getCurrentLogFile, setLogLevel } from './utils/logger.js';

function fail(error: unknown, config: Config | null): never {
  console.error(formatError(error));
  if (config && shouldShowUsage(error)) {
    console.error(usageText(config.registryKeyword));
  }
  const logFile = getCurrentLogFile();
  if (logFile) {
    console.error(`details logged to ${logFile}`);
  }
  process.exit(getExitCode(error));
}

async function main(): Promise<void> {
  let config: Config;
  try {
    config = loadConfigFromEnv();
  } catch (err) {
    fail(err, null);
  }
  setLogLevel(config.logging.level);

  const { options, args } = splitOptions(process.argv.slice(2));

  let invocation: Invocation;
  try {
    invocation = parseInvocation(args, config.registryKeyword);
  } catch (err) {
    fail(err, config);
  }

  if (invocation.mode === 'help') {
    console.log(usageText(config.registryKeyword));
    process.exit(0);
  }

  const changer = new VendorMacChanger({
    config,
    controller: new SystemInterfaceController(config.commands),
    browser: new TerminalSurveyBrowser({ pager: config.commands.pager, pagerArgs: config.commands.pagerArgs }),
  });

  changer.on('registryResolved', choice => {
    const notice = formatRegistryNotice(choice);
    if (notice) console.log(`${notice}\n`);
  });
  changer.on('selected', selection => console.log(formatSelection(selection)));
  changer.on('addressGenerated', generated => console.log(formatGeneratedAddress(generated)));

  try {
    const outcome = await changer.run(invocation, { dryRun: options.dryRun });
    if (!outcome.applied) {
      console.log(`dry run: ${outcome.interfaceName} was not changed`);
    }
  } catch (err) {
    fail(err, config);
  }
}

main().catch((err) => {
  fail(err, null);
});
