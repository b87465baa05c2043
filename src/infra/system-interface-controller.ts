import { spawn } from 'child_process';
import { createChildLogger } from '../utils/logger.js';
import type { Config } from '../config/index.js';
import type {
  CommandResult,
  CommandRunner,
  InterfaceController,
  InterfaceStateChange,
} from '../types/interface.js';

const logger = createChildLogger('system-interface');

const LOOPBACK_INTERFACE = 'lo';

export const spawnCommand: CommandRunner = (command, args) =>
  new Promise<CommandResult>((resolve, reject) => {
    logger.debug({ command, args }, 'Executing command');

    const child = spawn(command, [...args], {
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    });

    let stdout = '';
    let stderr = '';

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('close', (code: number | null) => {
      resolve({ exitCode: code, stdout, stderr });
    });

    child.on('error', (err: Error) => {
      logger.error({ err, command }, 'Failed to spawn command');
      reject(new Error(`Failed to run ${command}: ${err.message}`));
    });
  });

/**
 * Interface names from `ip link show`. Loopback is left out and peer suffixes
 * such as `@if5` are dropped.
 */
export function parseIpLinkOutput(output: string): string[] {
  const names: string[] = [];
  for (const line of output.split('\n')) {
    const match = /^\d+:\s+([^:@\s]+)(?:@[^:\s]*)?:/.exec(line);
    const name = match?.[1];
    if (name && name !== LOOPBACK_INTERFACE && !names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}

/** Runs `ip`, `ifconfig` and `macchanger`; needs the privileges those commands need. */
export class SystemInterfaceController implements InterfaceController {
  private readonly commands: Config['commands'];
  private readonly run: CommandRunner;

  constructor(commands: Config['commands'], run: CommandRunner = spawnCommand) {
    this.commands = commands;
    this.run = run;
  }

  async listInterfaces(): Promise<string[]> {
    const stdout = await this.runChecked(this.commands.ip, ['link', 'show']);
    return parseIpLinkOutput(stdout);
  }

  async setInterfaceState(name: string, state: InterfaceStateChange): Promise<void> {
    await this.runChecked(this.commands.ifconfig, [name, state]);
    logger.info({ interfaceName: name, state }, 'Interface state changed');
  }

  async applyHardwareAddress(name: string, address: string): Promise<void> {
    await this.runChecked(this.commands.macchanger, [`--mac=${address}`, name]);
    logger.info({ interfaceName: name, address }, 'Hardware address applied');
  }

  private async runChecked(command: string, args: readonly string[]): Promise<string> {
    const result = await this.run(command, args);
    if (result.exitCode !== 0) {
      logger.warn({ command, args, exitCode: result.exitCode, stderr: result.stderr }, 'Command failed');
      const detail = result.stderr.trim() || result.stdout.trim() || 'no output';
      throw new Error(`${command} ${args.join(' ')} failed (exit ${result.exitCode ?? 'signal'}): ${detail}`);
    }
    return result.stdout;
  }
}
