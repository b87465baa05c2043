export type InterfaceStateChange = 'up' | 'down';

/**
 * Privileged operations on the live system. Every method rejects when the
 * underlying operation fails.
 */
export interface InterfaceController {
  /** Names of the non-loopback interfaces present on the system. */
  listInterfaces(): Promise<string[]>;
  setInterfaceState(name: string, state: InterfaceStateChange): Promise<void>;
  applyHardwareAddress(name: string, address: string): Promise<void>;
}

/**
 * Shows the survey to the operator and collects the chosen line number.
 * `promptLine` rejects with an OperationCancelledError on interrupt.
 */
export interface SurveyBrowser {
  render(lines: readonly string[]): Promise<void>;
  promptLine(message: string): Promise<string>;
  reportInvalid(message: string): void;
  /** Releases the input once the selection is over. */
  close(): void;
}

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (command: string, args: readonly string[]) => Promise<CommandResult>;
