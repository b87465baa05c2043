import { promises as fs } from 'fs';
import { EventEmitter } from 'eventemitter3';
import { createChildLogger, logOperation } from '../utils/logger.js';
import {
  ErrorCode,
  InterfaceMutationError,
  InvocationError,
  VendorMacError,
} from '../utils/errors.js';
import { createDefaultRandomSource, type RandomSource } from '../utils/random.js';
import { loadRegistry, loadSurvey, nodeFileStat, type FileStat, type VendorStore } from '../infra/vendor-store.js';
import { VendorSelector } from './vendor-selector.js';
import { assembleAddress } from './address-assembler.js';
import type { Invocation } from './invocation.js';
import type { Config } from '../config/index.js';
import type { InterfaceController, InterfaceStateChange, SurveyBrowser } from '../types/interface.js';
import type { GeneratedAddress, RegistryChoice, SurveyRecord, VendorSelection } from '../types/vendor.js';

const logger = createChildLogger('mac-changer');

export interface VendorMacChangerEvents {
  registryResolved: (choice: RegistryChoice) => void;
  selected: (selection: VendorSelection) => void;
  addressGenerated: (generated: GeneratedAddress) => void;
  interfaceStateChanged: (interfaceName: string, state: InterfaceStateChange) => void;
  addressApplied: (interfaceName: string, address: string) => void;
}

export interface VendorMacChangerDeps {
  config: Config;
  controller: InterfaceController;
  browser: SurveyBrowser;
  random?: RandomSource;
  fileStat?: FileStat;
  readTextFile?: (path: string) => Promise<string>;
}

export type SelectionInvocation = Exclude<Invocation, { mode: 'help' }>;

export interface RunOptions {
  /** Stop after the address is generated; the interface is not touched. */
  dryRun?: boolean;
}

export interface ChangeOutcome {
  interfaceName: string;
  selection: VendorSelection;
  generated: GeneratedAddress;
  applied: boolean;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export class VendorMacChanger extends EventEmitter<VendorMacChangerEvents> {
  private readonly config: Config;
  private readonly controller: InterfaceController;
  private readonly browser: SurveyBrowser;
  private readonly random: RandomSource;
  private readonly selector: VendorSelector;
  private readonly fileStat: FileStat;
  private readonly readTextFile: (path: string) => Promise<string>;

  constructor(deps: VendorMacChangerDeps) {
    super();
    this.config = deps.config;
    this.controller = deps.controller;
    this.browser = deps.browser;
    this.random = deps.random ?? createDefaultRandomSource();
    this.selector = new VendorSelector(this.random);
    this.fileStat = deps.fileStat ?? nodeFileStat;
    this.readTextFile = deps.readTextFile ?? (path => fs.readFile(path, 'utf-8'));
  }

  async run(invocation: SelectionInvocation, options: RunOptions = {}): Promise<ChangeOutcome> {
    const { interfaceName } = invocation;
    logOperation('change-mac', 'started', { mode: invocation.mode, interfaceName, dryRun: options.dryRun ?? false });

    try {
      await this.validateInterface(interfaceName);

      const selection = await this.select(invocation);
      this.emit('selected', selection);

      const generated = assembleAddress(selection.oui, this.random);
      this.emit('addressGenerated', generated);

      if (options.dryRun) {
        logOperation('change-mac', 'success', { interfaceName, address: generated.address, applied: false });
        return { interfaceName, selection, generated, applied: false };
      }

      await this.applyAddress(interfaceName, generated.address);
      logOperation('change-mac', 'success', { interfaceName, address: generated.address, applied: true });
      return { interfaceName, selection, generated, applied: true };
    } catch (err) {
      const error = err instanceof VendorMacError ? err : VendorMacError.fromError(toError(err));
      logOperation('change-mac', 'error', { interfaceName, code: error.code, error: error.message });
      throw error;
    }
  }

  async validateInterface(interfaceName: string): Promise<void> {
    const available = await this.controller.listInterfaces();
    if (!available.includes(interfaceName)) {
      throw new InvocationError(
        ErrorCode.INVALID_INTERFACE_NAME,
        `invalid interface "${interfaceName}" requested. available interfaces are: ${available.join(' ')}`,
        { context: { interfaceName, available } }
      );
    }
  }

  private async select(invocation: SelectionInvocation): Promise<VendorSelection> {
    switch (invocation.mode) {
      case 'browse':
        return this.selector.browse(await this.loadSurvey(), this.browser);
      case 'search':
        return this.selector.pickMatching(await this.loadSurvey(), invocation.interfaceName, invocation.searchString);
      case 'registry': {
        const { choice, store } = await loadRegistry(
          { primaryPath: this.config.data.registryPrimaryFile, fallbackPath: this.config.data.registryFallbackFile },
          this.fileStat,
          this.readTextFile
        );
        this.emit('registryResolved', choice);
        return this.selector.pickFromRegistry(store);
      }
    }
  }

  private loadSurvey(): Promise<VendorStore<SurveyRecord>> {
    return loadSurvey(this.config.data.surveyFile, this.readTextFile);
  }

  /**
   * Down, apply, up. Each step runs only after the previous one succeeded and
   * a failure reports the state the interface was left in.
   */
  private async applyAddress(interfaceName: string, address: string): Promise<void> {
    try {
      await this.controller.setInterfaceState(interfaceName, 'down');
    } catch (err) {
      throw new InterfaceMutationError(
        ErrorCode.INTERFACE_DOWN_FAILED,
        `aborting. failed to bring ${interfaceName} down`,
        interfaceName,
        { addressChanged: false, interfaceUp: true },
        { cause: toError(err) }
      );
    }
    this.emit('interfaceStateChanged', interfaceName, 'down');

    try {
      await this.controller.applyHardwareAddress(interfaceName, address);
    } catch (err) {
      throw new InterfaceMutationError(
        ErrorCode.ADDRESS_APPLY_FAILED,
        `failed to set address ${address} on ${interfaceName}`,
        interfaceName,
        { addressChanged: false, interfaceUp: false },
        { cause: toError(err), context: { address } }
      );
    }
    this.emit('addressApplied', interfaceName, address);

    try {
      await this.controller.setInterfaceState(interfaceName, 'up');
    } catch (err) {
      throw new InterfaceMutationError(
        ErrorCode.INTERFACE_UP_FAILED,
        `failed to bring ${interfaceName} up`,
        interfaceName,
        { addressChanged: true, interfaceUp: false },
        { cause: toError(err), context: { address } }
      );
    }
    this.emit('interfaceStateChanged', interfaceName, 'up');
    logger.info({ interfaceName, address }, 'Hardware address changed');
  }
}
