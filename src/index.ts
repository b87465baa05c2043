export * from './types/index.js';
export * from './config/index.js';
export * from './utils/index.js';
export * from './infra/index.js';
export * from './core/index.js';

import { VendorMacChanger } from './core/mac-changer.js';

export default VendorMacChanger;
