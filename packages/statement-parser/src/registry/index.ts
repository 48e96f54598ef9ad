export { AccountRegistry, defaultAccountRegistry } from './account-registry.js';
export { DEFAULT_ACCOUNT_REFERENCES } from './default-accounts.js';
export { loadRegistryFile } from './registry-loader.js';
