export { ModuleFinder, SOURCE_EXTENSION, PACKAGE_INIT, type ModuleSpec } from './module-finder.js';
export { ModuleCache, METADATA_FILE, type ModuleCacheConfig } from './module-cache.js';
export { ModuleLoader, readSourceFile, specForFile, type LoadedModule } from './module-loader.js';
export { ImportHook, type InstallStatus, type UninstallStatus } from './import-hook.js';
