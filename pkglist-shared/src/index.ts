/**
 * Public API for pkglist-shared.
 */

// Package model
export type {
  PackageSourceKind,
  PackageProgress,
  FilterTab,
  PackageVersion,
  PackageInfo,
  VisualState,
  Page,
} from './types/package';
export { FILTER_TABS, getPrimaryVersion, isRestrictedTab } from './types/package';

// Collaborator contracts
export type {
  ListUpdate,
  ResolvedPackage,
  PackageSource,
  PageSource,
  FilterSource,
  ConnectSource,
  ItemsPerPageSink,
} from './types/collaborators';

// Events
export type { Disposable, Event } from './events/Emitter';
export { Emitter, DisposableStore } from './events/Emitter';

// Package list core
export type { ViewMode, ListKey, ListHost } from './list/types';
export { sameViewMode } from './list/types';
export type { StatusIcon, Selectable } from './list/PackageItem';
export { ListElement, PackageItem, VersionItem, computeStatusIcon, isSameVersion } from './list/PackageItem';
export type { RegistryItem, RegistryEntry } from './list/EntryRegistry';
export { EntryRegistry } from './list/EntryRegistry';
export type { PackageRegistry, RefreshRequest } from './list/Reconciler';
export { Reconciler } from './list/Reconciler';
export type { ViewModeInputs, ViewStateCollaborators } from './list/ViewStateController';
export {
  ViewStateController,
  MAX_SEARCH_TEXT_TO_DISPLAY,
  STATUS_MESSAGES,
  buildStatusMessage,
  resolveViewMode,
} from './list/ViewStateController';
export { ScrollIntoView, DEFAULT_SCROLL_RETRY_LIMIT } from './list/ScrollIntoView';
export { SelectionNavigator } from './list/SelectionNavigator';
export type { PackageListCollaborators, PackageListOptions, ListChangeReason } from './list/PackageList';
export { PackageList, DEFAULT_ENTRY_HEIGHT } from './list/PackageList';

// Page collaborators
export type { PackageDiff } from './page/PackageDatabase';
export { PackageDatabase } from './page/PackageDatabase';
export { PackageFiltering } from './page/PackageFiltering';
export { ConnectService } from './page/ConnectService';
export { ListPreferences } from './page/ListPreferences';
export type { PackageLoader, PageManagerOptions } from './page/PageManager';
export { PageManager, belongsToTab, matchesSearch } from './page/PageManager';

// Catalog
export type { CatalogPackage } from './readers/catalog';
export { readCatalog, parseCatalog, toPackageInfo, versionId } from './readers/catalog';
export type { JsonReadResult } from './readers/helpers';
export { readJsonFile } from './readers/helpers';

// Configuration
export type { PartialConfig, PkgListConfig, LoadConfigOptions } from './config';
export { loadConfig, configFromEnv, DEFAULT_CONFIG } from './config';
export { getConfigDir, getConfigFilePath, resolveUserPath, CONFIG_FILE } from './paths';

// Logging
export type { LogLevel, LoggerConfig, Logger } from './logging/logger';
export { configureLogger, getLogger, createChildLogger, isLogLevel, LOG_LEVELS } from './logging/logger';

// Errors
export type { CatalogErrorCode } from './errors';
export { PkgListError, CatalogError, ConfigError, isPkgListError } from './errors';
