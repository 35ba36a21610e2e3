/**
 * Slotwarden IPC Library
 *
 * Shared types, schemas, errors and constants used by the storage, engine
 * and CLI packages.
 *
 * @packageDocumentation
 */

export * from './constants';
export * from './errors';
export * from './logger';

// Slots
export type { SlotId, SlotRef, Slot, SlotSelection } from './slots/slots.types';
export {
  WalletAddressSchema,
  SlotIdSchema,
  IdentifierSchema,
  MAX_RANGE_SPAN,
  parseWalletAddress,
  parseIdentifier,
  parseSlotSelection,
  formatSlotRanges,
} from './slots/slots.schema';

// Runtime
export type {
  ParsedName,
  ContainerState,
  InstanceBinding,
  SessionRef,
  RuntimeInstance,
  InventoryFilter,
  InventorySnapshot,
  ResourceHandle,
  ResourceKind,
  TeardownStep,
  TeardownStatus,
  TeardownFailure,
  TeardownOutcome,
} from './runtime/runtime.types';

// Plans
export type { ForeignBindingPolicy, ProfileScope, ActionPlan } from './plan/plan.types';

// Profiles
export type {
  Profile,
  ProfileSummary,
  ConfigBundle,
  StoredBundle,
  ProfileSource,
  ActiveProfile,
} from './profiles/profiles.types';
export {
  ProfileNameSchema,
  ProfileSchema,
  CreateProfileSchema,
  EnvKeySchema,
  ConfigBundleSchema,
  ConfigBundlePatchSchema,
  ExportedBundleSchema,
  ProfileExportSchema,
  PROFILE_EXPORT_VERSION,
} from './profiles/profiles.schema';
export type {
  ConfigBundleInput,
  ConfigBundlePatch,
  CreateProfileInput,
  ExportedBundle,
  ProfileExport,
} from './profiles/profiles.schema';

// Chains
export { MarketConfigSchema, ChainConfigSchema, ChainCatalogSchema } from './chains/chains.schema';
export type { MarketConfig, ChainConfig, ChainCatalog } from './chains/chains.schema';
