/**
 * Profile store
 *
 * Namespaces configuration bundles by profile so several wallet/market
 * combinations coexist. The active profile is resolved once per invocation
 * and handed to callers as a value; nothing here keeps ambient state.
 */

import {
  DEFAULT_PROFILE,
  ENV_KEYS,
  InvalidInputError,
  PROFILE_EXPORT_VERSION,
  ProfileExportSchema,
  ProfileNameSchema,
} from '@slotwarden/ipc';
import type {
  ActiveProfile,
  ConfigBundle,
  ExportedBundle,
  Profile,
  ProfileExport,
  ProfileSummary,
  StoredBundle,
} from '@slotwarden/ipc';
import { SETTINGS_KEYS } from './constants';
import { ProfileExistsError, ProfileNotFoundError, ValidationError } from './errors';
import type { Storage } from './storage';

export interface ProfileImportResult {
  profile: string;
  imported: Array<{ chain: string; market: string }>;
  /** Bundles left out because the file carries no private key and none is stored */
  skipped: Array<{ chain: string; market: string }>;
}

export class ProfileStore {
  constructor(
    private readonly storage: Storage,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  /**
   * Create the `default` profile if it is missing. Idempotent.
   */
  ensureDefault(): void {
    if (!this.storage.profiles.exists(DEFAULT_PROFILE)) {
      this.storage.profiles.create({ name: DEFAULT_PROFILE, description: 'Default profile' });
    }
  }

  get(profile: string, chain: string, market: string): ConfigBundle | null {
    return this.storage.bundles.get(profile, chain, market);
  }

  set(profile: string, chain: string, market: string, bundle: unknown): ConfigBundle {
    return this.storage.bundles.set(profile, chain, market, bundle);
  }

  /** Merge a partial bundle over the stored one */
  update(profile: string, chain: string, market: string, patch: unknown): ConfigBundle {
    return this.storage.bundles.merge(profile, chain, market, patch);
  }

  /** Remove one bundle. Returns false when nothing was stored for (chain, market). */
  removeBundle(profile: string, chain: string, market: string): boolean {
    this.assertExists(profile);
    return this.storage.bundles.delete(profile, chain, market);
  }

  bundlesOf(profile: string): StoredBundle[] {
    this.assertExists(profile);
    return this.storage.bundles.listForProfile(profile);
  }

  listProfiles(): ProfileSummary[] {
    const defaultProfile = this.storage.settings.get(SETTINGS_KEYS.DEFAULT_PROFILE) ?? DEFAULT_PROFILE;
    const lastUsed = this.storage.settings.get(SETTINGS_KEYS.LAST_USED_PROFILE);
    return this.storage.profiles.getAll().map((p) => ({
      ...p,
      isDefault: p.name === defaultProfile,
      isLastUsed: p.name === lastUsed,
    }));
  }

  /**
   * Resolve the active profile:
   *   1. explicit name (e.g. --profile)
   *   2. SLOTWARDEN_PROFILE
   *   3. stored default profile
   *   4. last used profile
   *   5. "default"
   * A name given explicitly or via the environment must exist.
   */
  activeProfile(explicit?: string): ActiveProfile {
    if (explicit) {
      this.assertExists(explicit);
      return { name: explicit, source: 'explicit' };
    }

    const fromEnv = this.env[ENV_KEYS.PROFILE];
    if (fromEnv) {
      this.assertExists(fromEnv);
      return { name: fromEnv, source: 'env' };
    }

    const stored = this.storage.settings.get(SETTINGS_KEYS.DEFAULT_PROFILE);
    if (stored && this.storage.profiles.exists(stored)) {
      return { name: stored, source: 'default' };
    }

    const lastUsed = this.storage.settings.get(SETTINGS_KEYS.LAST_USED_PROFILE);
    if (lastUsed && this.storage.profiles.exists(lastUsed)) {
      return { name: lastUsed, source: 'last-used' };
    }

    return { name: DEFAULT_PROFILE, source: 'fallback' };
  }

  markUsed(profile: string): void {
    this.storage.settings.set(SETTINGS_KEYS.LAST_USED_PROFILE, profile);
  }

  setDefault(profile: string): void {
    this.assertExists(profile);
    this.storage.settings.set(SETTINGS_KEYS.DEFAULT_PROFILE, profile);
  }

  create(name: string, description?: string): Profile {
    this.assertValidName(name);
    return this.storage.profiles.create({ name, description });
  }

  /**
   * Delete a profile and its bundles. The built-in default profile is kept
   * unless `force` is set.
   */
  delete(name: string, options: { force?: boolean } = {}): void {
    if (name === DEFAULT_PROFILE && !options.force) {
      throw new InvalidInputError('Cannot delete the default profile without --force', 'profile');
    }
    this.assertExists(name);
    this.storage.transaction(() => {
      this.storage.profiles.delete(name);
      this.storage.settings.deleteByValue(name);
    });
  }

  /**
   * Copy a profile and all of its bundles. Returns the number of bundles copied.
   */
  copy(source: string, target: string): number {
    this.assertExists(source);
    this.assertValidName(target);
    if (this.storage.profiles.exists(target)) throw new ProfileExistsError(target);
    return this.storage.transaction(() => {
      this.storage.profiles.create({
        name: target,
        description: `Copied from ${source} on ${new Date().toISOString().slice(0, 10)}`,
      });
      return this.storage.bundles.copyAll(source, target);
    });
  }

  /**
   * Serialize a profile and its bundles. Private keys are left out unless
   * `includeSecrets` is set.
   */
  exportProfile(name: string, options: { includeSecrets?: boolean } = {}): ProfileExport {
    const profile = this.storage.profiles.get(name);
    if (!profile) throw new ProfileNotFoundError(name);
    return {
      version: PROFILE_EXPORT_VERSION,
      exportedAt: new Date().toISOString(),
      profile: { name: profile.name, description: profile.description },
      bundles: this.storage.bundles.listForProfile(name).map((stored) => ({
        chain: stored.chain,
        market: stored.market,
        bundle: options.includeSecrets ? stored.bundle : withoutSecret(stored.bundle),
      })),
    };
  }

  /**
   * Load an exported document. The profile is created under `options.name`
   * (or the exported name); an existing profile is only written to with
   * `force`, in which case bundles for the same (chain, market) are replaced
   * and a missing private key falls back to the stored one.
   */
  importProfile(document: unknown, options: { name?: string; force?: boolean } = {}): ProfileImportResult {
    const parsed = ProfileExportSchema.safeParse(document);
    if (!parsed.success) {
      throw new ValidationError(
        `Invalid profile export: ${parsed.error.issues.map((i) => `${i.path.map(String).join('.') || '(root)'}: ${i.message}`).join('; ')}`,
        parsed.error.issues,
      );
    }
    const data = parsed.data;
    const target = options.name ?? data.profile.name;
    this.assertValidName(target);

    const exists = this.storage.profiles.exists(target);
    if (exists && !options.force) throw new ProfileExistsError(target);

    return this.storage.transaction(() => {
      if (!exists) this.storage.profiles.create({ name: target, description: data.profile.description });

      const result: ProfileImportResult = { profile: target, imported: [], skipped: [] };
      for (const entry of data.bundles) {
        const key =
          entry.bundle.signerPrivateKey ??
          this.storage.bundles.get(target, entry.chain, entry.market)?.signerPrivateKey;
        if (key === undefined) {
          result.skipped.push({ chain: entry.chain, market: entry.market });
          continue;
        }
        this.storage.bundles.set(target, entry.chain, entry.market, { ...entry.bundle, signerPrivateKey: key });
        result.imported.push({ chain: entry.chain, market: entry.market });
      }
      return result;
    });
  }

  private assertExists(name: string): void {
    if (!this.storage.profiles.exists(name)) throw new ProfileNotFoundError(name);
  }

  private assertValidName(name: string): void {
    if (!ProfileNameSchema.safeParse(name).success) {
      throw new InvalidInputError(`Invalid profile name "${name}"`, 'profile');
    }
  }
}

function withoutSecret(bundle: ConfigBundle): ExportedBundle['bundle'] {
  const { signerPrivateKey: _secret, ...rest } = bundle;
  return rest;
}
