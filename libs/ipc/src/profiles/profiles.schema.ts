/**
 * Zod schemas for Profile domain validation
 */

import { z } from 'zod';

export const ProfileNameSchema = z
  .string()
  .regex(/^[a-z0-9][a-z0-9_-]{0,63}$/, 'Lowercase letters, digits, "-" and "_" (max 64)');

export const ProfileSchema = z.object({
  name: ProfileNameSchema,
  description: z.string().max(500).optional(),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
});

export const CreateProfileSchema = z.object({
  name: ProfileNameSchema,
  description: z.string().max(500).optional(),
});

const AddressSchema = z.string().regex(/^0x[0-9a-fA-F]{40}$/, 'Expected a 20-byte hex address');

/** Env var names the workload accepts as extras */
export const EnvKeySchema = z.string().regex(/^[A-Z_][A-Z0-9_]*$/, 'Expected an UPPER_SNAKE_CASE name');

export const ConfigBundleSchema = z.object({
  walletAddress: AddressSchema,
  signerAddress: AddressSchema,
  signerPrivateKey: z.string().regex(/^(0x)?[0-9a-fA-F]{64}$/, 'Expected a 32-byte hex private key'),
  sourceRpcUrl: z.string().url(),
  ledgerRpcUrl: z.string().url().optional(),
  telegramChatId: z.string().min(1).optional(),
  telegramReportingUrl: z.string().url().optional(),
  maxStreamPoolSize: z.number().int().positive().optional(),
  connectionRefreshInterval: z.number().int().positive().optional(),
  extraEnv: z.record(EnvKeySchema, z.string()).default({}),
});

/** Partial bundle accepted by `configure`: merged over what is stored */
export const ConfigBundlePatchSchema = ConfigBundleSchema.partial();

/** Bundle as written to an export file; the private key is only present when requested */
export const ExportedBundleSchema = z.object({
  chain: z.string().min(1),
  market: z.string().min(1),
  bundle: ConfigBundleSchema.extend({ signerPrivateKey: ConfigBundleSchema.shape.signerPrivateKey.optional() }),
});

export const PROFILE_EXPORT_VERSION = 1;

export const ProfileExportSchema = z.object({
  version: z.literal(PROFILE_EXPORT_VERSION),
  exportedAt: z.string().datetime(),
  profile: CreateProfileSchema,
  bundles: z.array(ExportedBundleSchema),
});

export type ExportedBundle = z.infer<typeof ExportedBundleSchema>;
export type ProfileExport = z.infer<typeof ProfileExportSchema>;
export type ConfigBundleInput = z.input<typeof ConfigBundleSchema>;
export type ConfigBundlePatch = z.input<typeof ConfigBundlePatchSchema>;
export type CreateProfileInput = z.input<typeof CreateProfileSchema>;
