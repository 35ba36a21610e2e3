/**
 * Profile schemas -- re-exported from @slotwarden/ipc for repository use
 */

export { CreateProfileSchema, ProfileSchema } from '@slotwarden/ipc';
export type { CreateProfileInput } from '@slotwarden/ipc';
