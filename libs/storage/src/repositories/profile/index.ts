export { ProfileRepository } from './profile.repository';
export type { ProfileWithCount } from './profile.repository';
