export { BundleRepository } from './bundle.repository';
