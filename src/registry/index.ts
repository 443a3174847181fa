export { DiscriminatorRegistry } from './discriminator-registry.js';
