/**
 * Services module for dependency injection
 */

export {
  ServiceContainer,
  getContainer,
  createContainer,
  resetContainer,
  type Services,
  type ServiceFactories,
} from './container.js';
