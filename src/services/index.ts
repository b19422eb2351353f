/**
 * Registries and logger shared by the tool and resource handlers
 */

export {
  ServiceContainer,
  getContainer,
  createContainer,
  resetContainer,
  type Services,
  type ServiceConfig,
  type ServiceFactories,
} from './container.js';
