/**
 * Service Graph Module
 */

export { type ServiceClients, type Services, createServices } from './create-services.js';
