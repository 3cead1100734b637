/**
 * Admin Module
 */

export {
  type AdminVectorStore,
  type AdminScraper,
  type AdminServiceDependencies,
  type SourceSummary,
  type BufferUpload,
  type UploadInput,
  type UploadRequest,
  type UploadResult,
  type UpdateResult,
  ConnectionService,
  type ConnectionCheck,
} from './types.js';

export { AdminService, createAdminService } from './admin-service.js';

export {
  type ConnectionTargets,
  checkOpenAI,
  checkQdrant,
  checkFirecrawl,
  checkConnections,
} from './connections.js';
