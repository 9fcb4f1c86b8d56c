// Database
export * from './db/client';
export * from './db/entities';
export * from './db/events';
export * from './db/queries';

// Messaging
export * from './messaging/client';

// Domain
export * from './domain/amount-bounds';
export * from './domain/direction';
export * from './domain/labels';

// Services
export * from './services/catalog-service';
export * from './services/contractor-service';
export * from './services/document-service';
export * from './services/stock-service';
export * from './services/tree-store';
export * from './services/warehouse-service';

// Types
export * from './types/catalog.types';
export * from './types/document.types';
export * from './types/structure.types';

// Utils
export * from './utils/logger';
export * from './utils/errors';
export * from './utils/http';
export * from './utils/presenters';
export * from './utils/schemas';
