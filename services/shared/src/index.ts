// Database
export * from './db/client';
export * from './db/schema';

// Repositories
export * from './repositories/stock-ledger';
export * from './repositories/reservation-store';

// Services
export * from './services/reservation-service';
export * from './services/reservation-transitions';
export * from './services/inventory-service';
export * from './services/order-service';
export * from './services/payment-service';
export * from './services/shipment-service';
export * from './services/unit-of-work';

// Types
export * from './types/commerce.types';

// Utils
export * from './utils/logger';
export * from './utils/errors';
