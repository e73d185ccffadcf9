/**
 * Dispatch Module
 *
 * @module dispatch
 */

export {
  Dispatcher,
  type BatchItem,
  type DispatchRequest,
  type DispatcherOptions,
  type DispatcherStats,
} from './dispatcher.js';

export {
  createDispatcher,
  createVendorDispatchers,
  EmbeddingDispatcher,
  PlaceDetailDispatcher,
  PlaceSearchDispatcher,
  QueryDispatcher,
  type CategoryQuery,
  type DispatchSettings,
  type EmbeddingInput,
  type VendorClients,
  type VendorDispatchers,
} from './vendor-dispatchers.js';
