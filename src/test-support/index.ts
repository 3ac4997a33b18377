/**
 * Test support utilities.
 */

export {
  apiPage,
  connectionRefused,
  createPagedApi,
  textResponse
} from './fake-fetch'
export { type CacheCall, MemoryCache } from './memory-cache'
