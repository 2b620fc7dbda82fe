export { Store, withStore } from './store.js'
export type { StoreOptions } from './store.js'
