export {
  NullMessageStore,
  InMemoryMessageStore,
  DatabaseMessageStore,
  createMessageStore,
  type MessageStore,
  type MessageStoreType,
  type MessageStoreOptions,
} from './message-store.js';
