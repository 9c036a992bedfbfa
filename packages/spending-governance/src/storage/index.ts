// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export type {
  StorageAdapter,
  StoreChanges,
  RequestStorageFilter,
  TrackerKey,
} from './adapter.js';
export { trackerKeyString } from './adapter.js';
export { MemoryStorageAdapter } from './memory.js';
export { TimeoutStorageAdapter } from './timeout.js';
